/**
 * @fileoverview Turnkit agent runtime.
 *
 * Provides:
 * - GameAgent: connects a strategy to a game server and keeps it playing
 * - LifecycleMachine: phase, clues and statistics for one agent
 * - MoveDispatcher: one move per command, at most one in flight
 * - ReconnectionSupervisor: bounded reconnects after transport faults
 * - WebSocketConnector: `ws` transport
 */

export { AckRouter, extractClue, normalizeSubject, type AckHandler, type AckSignal } from './AckRouter.js';
export {
  AgentConfigSchema,
  reconnectDelayFor,
  resolveAgentConfig,
  type AgentConfig,
  type AgentConfigInput,
} from './config.js';
export { ConnectionSession, type IdleDecision, type SessionEnd } from './ConnectionSession.js';
export {
  FatalConnectionError,
  InvalidAgentConfigError,
  InvalidPhaseTransitionError,
  TransportFaultError,
  type TransportFaultKind,
} from './errors.js';
export { GameAgent, type GameAgentOptions } from './GameAgent.js';
export {
  ALLOWED_TRANSITIONS,
  canTransition,
  LifecycleMachine,
  type LifecycleMachineOptions,
} from './LifecycleMachine.js';
export {
  MoveDispatcher,
  type MoveDispatcherOptions,
  type MoveOutcome,
  type OutboundChannel,
  type SkipReason,
} from './MoveDispatcher.js';
export {
  ReconnectionSupervisor,
  type ReconnectionSupervisorOptions,
} from './ReconnectionSupervisor.js';
export { INITIAL_STATS, StatsRecorder, summarizeStats, type StatsSummary } from './StatsRecorder.js';
export { invokeHook, toError, withStrategyDefaults, type ResolvedStrategy } from './strategy.js';
export {
  NORMAL_CLOSURE,
  type ConnectOptions,
  type TransportConnection,
  type TransportConnector,
  type TransportHandlers,
} from './transport/Transport.js';
export { WebSocketConnector } from './transport/WebSocketTransport.js';
export type {
  AgentPhase,
  GameContext,
  GameStats,
  GameStrategy,
  LifecycleObserver,
  MoveContext,
  MoveResult,
  StartMessage,
  StrategyHookName,
} from './types.js';
export { createLogger, describeError, logger, type Logger, type LogLevel } from './utils/logger.js';
