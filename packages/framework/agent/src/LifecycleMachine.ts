/**
 * @fileoverview Lifecycle state machine.
 *
 * Owns the agent phase, the clues of the current game, the match context
 * and the statistics. Classified messages come in one at a time; each is
 * applied to the state and the matching strategy callback runs before the
 * next message is looked at.
 *
 * Phase table:
 *
 *   idle         → connecting | playing | game_over | disconnected
 *   connecting   → connected | errored | disconnected
 *   connected    → playing | game_over | errored | disconnected
 *   playing      → game_over | errored | disconnected
 *   game_over    → connected | playing | errored | disconnected
 *   disconnected → connecting
 *   errored      → connecting | disconnected
 */

import {
  isKnownCommand,
  type AcknowledgmentMessage,
  type CommandMessage,
  type ErrorMessage,
  type GameMessage,
  type MatchContext,
  type ResultMessage,
} from '@turnkit/protocol';
import { AckRouter } from './AckRouter.js';
import { InvalidPhaseTransitionError, type TransportFaultError } from './errors.js';
import { MoveDispatcher, type MoveOutcome, type OutboundChannel } from './MoveDispatcher.js';
import { StatsRecorder } from './StatsRecorder.js';
import { invokeHook, type ResolvedStrategy } from './strategy.js';
import type {
  AgentPhase,
  GameContext,
  GameStats,
  LifecycleObserver,
  StartMessage,
  StrategyHookName,
} from './types.js';
import { createLogger, type Logger } from './utils/logger.js';

export const ALLOWED_TRANSITIONS: Readonly<Record<AgentPhase, readonly AgentPhase[]>> = {
  idle: ['connecting', 'playing', 'game_over', 'disconnected'],
  connecting: ['connected', 'errored', 'disconnected'],
  connected: ['playing', 'game_over', 'errored', 'disconnected'],
  playing: ['game_over', 'errored', 'disconnected'],
  game_over: ['connected', 'playing', 'errored', 'disconnected'],
  disconnected: ['connecting'],
  errored: ['connecting', 'disconnected'],
};

/** Phases in which inbound game messages are applied */
const ACCEPTING_PHASES: ReadonlySet<AgentPhase> = new Set<AgentPhase>([
  'idle',
  'connected',
  'playing',
  'game_over',
]);

export function canTransition(from: AgentPhase, to: AgentPhase): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export interface LifecycleMachineOptions<TMove> {
  strategy: ResolvedStrategy<TMove>;
  /** Return to `connected` after a game instead of ending the session */
  keepAlive: boolean;
  /** Current connection, or null when there is none */
  channel: () => OutboundChannel | null;
  /** A move could not be written to the connection */
  onTransportFault?: ((error: TransportFaultError) => void) | undefined;
  /** The game ended and the connection should be closed normally */
  onSessionComplete?: ((reason: string) => void) | undefined;
  observers?: readonly LifecycleObserver[] | undefined;
  ackRouter?: AckRouter | undefined;
  clock?: (() => Date) | undefined;
  logger?: Logger | undefined;
}

export class LifecycleMachine<TMove = string> {
  private readonly strategy: ResolvedStrategy<TMove>;
  private readonly keepAlive: boolean;
  private readonly channel: () => OutboundChannel | null;
  private readonly onTransportFault: (error: TransportFaultError) => void;
  private readonly onSessionComplete: (reason: string) => void;
  private readonly ackRouter: AckRouter;
  private readonly clock: () => Date;
  private readonly log: Logger;
  private readonly recorder = new StatsRecorder();
  private readonly observers: LifecycleObserver[];
  private readonly dispatcher: MoveDispatcher<TMove>;

  private currentPhase: AgentPhase = 'idle';
  private currentClues: readonly string[] = Object.freeze([]);
  private currentMatch: MatchContext = Object.freeze({});

  constructor(options: LifecycleMachineOptions<TMove>) {
    this.strategy = options.strategy;
    this.keepAlive = options.keepAlive;
    this.channel = options.channel;
    this.log = options.logger ?? createLogger('lifecycle');
    this.onTransportFault =
      options.onTransportFault ??
      ((error) => this.log.warn('Transport fault with no handler', { error: error.message }));
    this.onSessionComplete = options.onSessionComplete ?? (() => undefined);
    this.ackRouter = options.ackRouter ?? new AckRouter();
    this.clock = options.clock ?? (() => new Date());
    this.observers = [this.recorder, ...(options.observers ?? [])];
    this.dispatcher = new MoveDispatcher({
      strategy: this.strategy,
      channel: this.channel,
      logger: createLogger('moves'),
    });
  }

  get phase(): AgentPhase {
    return this.currentPhase;
  }

  get clues(): readonly string[] {
    return this.currentClues;
  }

  get match(): MatchContext {
    return this.currentMatch;
  }

  get stats(): GameStats {
    return this.recorder.snapshot();
  }

  get moves(): MoveDispatcher<TMove> {
    return this.dispatcher;
  }

  /**
   * Snapshot handed to strategy callbacks.
   */
  context(): GameContext {
    return {
      phase: this.currentPhase,
      clues: this.currentClues,
      match: this.currentMatch,
      stats: this.recorder.snapshot(),
    };
  }

  /**
   * Move to `to`. Staying in the current phase is a no-op.
   * @throws {InvalidPhaseTransitionError} if the table forbids the change
   */
  transition(to: AgentPhase, reason: string): void {
    const from = this.currentPhase;
    if (from === to) {
      return;
    }
    if (!canTransition(from, to)) {
      throw new InvalidPhaseTransitionError(from, to);
    }
    this.currentPhase = to;
    this.log.debug('Phase change', { from, to, reason });
    for (const observer of this.observers) {
      observer.onPhaseChange?.(from, to, reason);
    }
  }

  /**
   * The transport opened.
   */
  async connectionOpened(): Promise<void> {
    this.transition('connected', 'transport open');
    await this.invoke('onConnected', () => this.strategy.onConnected());
  }

  /**
   * The agent is done with the transport for good.
   */
  async connectionClosed(reason: string): Promise<void> {
    this.transition('disconnected', reason);
    await this.invoke('onDisconnected', () => this.strategy.onDisconnected());
  }

  /**
   * Abort the move being generated and drop queued commands.
   */
  cancelPendingMove(reason: string): void {
    this.dispatcher.cancel(reason);
  }

  /**
   * Apply one classified message. Never throws for message content.
   */
  async process(message: GameMessage): Promise<void> {
    if (!ACCEPTING_PHASES.has(this.currentPhase)) {
      this.log.debug('Dropping message outside a session', {
        kind: message.kind,
        phase: this.currentPhase,
      });
      return;
    }

    switch (message.kind) {
      case 'game_start':
        return this.startGame(message);
      case 'acknowledgment':
        return this.handleAcknowledgment(message);
      case 'command':
        return this.handleCommand(message);
      case 'result':
        return this.endGame(message);
      case 'error':
        return this.handleServerError(message);
      case 'unknown':
        this.log.warn('Unrecognized message', {
          parseError: message.parseError,
          raw: message.raw.slice(0, 200),
        });
        return;
      default: {
        const unhandled: never = message;
        throw new Error(`Unhandled message kind: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  private async startGame(message: StartMessage): Promise<void> {
    const at = this.clock();
    this.currentClues = Object.freeze([]);
    this.currentMatch = Object.freeze({
      matchId: message.matchId,
      gameId: message.gameId,
      playerId: message.playerId,
    });
    this.transition('playing', 'game started');
    for (const observer of this.observers) {
      observer.onGameStarted?.(at);
    }
    this.log.info('Game started', { matchId: message.matchId, gameId: message.gameId });
    await this.invoke('onGameStarted', () =>
      this.strategy.onGameStarted(message, this.context())
    );
  }

  private async handleAcknowledgment(message: AcknowledgmentMessage): Promise<void> {
    const signal = this.ackRouter.route(message);
    switch (signal.type) {
      case 'game_started':
        return this.startGame(signal.message);
      case 'clue': {
        const { clue } = signal;
        this.currentClues = Object.freeze([...this.currentClues, clue]);
        this.log.info('Clue received', { clue, total: this.currentClues.length });
        await this.invoke('onClueReceived', () =>
          this.strategy.onClueReceived(clue, message, this.context())
        );
        return;
      }
      case 'empty_clue':
        this.log.debug('Metadata acknowledgment without a clue');
        return;
      case 'other':
        await this.invoke('onAcknowledgment', () =>
          this.strategy.onAcknowledgment(message, this.context())
        );
        return;
    }
  }

  private async handleCommand(message: CommandMessage): Promise<void> {
    if (this.currentPhase !== 'playing') {
      this.log.debug('Ignoring command outside a game', {
        command: message.command,
        phase: this.currentPhase,
      });
      return;
    }
    if (!isKnownCommand(message.command)) {
      this.log.debug('Dispatching unrecognized command', { command: message.command });
    }

    const outcome = await this.dispatcher.dispatch(message, (signal) => ({
      ...this.context(),
      signal,
    }));
    this.applyMoveOutcome(message, outcome);
  }

  private applyMoveOutcome(message: CommandMessage, outcome: MoveOutcome<TMove>): void {
    switch (outcome.status) {
      case 'sent': {
        const at = this.clock();
        for (const observer of this.observers) {
          observer.onMoveSent?.(at);
        }
        this.log.info('Move sent', {
          command: message.command,
          move: this.recorder.snapshot().currentGameMoves,
        });
        return;
      }
      case 'send_failed':
        this.onTransportFault(outcome.error);
        return;
      case 'skipped':
      case 'failed':
      case 'cancelled':
        this.log.debug('No move sent', { command: message.command, status: outcome.status });
        return;
    }
  }

  private async endGame(message: ResultMessage): Promise<void> {
    const at = this.clock();
    this.transition('game_over', `result: ${message.outcome}`);
    for (const observer of this.observers) {
      observer.onGameEnded?.(message.outcome, at);
    }
    const stats = this.recorder.snapshot();
    this.log.info('Game over', {
      outcome: message.outcome,
      answer: message.answer,
      moves: stats.currentGameMoves,
      durationMs:
        stats.gameStartedAt !== null ? at.getTime() - stats.gameStartedAt.getTime() : undefined,
    });
    await this.invoke('onGameEnded', () => this.strategy.onGameEnded(message, this.context()));
    this.settleAfterGame();
  }

  private settleAfterGame(): void {
    if (this.currentPhase !== 'game_over') {
      return;
    }
    const channel = this.channel();
    if (!channel || !channel.isOpen) {
      return;
    }
    if (this.keepAlive) {
      this.transition('connected', 'keep-alive');
    } else {
      this.onSessionComplete('game over');
    }
  }

  private async handleServerError(message: ErrorMessage): Promise<void> {
    await this.invoke('onServerError', () => this.strategy.onServerError(message, this.context()));
  }

  private invoke(hook: StrategyHookName, call: () => void | Promise<void>): Promise<void> {
    return invokeHook(this.strategy, hook, call, this.log);
  }
}
