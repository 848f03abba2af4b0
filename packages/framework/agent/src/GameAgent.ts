/**
 * @fileoverview Game agent: wires the classifier, lifecycle machine, move
 * dispatcher and reconnection supervisor around one strategy.
 *
 * @example
 * ```typescript
 * const agent = new GameAgent({
 *   config: { url: 'ws://localhost:8080/ws' },
 *   strategy: new KeywordCluedleStrategy(),
 * });
 * await agent.run();
 * console.log(summarizeStats(agent.stats));
 * ```
 */

import { classifyMessage, type MatchContext } from '@turnkit/protocol';
import type { AckRouter } from './AckRouter.js';
import { resolveAgentConfig, type AgentConfig, type AgentConfigInput } from './config.js';
import { LifecycleMachine } from './LifecycleMachine.js';
import { ReconnectionSupervisor } from './ReconnectionSupervisor.js';
import { withStrategyDefaults } from './strategy.js';
import type { TransportConnector } from './transport/Transport.js';
import { WebSocketConnector } from './transport/WebSocketTransport.js';
import type { AgentPhase, GameStats, GameStrategy, LifecycleObserver } from './types.js';
import { createLogger, describeError, type Logger } from './utils/logger.js';

export interface GameAgentOptions<TMove> {
  config: AgentConfigInput;
  strategy: GameStrategy<TMove>;
  /** Defaults to a `ws` connector */
  connector?: TransportConnector | undefined;
  observers?: readonly LifecycleObserver[] | undefined;
  /** Custom acknowledgment subjects */
  ackRouter?: AckRouter | undefined;
  clock?: (() => Date) | undefined;
  logger?: Logger | undefined;
}

export class GameAgent<TMove = string> {
  readonly config: AgentConfig;

  private readonly machine: LifecycleMachine<TMove>;
  private readonly supervisor: ReconnectionSupervisor<TMove>;
  private readonly log: Logger;
  private ingestQueue: Promise<void> = Promise.resolve();
  private closed = false;

  constructor(options: GameAgentOptions<TMove>) {
    this.config = resolveAgentConfig(options.config);
    this.log = options.logger ?? createLogger('agent');

    this.machine = new LifecycleMachine({
      strategy: withStrategyDefaults(options.strategy),
      keepAlive: this.config.keepAlive,
      channel: () => this.supervisor.currentConnection,
      onTransportFault: (error) => this.supervisor.reportFault(error),
      onSessionComplete: (reason) => this.supervisor.completeSession(reason),
      observers: options.observers,
      ackRouter: options.ackRouter,
      clock: options.clock,
    });

    this.supervisor = new ReconnectionSupervisor({
      config: this.config,
      connector: options.connector ?? new WebSocketConnector(),
      machine: this.machine,
      handleFrame: (raw) => this.handleFrame(raw),
    });
  }

  get phase(): AgentPhase {
    return this.machine.phase;
  }

  get stats(): GameStats {
    return this.machine.stats;
  }

  get clues(): readonly string[] {
    return this.machine.clues;
  }

  get match(): MatchContext {
    return this.machine.match;
  }

  /** Whether a move is being generated right now */
  get isMoveInFlight(): boolean {
    return this.machine.moves.inFlight;
  }

  /**
   * Connect and play until closed, a session ends normally, or reconnects
   * are exhausted.
   * @throws {FatalConnectionError} when reconnect attempts are exhausted
   */
  async run(): Promise<void> {
    if (this.closed) {
      throw new Error('Agent is closed');
    }
    this.log.info('Agent starting', {
      url: this.config.url,
      keepAlive: this.config.keepAlive,
    });
    await this.supervisor.run();
    this.log.info('Agent stopped', { phase: this.machine.phase });
  }

  /**
   * Cancel any move being generated and tear down the transport. Nothing is
   * sent for a cancelled move.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.machine.cancelPendingMove('agent closed');
    if (this.supervisor.isRunning) {
      this.supervisor.stop();
    } else if (this.machine.phase !== 'disconnected') {
      this.machine.transition('disconnected', 'agent closed');
    }
  }

  /**
   * Feed one raw payload without a transport. Calls are applied in order;
   * moves produced this way are not sent.
   */
  ingest(raw: string): Promise<void> {
    const next = this.ingestQueue.then(() => this.handleFrame(raw));
    this.ingestQueue = next;
    return next;
  }

  private async handleFrame(raw: string): Promise<void> {
    try {
      await this.machine.process(classifyMessage(raw));
    } catch (error) {
      this.log.error('Failed to process message', { error: describeError(error) });
    }
  }
}
