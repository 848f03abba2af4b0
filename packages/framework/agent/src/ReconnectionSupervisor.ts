/**
 * @fileoverview Reconnection supervisor.
 *
 * Runs connection sessions one after another. A transport fault moves the
 * agent to `errored` and, while attempts remain, reconnects after the
 * configured delay. The attempt counter resets once a connection opens.
 * When attempts are exhausted the agent ends in `disconnected` and `run()`
 * rejects with a `FatalConnectionError`.
 */

import type { AgentConfig } from './config.js';
import { reconnectDelayFor } from './config.js';
import { ConnectionSession, type IdleDecision, type SessionEnd } from './ConnectionSession.js';
import { FatalConnectionError, TransportFaultError } from './errors.js';
import type { LifecycleMachine } from './LifecycleMachine.js';
import {
  NORMAL_CLOSURE,
  type TransportConnection,
  type TransportConnector,
} from './transport/Transport.js';
import { createLogger, describeError, type Logger } from './utils/logger.js';

export interface ReconnectionSupervisorOptions<TMove> {
  config: AgentConfig;
  connector: TransportConnector;
  machine: LifecycleMachine<TMove>;
  /** Process one inbound frame; must not reject */
  handleFrame: (raw: string) => Promise<void>;
  logger?: Logger | undefined;
}

export class ReconnectionSupervisor<TMove = string> {
  private readonly config: AgentConfig;
  private readonly connector: TransportConnector;
  private readonly machine: LifecycleMachine<TMove>;
  private readonly handleFrame: (raw: string) => Promise<void>;
  private readonly log: Logger;

  private running = false;
  private stopped = false;
  private session: ConnectionSession | null = null;
  private connection: TransportConnection | null = null;
  private connectAbort: AbortController | null = null;
  private wake: (() => void) | null = null;
  private reconnectAttempts = 0;

  constructor(options: ReconnectionSupervisorOptions<TMove>) {
    this.config = options.config;
    this.connector = options.connector;
    this.machine = options.machine;
    this.handleFrame = options.handleFrame;
    this.log = options.logger ?? createLogger('supervisor');
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Open connection the current session writes to, if any */
  get currentConnection(): TransportConnection | null {
    return this.connection;
  }

  /** Reconnect attempts made since the last successful open */
  get attempts(): number {
    return this.reconnectAttempts;
  }

  // ============ Lifecycle ============

  /**
   * Connect and keep the agent connected until it is stopped, a session
   * completes normally or reconnect attempts run out.
   * @throws {FatalConnectionError} when reconnect attempts are exhausted
   */
  async run(): Promise<void> {
    if (this.running) {
      throw new Error('Supervisor is already running');
    }
    this.running = true;
    this.stopped = false;
    this.reconnectAttempts = 0;

    try {
      for (;;) {
        this.machine.transition(
          'connecting',
          this.reconnectAttempts === 0
            ? 'connect'
            : `reconnect attempt ${this.reconnectAttempts}/${this.config.maxReconnectAttempts}`
        );

        const end = await this.runSession();

        if (end.type !== 'fault') {
          await this.machine.connectionClosed(end.type === 'completed' ? end.reason : 'stopped');
          return;
        }

        this.machine.transition('errored', end.error.message);
        this.log.warn('Transport fault', { kind: end.error.kind, error: end.error.message });

        if (this.reconnectAttempts >= this.config.maxReconnectAttempts) {
          this.log.error('Reconnect attempts exhausted', { attempts: this.reconnectAttempts });
          await this.machine.connectionClosed('reconnect attempts exhausted');
          throw new FatalConnectionError(this.reconnectAttempts, end.error);
        }

        this.reconnectAttempts++;
        const delayMs = reconnectDelayFor(this.config, this.reconnectAttempts);
        this.log.info('Reconnecting', {
          attempt: this.reconnectAttempts,
          maxAttempts: this.config.maxReconnectAttempts,
          delayMs,
        });
        await this.sleep(delayMs);

        if (this.stopped) {
          await this.machine.connectionClosed('stopped');
          return;
        }
      }
    } finally {
      this.running = false;
    }
  }

  /**
   * Stop supervising: abort a pending connect or delay and end the current
   * session.
   */
  stop(): void {
    this.stopped = true;
    this.connectAbort?.abort();
    this.session?.stop();
    this.wake?.();
  }

  /**
   * End the current session normally (game over without keep-alive).
   */
  completeSession(reason: string): void {
    this.session?.complete(reason);
  }

  /**
   * Report a fault detected outside the receive path, e.g. a failed send.
   */
  reportFault(error: TransportFaultError): void {
    this.session?.fail(error);
  }

  // ============ Sessions ============

  private async runSession(): Promise<SessionEnd> {
    const session = new ConnectionSession({
      receiveTimeoutMs: this.config.receiveTimeoutMs,
      handleFrame: this.handleFrame,
      onIdle: () => this.decideOnIdle(),
      onRemoteClose: (code, reason) => this.decideOnRemoteClose(code, reason),
      onAbandon: (reason) => this.machine.cancelPendingMove(reason),
    });
    const abort = new AbortController();
    this.session = session;
    this.connectAbort = abort;

    try {
      let connection: TransportConnection;
      try {
        connection = await this.connector.connect(this.config.url, session.handlers, {
          timeoutMs: this.config.connectTimeoutMs,
          signal: abort.signal,
        });
      } catch (error) {
        if (this.stopped) {
          return { type: 'stopped' };
        }
        return {
          type: 'fault',
          error:
            error instanceof TransportFaultError
              ? error
              : new TransportFaultError('connect', `Connect failed: ${describeError(error)}`, {
                  cause: error,
                }),
        };
      }

      if (this.stopped) {
        connection.close(NORMAL_CLOSURE, 'stopped');
        return { type: 'stopped' };
      }

      this.connection = connection;
      this.reconnectAttempts = 0;
      await this.machine.connectionOpened();
      session.attach(connection);
      return await session.finished;
    } finally {
      this.connection = null;
      this.session = null;
      this.connectAbort = null;
    }
  }

  private decideOnIdle(): IdleDecision {
    const phase = this.machine.phase;
    if (phase === 'playing') {
      return {
        type: 'fault',
        error: new TransportFaultError(
          'receive_timeout',
          `No message within ${this.config.receiveTimeoutMs}ms during a game`
        ),
      };
    }
    if (this.config.keepAlive) {
      return 'continue';
    }
    return { type: 'completed', reason: 'receive timeout' };
  }

  private decideOnRemoteClose(code: number, reason: string): SessionEnd {
    if (!this.config.keepAlive && code === NORMAL_CLOSURE && this.machine.phase !== 'playing') {
      return { type: 'completed', reason: 'server closed the connection' };
    }
    const detail = reason ? `${code}: ${reason}` : String(code);
    return {
      type: 'fault',
      error: new TransportFaultError('closed', `Connection closed (${detail})`),
    };
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      if (this.stopped) {
        resolve();
        return;
      }
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }
}
