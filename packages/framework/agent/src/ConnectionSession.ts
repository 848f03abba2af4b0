/**
 * @fileoverview One live connection's receive pump.
 *
 * Inbound frames are queued and handed to the lifecycle one at a time. An
 * idle timer measures the gap between messages; it is paused while a frame
 * (including the move generation it triggers) is being processed.
 */

import type { TransportFaultError } from './errors.js';
import { NORMAL_CLOSURE, type TransportConnection, type TransportHandlers } from './transport/Transport.js';
import { createLogger, describeError, type Logger } from './utils/logger.js';

export type SessionEnd =
  | { readonly type: 'completed'; readonly reason: string }
  | { readonly type: 'fault'; readonly error: TransportFaultError }
  | { readonly type: 'stopped' };

/** What to do when the receive timeout elapses */
export type IdleDecision = 'continue' | SessionEnd;

export interface ConnectionSessionOptions {
  receiveTimeoutMs: number;
  /** Process one inbound frame; must not reject */
  handleFrame: (raw: string) => Promise<void>;
  onIdle: () => IdleDecision;
  /** Decide how a close the agent did not ask for ends the session */
  onRemoteClose: (code: number, reason: string) => SessionEnd;
  /** Called once when the session ends abnormally, before the pump drains */
  onAbandon: (reason: string) => void;
  logger?: Logger | undefined;
}

export class ConnectionSession {
  readonly handlers: TransportHandlers;
  readonly finished: Promise<SessionEnd>;

  private readonly options: ConnectionSessionOptions;
  private readonly log: Logger;
  private readonly buffered: string[] = [];
  private connection: TransportConnection | null = null;
  private processing: Promise<void> = Promise.resolve();
  private pending = 0;
  private idleTimer: ReturnType<typeof setTimeout> | null = null;
  private outcome: SessionEnd | null = null;
  private settle: (end: Promise<SessionEnd>) => void = () => undefined;

  constructor(options: ConnectionSessionOptions) {
    this.options = options;
    this.log = options.logger ?? createLogger('session');
    this.finished = new Promise((resolve) => {
      this.settle = resolve;
    });
    this.handlers = {
      onMessage: (data) => this.receive(data),
      onClose: (code, reason) => this.end(this.options.onRemoteClose(code, reason)),
      onError: (error) => this.log.debug('Connection error', { error: describeError(error) }),
    };
  }

  get ended(): boolean {
    return this.outcome !== null;
  }

  /**
   * Start pumping. Frames that arrived during the handshake go first.
   */
  attach(connection: TransportConnection): void {
    if (this.outcome) {
      connection.close(NORMAL_CLOSURE, 'session ended');
      return;
    }
    this.connection = connection;
    const early = this.buffered.splice(0);
    for (const raw of early) {
      this.enqueue(raw);
    }
    if (this.pending === 0) {
      this.armIdleTimer();
    }
  }

  /** Close normally; the session ends as `completed`. */
  complete(reason: string): void {
    this.end({ type: 'completed', reason });
  }

  fail(error: TransportFaultError): void {
    this.end({ type: 'fault', error });
  }

  stop(): void {
    this.end({ type: 'stopped' });
  }

  private receive(raw: string): void {
    if (this.outcome) {
      return;
    }
    if (!this.connection) {
      this.buffered.push(raw);
      return;
    }
    this.enqueue(raw);
  }

  private enqueue(raw: string): void {
    this.clearIdleTimer();
    this.pending++;
    this.processing = this.processing.then(async () => {
      try {
        if (!this.outcome) {
          await this.options.handleFrame(raw);
        }
      } finally {
        this.pending--;
        if (this.pending === 0 && !this.outcome) {
          this.armIdleTimer();
        }
      }
    });
  }

  private armIdleTimer(): void {
    this.clearIdleTimer();
    this.idleTimer = setTimeout(() => {
      this.idleTimer = null;
      const decision = this.options.onIdle();
      if (decision === 'continue') {
        this.armIdleTimer();
      } else {
        this.end(decision);
      }
    }, this.options.receiveTimeoutMs);
  }

  private clearIdleTimer(): void {
    if (this.idleTimer) {
      clearTimeout(this.idleTimer);
      this.idleTimer = null;
    }
  }

  private end(outcome: SessionEnd): void {
    if (this.outcome) {
      return;
    }
    this.outcome = outcome;
    this.clearIdleTimer();
    this.buffered.length = 0;

    if (outcome.type !== 'completed') {
      this.options.onAbandon(outcome.type === 'fault' ? outcome.error.message : 'stopped');
    }

    const connection = this.connection;
    this.connection = null;
    if (connection?.isOpen) {
      connection.close(NORMAL_CLOSURE, outcome.type === 'completed' ? outcome.reason : 'closing');
    }

    this.log.debug('Session ended', { outcome: outcome.type });
    this.settle(this.processing.then(() => outcome));
  }
}
