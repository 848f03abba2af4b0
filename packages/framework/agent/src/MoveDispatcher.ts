/**
 * @fileoverview Move dispatcher.
 *
 * Turns a command into exactly one outbound move. Commands are queued in
 * arrival order and at most one move generation runs at a time. The running
 * generation can be cancelled, in which case nothing is sent for it.
 */

import type { CommandMessage, OutboundPayload } from '@turnkit/protocol';
import { TransportFaultError } from './errors.js';
import { invokeHook, toError, type ResolvedStrategy } from './strategy.js';
import type { MoveContext, MoveResult } from './types.js';
import { createLogger, describeError, type Logger } from './utils/logger.js';

/**
 * Where moves are written. Implemented by a live transport connection.
 */
export interface OutboundChannel {
  readonly isOpen: boolean;
  send(data: string): Promise<void>;
}

export type SkipReason = 'no_move' | 'no_response' | 'not_connected';

export type MoveOutcome<TMove> =
  | { readonly status: 'sent'; readonly move: TMove; readonly payload: OutboundPayload }
  | { readonly status: 'skipped'; readonly reason: 'no_move' }
  | { readonly status: 'skipped'; readonly reason: 'no_response'; readonly move: TMove }
  | {
      readonly status: 'skipped';
      readonly reason: 'not_connected';
      readonly move: TMove;
      readonly payload: OutboundPayload;
    }
  | { readonly status: 'failed'; readonly error: Error }
  | { readonly status: 'send_failed'; readonly error: TransportFaultError }
  | { readonly status: 'cancelled' };

export interface MoveDispatcherOptions<TMove> {
  strategy: ResolvedStrategy<TMove>;
  /** Current connection, or null when there is none */
  channel: () => OutboundChannel | null;
  logger?: Logger | undefined;
}

const CANCELLED = Object.freeze({ status: 'cancelled' } as const);

/**
 * Settle with `promise`, or reject with the signal's reason once it aborts.
 */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export class MoveDispatcher<TMove = string> {
  private readonly strategy: ResolvedStrategy<TMove>;
  private readonly channel: () => OutboundChannel | null;
  private readonly log: Logger;

  private tail: Promise<unknown> = Promise.resolve();
  private active: AbortController | null = null;
  private pending = 0;
  /** Bumped by cancel(); queued commands from an older generation are dropped */
  private generation = 0;

  constructor(options: MoveDispatcherOptions<TMove>) {
    this.strategy = options.strategy;
    this.channel = options.channel;
    this.log = options.logger ?? createLogger('moves');
  }

  /** Whether a move generation is running right now */
  get inFlight(): boolean {
    return this.active !== null;
  }

  /** Commands accepted but not yet settled, including the running one */
  get pendingCount(): number {
    return this.pending;
  }

  /**
   * Queue a command. Resolves once its move was sent, skipped, failed or
   * cancelled; never rejects.
   *
   * @param buildContext - called when generation starts, with the signal
   *   that aborts it
   */
  dispatch(
    message: CommandMessage,
    buildContext: (signal: AbortSignal) => MoveContext
  ): Promise<MoveOutcome<TMove>> {
    const generation = this.generation;
    this.pending++;
    const run = this.tail.then(async (): Promise<MoveOutcome<TMove>> => {
      try {
        if (generation !== this.generation) {
          return CANCELLED;
        }
        return await this.execute(message, buildContext);
      } finally {
        this.pending--;
      }
    });
    this.tail = run;
    return run;
  }

  /**
   * Abort the running generation and drop every queued command.
   */
  cancel(reason = 'cancelled'): void {
    this.generation++;
    if (this.active) {
      this.log.debug('Cancelling move generation', { reason });
      this.active.abort(new Error(reason));
    }
  }

  private async execute(
    message: CommandMessage,
    buildContext: (signal: AbortSignal) => MoveContext
  ): Promise<MoveOutcome<TMove>> {
    const controller = new AbortController();
    const { signal } = controller;
    this.active = controller;

    try {
      let context: MoveContext;
      let move: MoveResult<TMove>;
      try {
        context = buildContext(signal);
        move = await raceAbort(
          Promise.resolve().then(() => this.strategy.makeMove(message, context)),
          signal
        );
      } catch (error) {
        return signal.aborted ? CANCELLED : this.fail(error, message);
      }

      if (signal.aborted) {
        return CANCELLED;
      }
      if (move === null || move === undefined || move === '') {
        this.log.info('Strategy produced no move', { command: message.command });
        return { status: 'skipped', reason: 'no_move' };
      }

      let payload: OutboundPayload | null | undefined;
      let data: string;
      try {
        payload = this.strategy.buildResponse(message, move, context);
        if (payload === null || payload === undefined) {
          this.log.info('Strategy built no response', { command: message.command });
          return { status: 'skipped', reason: 'no_response', move };
        }
        if (typeof payload !== 'object' || Array.isArray(payload)) {
          throw new TypeError('Move response must be a JSON object');
        }
        data = JSON.stringify(payload);
      } catch (error) {
        return this.fail(error, message);
      }

      const channel = this.channel();
      if (!channel || !channel.isOpen) {
        this.log.warn('No open connection; move not sent', { command: message.command });
        return { status: 'skipped', reason: 'not_connected', move, payload };
      }

      try {
        await channel.send(data);
      } catch (error) {
        const fault =
          error instanceof TransportFaultError
            ? error
            : new TransportFaultError('send', `Failed to send move: ${describeError(error)}`, {
                cause: error,
              });
        this.log.warn('Move send failed', { error: fault.message });
        return { status: 'send_failed', error: fault };
      }

      this.log.debug('Move sent', { command: message.command, payload });
      return { status: 'sent', move, payload };
    } finally {
      if (this.active === controller) {
        this.active = null;
      }
    }
  }

  private async fail(error: unknown, message: CommandMessage): Promise<MoveOutcome<TMove>> {
    const failure = toError(error);
    this.log.warn('Move generation failed', { command: message.command, error: failure.message });
    await invokeHook(
      this.strategy,
      'onMoveError',
      () => this.strategy.onMoveError(failure, message),
      this.log
    );
    return { status: 'failed', error: failure };
  }
}
