/**
 * @fileoverview Strategy adapter: fills optional hooks with defaults and runs
 * callbacks so that a failing strategy never takes the agent down.
 */

import { createMoveResponse } from '@turnkit/protocol';
import type { GameStrategy, StrategyHookName } from './types.js';
import { createLogger, describeError, type Logger } from './utils/logger.js';

/**
 * A strategy with every hook present.
 */
export type ResolvedStrategy<TMove> = Required<GameStrategy<TMove>>;

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Wrap a strategy so every optional hook exists. Methods are called on the
 * original object, so class-based strategies keep their `this`.
 */
export function withStrategyDefaults<TMove>(
  strategy: GameStrategy<TMove>,
  log: Logger = createLogger('strategy')
): ResolvedStrategy<TMove> {
  return {
    onGameStarted: (message, context) => strategy.onGameStarted(message, context),
    onClueReceived: (clue, message, context) => strategy.onClueReceived(clue, message, context),
    makeMove: (message, context) => strategy.makeMove(message, context),
    onGameEnded: (message, context) => strategy.onGameEnded(message, context),
    buildResponse: (message, move, context) =>
      strategy.buildResponse
        ? strategy.buildResponse(message, move, context)
        : createMoveResponse(message, move, { fallback: context.match }),
    onAcknowledgment: (message, context) => {
      if (strategy.onAcknowledgment) {
        return strategy.onAcknowledgment(message, context);
      }
      log.debug('Acknowledgment', { ackFor: message.ackFor });
    },
    onServerError: (message, context) => {
      if (strategy.onServerError) {
        return strategy.onServerError(message, context);
      }
      log.warn('Server reported an error', {
        parseError: message.parseError,
        gameData: message.gameData,
      });
    },
    onConnected: () => strategy.onConnected?.(),
    onDisconnected: () => strategy.onDisconnected?.(),
    onMoveError: (error, message) => strategy.onMoveError?.(error, message),
    onStrategyError: (error, hook) => strategy.onStrategyError?.(error, hook),
  };
}

/**
 * Run one strategy callback. A throw or rejection is logged and reported to
 * `onStrategyError`; it never propagates.
 */
export async function invokeHook(
  strategy: Pick<GameStrategy<unknown>, 'onStrategyError'>,
  hook: StrategyHookName,
  call: () => void | Promise<void>,
  log: Logger
): Promise<void> {
  try {
    await call();
  } catch (error) {
    const failure = toError(error);
    log.warn('Strategy callback failed', { hook, error: failure.message });
    try {
      strategy.onStrategyError?.(failure, hook);
    } catch (reportError) {
      log.error('onStrategyError failed', { hook, error: describeError(reportError) });
    }
  }
}
