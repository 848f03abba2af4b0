/**
 * @fileoverview Outbound move responses.
 *
 * The response shape belongs to the strategy, but the server matches a move
 * to its open command by the correlation fields, so the default builder
 * always echoes them.
 */

import type { CommandMessage, Identifier } from './messages.js';

/**
 * JSON object sent back to the server for one command.
 */
export type OutboundPayload = Readonly<Record<string, unknown>>;

/**
 * Correlation fields remembered from the last game start.
 */
export interface MatchContext {
  readonly matchId?: Identifier | undefined;
  readonly gameId?: Identifier | undefined;
  readonly playerId?: Identifier | undefined;
}

export interface MoveResponseOptions {
  /** Used when the command itself omits matchId/gameId */
  readonly fallback?: MatchContext | undefined;
  /** Key the move is written under (default: "guess") */
  readonly moveKey?: string | undefined;
}

export const DEFAULT_MOVE_KEY = 'guess';

/**
 * Whether a strategy's return value means "no move".
 */
export function isNoMove(move: unknown): move is null | undefined | '' {
  return move === null || move === undefined || move === '';
}

function encodeMove(move: unknown): unknown {
  switch (typeof move) {
    case 'string':
      return move;
    case 'number':
    case 'boolean':
    case 'bigint':
      return String(move);
    default:
      return move;
  }
}

/**
 * Build the default correlated response:
 * `{ matchId, gameId, otp?, [moveKey]: move }`.
 *
 * Returns null when there is no move to send.
 */
export function createMoveResponse(
  message: CommandMessage,
  move: unknown,
  options: MoveResponseOptions = {}
): OutboundPayload | null {
  if (isNoMove(move)) {
    return null;
  }

  const response: Record<string, unknown> = {
    matchId: message.matchId ?? options.fallback?.matchId,
    gameId: message.gameId ?? options.fallback?.gameId,
  };

  const otp = message.gameData['otp'];
  if (otp !== undefined && otp !== null) {
    response['otp'] = otp;
  }

  response[options.moveKey ?? DEFAULT_MOVE_KEY] = encodeMove(move);
  return response;
}
