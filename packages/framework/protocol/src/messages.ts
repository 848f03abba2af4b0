/**
 * @fileoverview Normalized inbound message model.
 *
 * Every payload the game server pushes is classified into exactly one
 * `GameMessage` variant. The `kind` tag is the discriminant; variant-only
 * fields (acknowledgment subject, command name, outcome) exist only on the
 * variant that owns them.
 */

import { z } from 'zod';

/**
 * Message kind tag.
 */
export const MessageKindSchema = z.enum([
  'game_start',
  'acknowledgment',
  'command',
  'result',
  'error',
  'unknown',
]);
export type MessageKind = z.infer<typeof MessageKindSchema>;

/**
 * Game outcome carried by a result message.
 */
export const GameOutcomeSchema = z.enum(['win', 'loss', 'timeout', 'error', 'abandoned', 'unknown']);
export type GameOutcome = z.infer<typeof GameOutcomeSchema>;

/**
 * Correlation identifiers (matchId, gameId, yourId). Servers send either
 * strings or numbers; the value is echoed back with its original type.
 */
export const IdentifierSchema = z.union([z.string().min(1), z.number().finite()]);
export type Identifier = z.infer<typeof IdentifierSchema>;

/**
 * Acknowledgment subject (`ackFor`).
 */
export const AckSubjectSchema = z.string().min(1);

/**
 * Command name (`command`).
 */
export const CommandNameSchema = z.string().trim().min(1);

/**
 * Top-level shape every classifiable payload must have.
 */
export const InboundRecordSchema = z.record(z.string(), z.unknown());

/**
 * Free-form game data: every top-level field not extracted into a typed slot.
 */
export type GameData = Readonly<Record<string, unknown>>;

interface BaseGameMessage {
  /** Original payload text */
  readonly raw: string;
  readonly matchId?: Identifier | undefined;
  readonly gameId?: Identifier | undefined;
  /** Player identifier (`yourId` on the wire) */
  readonly playerId?: Identifier | undefined;
  readonly gameData: GameData;
}

/**
 * Legacy game-start payload (`type: "game start"`).
 */
export interface GameStartMessage extends BaseGameMessage {
  readonly kind: 'game_start';
}

/**
 * Server acknowledgment. `ackData` is typically empty, a clue string or
 * structured metadata.
 */
export interface AcknowledgmentMessage extends BaseGameMessage {
  readonly kind: 'acknowledgment';
  readonly ackFor: string;
  readonly ackData: unknown;
}

/**
 * Server request for exactly one move.
 */
export interface CommandMessage extends BaseGameMessage {
  readonly kind: 'command';
  /** Lowercased command name, e.g. "guess" */
  readonly command: string;
}

/**
 * End-of-game result.
 */
export interface ResultMessage extends BaseGameMessage {
  readonly kind: 'result';
  readonly outcome: GameOutcome;
  /** Revealed answer (`word`, falling back to `answer`) */
  readonly answer?: string | undefined;
}

/**
 * Server-reported error, or a recognized type marker with invalid contents.
 */
export interface ErrorMessage extends BaseGameMessage {
  readonly kind: 'error';
  readonly parseError?: string | undefined;
}

/**
 * Anything else, including payloads that are not JSON objects.
 */
export interface UnknownMessage extends BaseGameMessage {
  readonly kind: 'unknown';
  readonly parseError?: string | undefined;
}

export type GameMessage =
  | GameStartMessage
  | AcknowledgmentMessage
  | CommandMessage
  | ResultMessage
  | ErrorMessage
  | UnknownMessage;

/**
 * Commands the reference games issue. Other names are still dispatched.
 */
export const KNOWN_COMMANDS = ['guess', 'solve', 'hint'] as const;
export type KnownCommand = (typeof KNOWN_COMMANDS)[number];

export function isKnownCommand(command: string): command is KnownCommand {
  return KNOWN_COMMANDS.some((known) => known === command);
}

/**
 * Canonical acknowledgment subjects.
 */
export const ACK_SUBJECTS = {
  GAME_STARTED: 'game started',
  META_DATA: 'meta data',
  GUESS_RECEIVED: 'guess received',
  MOVE_RECEIVED: 'move received',
} as const;
