/**
 * @fileoverview Turnkit protocol definitions.
 *
 * This package defines the inbound message model for turn-based word and
 * puzzle game servers, the classifier that maps raw payloads onto it, and
 * the default correlated move response. It holds no runtime state.
 */

export {
  ACK_SUBJECTS,
  type AcknowledgmentMessage,
  AckSubjectSchema,
  type CommandMessage,
  CommandNameSchema,
  type ErrorMessage,
  type GameData,
  type GameMessage,
  type GameOutcome,
  GameOutcomeSchema,
  type GameStartMessage,
  type Identifier,
  IdentifierSchema,
  InboundRecordSchema,
  isKnownCommand,
  KNOWN_COMMANDS,
  type KnownCommand,
  type MessageKind,
  MessageKindSchema,
  type ResultMessage,
  type UnknownMessage,
} from './messages.js';

export { classifyMessage, classifyRecord } from './classify.js';

export {
  createMoveResponse,
  DEFAULT_MOVE_KEY,
  isNoMove,
  type MatchContext,
  type MoveResponseOptions,
  type OutboundPayload,
} from './responses.js';

/**
 * Protocol version.
 */
export const TURNKIT_PROTOCOL_VERSION = '1.0.0';
