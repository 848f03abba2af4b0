/**
 * @fileoverview Message classifier: raw payload text → `GameMessage`.
 *
 * Classification is total. Unparseable input becomes an `unknown` message
 * carrying a `parseError`; it never throws. Priority, highest first:
 * 1. `type` is an error marker → error
 * 2. `type` is an acknowledgment marker → acknowledgment
 * 3. non-empty `command` → command
 * 4. `result` present, or `type` is a result marker → result
 * 5. `type` is a game-start marker → game_start
 * 6. otherwise → unknown
 */

import type { z } from 'zod';
import {
  AckSubjectSchema,
  CommandNameSchema,
  type GameData,
  type GameMessage,
  type GameOutcome,
  GameOutcomeSchema,
  IdentifierSchema,
  InboundRecordSchema,
} from './messages.js';

const ERROR_MARKERS = new Set(['error']);
const ACK_MARKERS = new Set(['ack', 'acknowledgement', 'acknowledgment']);
const RESULT_MARKERS = new Set(['result', 'game result', 'game_result']);
const GAME_START_MARKERS = new Set(['game start', 'game_start', 'start']);

type InboundRecord = Record<string, unknown>;

/**
 * Tracks which top-level fields were lifted into typed slots so that
 * everything else lands in `gameData`.
 */
class FieldReader {
  private readonly consumed = new Set<string>();

  constructor(private readonly record: InboundRecord) {}

  has(field: string): boolean {
    return Object.hasOwn(this.record, field);
  }

  peek(field: string): unknown {
    return this.has(field) ? this.record[field] : undefined;
  }

  peekString(field: string): string | undefined {
    const value = this.peek(field);
    return typeof value === 'string' ? value : undefined;
  }

  /** Read and consume a field if it validates. */
  take<T>(field: string, schema: z.ZodType<T>): T | undefined {
    if (!this.has(field)) {
      return undefined;
    }
    const result = schema.safeParse(this.record[field]);
    if (!result.success) {
      return undefined;
    }
    this.consumed.add(field);
    return result.data;
  }

  consume(field: string): void {
    if (this.has(field)) {
      this.consumed.add(field);
    }
  }

  remaining(): GameData {
    const data: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(this.record)) {
      if (!this.consumed.has(key)) {
        data[key] = value;
      }
    }
    return data;
  }
}

function parseOutcome(value: unknown): GameOutcome {
  if (typeof value !== 'string') {
    return 'unknown';
  }
  const result = GameOutcomeSchema.safeParse(value.trim().toLowerCase());
  return result.success ? result.data : 'unknown';
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Classify one inbound payload.
 */
export function classifyMessage(raw: string): GameMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return { kind: 'unknown', raw, gameData: {}, parseError: `invalid JSON: ${describeError(error)}` };
  }

  const record = InboundRecordSchema.safeParse(parsed);
  if (!record.success) {
    return { kind: 'unknown', raw, gameData: {}, parseError: 'payload is not a JSON object' };
  }

  return classifyRecord(raw, record.data);
}

/**
 * Classify an already-parsed payload object. `raw` is kept verbatim.
 */
export function classifyRecord(raw: string, record: InboundRecord): GameMessage {
  const fields = new FieldReader(record);
  const ids = {
    matchId: fields.take('matchId', IdentifierSchema),
    gameId: fields.take('gameId', IdentifierSchema),
    playerId: fields.take('yourId', IdentifierSchema),
  };
  const marker = fields.peekString('type')?.trim().toLowerCase();

  if (marker !== undefined && ERROR_MARKERS.has(marker)) {
    fields.consume('type');
    return { kind: 'error', raw, ...ids, gameData: fields.remaining() };
  }

  if (marker !== undefined && ACK_MARKERS.has(marker)) {
    fields.consume('type');
    const ackFor = fields.take('ackFor', AckSubjectSchema);
    if (ackFor === undefined) {
      return {
        kind: 'error',
        raw,
        ...ids,
        gameData: fields.remaining(),
        parseError: 'acknowledgment without a subject',
      };
    }
    const ackData = fields.peek('ackData');
    fields.consume('ackData');
    return {
      kind: 'acknowledgment',
      raw,
      ...ids,
      ackFor: ackFor.trim().toLowerCase(),
      ackData,
      gameData: fields.remaining(),
    };
  }

  const command = fields.take('command', CommandNameSchema);
  if (command !== undefined) {
    return { kind: 'command', raw, ...ids, command: command.toLowerCase(), gameData: fields.remaining() };
  }

  if (fields.has('result') || (marker !== undefined && RESULT_MARKERS.has(marker))) {
    const outcome = parseOutcome(fields.peek('result'));
    if (typeof fields.peek('result') === 'string') {
      fields.consume('result');
    }
    if (marker !== undefined && RESULT_MARKERS.has(marker)) {
      fields.consume('type');
    }
    return {
      kind: 'result',
      raw,
      ...ids,
      outcome,
      answer: fields.peekString('word') ?? fields.peekString('answer'),
      gameData: fields.remaining(),
    };
  }

  if (marker !== undefined && GAME_START_MARKERS.has(marker)) {
    fields.consume('type');
    return { kind: 'game_start', raw, ...ids, gameData: fields.remaining() };
  }

  return { kind: 'unknown', raw, ...ids, gameData: fields.remaining() };
}
