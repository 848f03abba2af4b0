/**
 * @fileoverview Acknowledgment/clue extractor.
 *
 * Routes a classified acknowledgment through a dispatch table keyed by
 * subject and returns the lifecycle signal it implies. It never mutates
 * state or invokes strategy callbacks itself; the lifecycle machine applies
 * the signal.
 */

import { ACK_SUBJECTS, type AcknowledgmentMessage } from '@turnkit/protocol';

export type AckSignal =
  | { readonly type: 'game_started'; readonly message: AcknowledgmentMessage }
  | { readonly type: 'clue'; readonly clue: string; readonly message: AcknowledgmentMessage }
  | { readonly type: 'empty_clue'; readonly message: AcknowledgmentMessage }
  | { readonly type: 'other'; readonly message: AcknowledgmentMessage };

export type AckHandler = (message: AcknowledgmentMessage) => AckSignal;

const CLUE_FIELDS = ['clue', 'hint', 'text'] as const;

/**
 * Pull one clue string out of an acknowledgment payload.
 * Strings are trimmed; objects yield their `clue`/`hint`/`text` field or
 * their JSON. Empty values, `0`, `NaN` and `false` yield null.
 */
export function extractClue(ackData: unknown): string | null {
  if (ackData === null || ackData === undefined) {
    return null;
  }

  if (typeof ackData === 'string') {
    const clue = ackData.trim();
    return clue.length > 0 ? clue : null;
  }

  if (typeof ackData === 'number' || typeof ackData === 'boolean') {
    return ackData ? String(ackData) : null;
  }

  if (Array.isArray(ackData)) {
    return ackData.length > 0 ? JSON.stringify(ackData) : null;
  }

  if (typeof ackData === 'object') {
    const record: Record<string, unknown> = { ...ackData };
    for (const field of CLUE_FIELDS) {
      const value = record[field];
      if (typeof value === 'string' && value.trim().length > 0) {
        return value.trim();
      }
    }
    return Object.keys(record).length > 0 ? JSON.stringify(record) : null;
  }

  return null;
}

/**
 * Canonical form of a subject: lowercase, `_`/`-` read as spaces.
 */
export function normalizeSubject(subject: string): string {
  return subject.trim().toLowerCase().replace(/[_-]+/g, ' ').replace(/\s+/g, ' ');
}

const startGame: AckHandler = (message) => ({ type: 'game_started', message });

const collectClue: AckHandler = (message) => {
  const clue = extractClue(message.ackData);
  return clue === null ? { type: 'empty_clue', message } : { type: 'clue', clue, message };
};

const forward: AckHandler = (message) => ({ type: 'other', message });

/**
 * Subject → handler dispatch table.
 *
 * @example
 * ```typescript
 * const router = new AckRouter();
 * router.register('hint', (message) => ({ type: 'clue', clue: String(message.ackData), message }));
 * ```
 */
export class AckRouter {
  private readonly handlers = new Map<string, AckHandler>();

  constructor() {
    this.register(ACK_SUBJECTS.GAME_STARTED, startGame);
    this.register(ACK_SUBJECTS.META_DATA, collectClue);
    this.register('metadata', collectClue);
    this.register(ACK_SUBJECTS.GUESS_RECEIVED, forward);
    this.register(ACK_SUBJECTS.MOVE_RECEIVED, forward);
  }

  /**
   * Register or replace the handler for a subject.
   */
  register(subject: string, handler: AckHandler): void {
    this.handlers.set(normalizeSubject(subject), handler);
  }

  has(subject: string): boolean {
    return this.handlers.has(normalizeSubject(subject));
  }

  /**
   * Resolve the signal for an acknowledgment. Unknown subjects are forwarded
   * to the generic acknowledgment hook.
   */
  route(message: AcknowledgmentMessage): AckSignal {
    const handler = this.handlers.get(normalizeSubject(message.ackFor)) ?? forward;
    return handler(message);
  }
}
