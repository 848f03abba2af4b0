/**
 * @fileoverview Keyword-driven Cluedle strategy.
 *
 * Cluedle is a riddle game: the server sends clues as `meta data`
 * acknowledgments and then asks for a guess. This strategy matches the
 * accumulated clues against keyword rules and answers with the first rule
 * that fits.
 */

import {
  createLogger,
  InvalidAgentConfigError,
  type GameContext,
  type GameStrategy,
  type MoveContext,
  type StartMessage,
} from '@turnkit/agent';
import type { AcknowledgmentMessage, CommandMessage, ResultMessage } from '@turnkit/protocol';
import { z } from 'zod';

export const KeywordRuleSchema = z
  .object({
    answer: z.string().trim().min(1),
    /** Every keyword must appear in the clues */
    allOf: z.array(z.string().trim().min(1)).default([]),
    /** At least one keyword must appear (ignored when empty) */
    anyOf: z.array(z.string().trim().min(1)).default([]),
  })
  .refine((rule) => rule.allOf.length + rule.anyOf.length > 0, {
    message: 'a rule needs at least one keyword',
  });

export type KeywordRule = z.output<typeof KeywordRuleSchema>;

export const DEFAULT_RULES: readonly KeywordRule[] = [
  { answer: 'anthropic', allOf: ['claude', 'ai'], anyOf: [] },
  { answer: 'openai', allOf: [], anyOf: ['chatgpt', 'gpt'] },
  { answer: 'google', allOf: [], anyOf: ['gemini', 'bard'] },
];

export const KeywordStrategyConfigSchema = z.object({
  rules: z.array(KeywordRuleSchema).default([...DEFAULT_RULES]),
  /** Answer when no rule matches */
  fallback: z.string().trim().min(1).default('anthropic'),
});

export type KeywordStrategyConfigInput = z.input<typeof KeywordStrategyConfigSchema>;
export type KeywordStrategyConfig = z.output<typeof KeywordStrategyConfigSchema>;

function ruleMatches(rule: KeywordRule, text: string): boolean {
  const contains = (keyword: string): boolean => text.includes(keyword.toLowerCase());
  return rule.allOf.every(contains) && (rule.anyOf.length === 0 || rule.anyOf.some(contains));
}

/**
 * Pick the answer for a set of clues. Keywords match anywhere in the
 * lowercased, space-joined clue text.
 */
export function solveClues(
  clues: readonly string[],
  rules: readonly KeywordRule[] = DEFAULT_RULES,
  fallback = 'anthropic'
): string {
  const text = clues.join(' ').toLowerCase();
  return rules.find((rule) => ruleMatches(rule, text))?.answer ?? fallback;
}

export class KeywordCluedleStrategy implements GameStrategy<string> {
  readonly config: KeywordStrategyConfig;
  private readonly log = createLogger('cluedle');
  private guesses: string[] = [];

  constructor(config: KeywordStrategyConfigInput = {}) {
    const result = KeywordStrategyConfigSchema.safeParse(config);
    if (!result.success) {
      throw new InvalidAgentConfigError(result.error.issues);
    }
    this.config = result.data;
  }

  /** Guesses sent in the current game */
  get guessHistory(): readonly string[] {
    return this.guesses;
  }

  onGameStarted(message: StartMessage): void {
    this.guesses = [];
    this.log.info('Cluedle game started', { gameId: message.gameId });
  }

  onClueReceived(clue: string, _message: AcknowledgmentMessage, context: GameContext): void {
    this.log.info('Clue', { number: context.clues.length, clue });
  }

  makeMove(message: CommandMessage, context: MoveContext): string {
    const guess = solveClues(context.clues, this.config.rules, this.config.fallback);
    this.guesses.push(guess);
    this.log.info('Guessing', { command: message.command, guess, clues: context.clues.length });
    return guess;
  }

  onGameEnded(message: ResultMessage, context: GameContext): void {
    this.log.info('Cluedle game over', {
      outcome: message.outcome,
      answer: message.answer,
      clues: context.clues.length,
      guesses: this.guesses,
    });
  }
}
