/**
 * @fileoverview Statistics recorder.
 *
 * Observes lifecycle transitions and keeps the counters. Totals only ever
 * grow; `currentGameMoves` resets when a game starts.
 */

import type { GameOutcome } from '@turnkit/protocol';
import type { GameStats, LifecycleObserver } from './types.js';

const LOSING_OUTCOMES: ReadonlySet<GameOutcome> = new Set<GameOutcome>([
  'loss',
  'timeout',
  'abandoned',
]);

export const INITIAL_STATS: GameStats = Object.freeze({
  gamesPlayed: 0,
  gamesWon: 0,
  gamesLost: 0,
  totalMoves: 0,
  currentGameMoves: 0,
  gameStartedAt: null,
  gameEndedAt: null,
});

export class StatsRecorder implements LifecycleObserver {
  private stats: GameStats = INITIAL_STATS;

  onGameStarted(at: Date): void {
    this.update({ currentGameMoves: 0, gameStartedAt: at, gameEndedAt: null });
  }

  onMoveSent(): void {
    this.update({
      currentGameMoves: this.stats.currentGameMoves + 1,
      totalMoves: this.stats.totalMoves + 1,
    });
  }

  onGameEnded(outcome: GameOutcome, at: Date): void {
    this.update({
      gamesPlayed: this.stats.gamesPlayed + 1,
      gamesWon: this.stats.gamesWon + (outcome === 'win' ? 1 : 0),
      gamesLost: this.stats.gamesLost + (LOSING_OUTCOMES.has(outcome) ? 1 : 0),
      gameEndedAt: at,
    });
  }

  /**
   * Frozen copy of the current counters.
   */
  snapshot(): GameStats {
    return this.stats;
  }

  private update(changes: Partial<GameStats>): void {
    this.stats = Object.freeze({ ...this.stats, ...changes });
  }
}

export interface StatsSummary {
  readonly gamesPlayed: number;
  readonly gamesWon: number;
  readonly gamesLost: number;
  /** Percentage of games won, 0-100 */
  readonly winRate: number;
  readonly averageMovesPerGame: number;
  /** Duration of the most recent game, when both endpoints are known */
  readonly lastGameDurationMs: number | null;
}

export function summarizeStats(stats: GameStats): StatsSummary {
  const played = stats.gamesPlayed;
  const started = stats.gameStartedAt;
  const ended = stats.gameEndedAt;
  return {
    gamesPlayed: played,
    gamesWon: stats.gamesWon,
    gamesLost: stats.gamesLost,
    winRate: played > 0 ? (stats.gamesWon / played) * 100 : 0,
    averageMovesPerGame: played > 0 ? stats.totalMoves / played : 0,
    lastGameDurationMs:
      started !== null && ended !== null && ended >= started
        ? ended.getTime() - started.getTime()
        : null,
  };
}
