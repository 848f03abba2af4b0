/**
 * @fileoverview Agent runtime types: lifecycle phases, statistics, and the
 * strategy contract a concrete game implements.
 */

import type {
  AcknowledgmentMessage,
  CommandMessage,
  ErrorMessage,
  GameOutcome,
  GameStartMessage,
  MatchContext,
  OutboundPayload,
  ResultMessage,
} from '@turnkit/protocol';

/**
 * Agent lifecycle phase. Exactly one is current per agent.
 */
export type AgentPhase =
  | 'idle'
  | 'connecting'
  | 'connected'
  | 'playing'
  | 'game_over'
  | 'disconnected'
  | 'errored';

/**
 * Counters accumulated across games. Never decremented.
 */
export interface GameStats {
  readonly gamesPlayed: number;
  readonly gamesWon: number;
  readonly gamesLost: number;
  readonly totalMoves: number;
  readonly currentGameMoves: number;
  readonly gameStartedAt: Date | null;
  readonly gameEndedAt: Date | null;
}

/**
 * Either start signal: the `game started` acknowledgment or the legacy
 * game-start payload.
 */
export type StartMessage = AcknowledgmentMessage | GameStartMessage;

/**
 * Read-only view handed to every strategy callback.
 */
export interface GameContext {
  readonly phase: AgentPhase;
  /** Clues received since the last game start, oldest first */
  readonly clues: readonly string[];
  readonly match: MatchContext;
  readonly stats: GameStats;
}

/**
 * Context for move generation. `signal` aborts when the agent closes or the
 * connection carrying the command is lost.
 */
export interface MoveContext extends GameContext {
  readonly signal: AbortSignal;
}

/**
 * A move, or null/undefined for an explicit "no move".
 */
export type MoveResult<TMove> = TMove | null | undefined;

export type StrategyHookName =
  | 'onGameStarted'
  | 'onClueReceived'
  | 'onGameEnded'
  | 'onAcknowledgment'
  | 'onServerError'
  | 'onConnected'
  | 'onDisconnected'
  | 'onMoveError'
  | 'buildResponse';

/**
 * The capability set every game strategy provides.
 */
export interface GameStrategy<TMove = string> {
  /** A new game began; accumulated clues have been cleared. */
  onGameStarted(message: StartMessage, context: GameContext): void | Promise<void>;

  /** One newly extracted clue. `context.clues` already includes it. */
  onClueReceived(
    clue: string,
    message: AcknowledgmentMessage,
    context: GameContext
  ): void | Promise<void>;

  /**
   * Produce the move for one command. May suspend; called at most once at a
   * time per agent.
   */
  makeMove(
    message: CommandMessage,
    context: MoveContext
  ): MoveResult<TMove> | Promise<MoveResult<TMove>>;

  onGameEnded(message: ResultMessage, context: GameContext): void | Promise<void>;

  /**
   * Wire payload for a move. Returning null/undefined skips the command.
   * Defaults to echoing matchId, gameId, otp and `guess: move`.
   */
  buildResponse?(
    message: CommandMessage,
    move: TMove,
    context: GameContext
  ): OutboundPayload | null | undefined;

  /** Acknowledgments with subjects other than game start and clue. */
  onAcknowledgment?(message: AcknowledgmentMessage, context: GameContext): void | Promise<void>;

  onServerError?(message: ErrorMessage, context: GameContext): void | Promise<void>;

  onConnected?(): void | Promise<void>;

  onDisconnected?(): void | Promise<void>;

  /** `makeMove` or `buildResponse` failed; the command was skipped. */
  onMoveError?(error: Error, message: CommandMessage): void | Promise<void>;

  /** Any other callback failed. */
  onStrategyError?(error: Error, hook: StrategyHookName): void;
}

/**
 * Notifications the lifecycle machine emits on recognized transitions.
 */
export interface LifecycleObserver {
  onPhaseChange?(from: AgentPhase, to: AgentPhase, reason: string): void;
  onGameStarted?(at: Date): void;
  onMoveSent?(at: Date): void;
  onGameEnded?(outcome: GameOutcome, at: Date): void;
}
