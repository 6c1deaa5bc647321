import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import { AiPlayer, Board } from '@tictactoe/engine';
import type { Cell, Difficulty, Move, Outcome, Player } from '@tictactoe/engine';
import { GameNotFoundError, InvalidMoveError } from './errors.js';
import type { GameMode, GameSession, SessionStore } from './sessions.js';

const AI_MARK: Player = 'O';

export const NewGameInput = z.object({
  mode: z.enum(['ai', 'human']),
  difficulty: z.enum(['easy', 'medium', 'hard']).default('easy'),
});

const Coordinate = z.number().int().min(0).max(2);

export const MoveInput = z.object({
  r: Coordinate,
  c: Coordinate,
});

export type NewGameRequest = z.input<typeof NewGameInput>;
export type MoveRequest = z.infer<typeof MoveInput>;

export interface GameView {
  gameId: string;
  mode: GameMode;
  difficulty: Difficulty | null;
  board: Cell[][];
  currentPlayer: Player;
  outcome: Outcome;
  winningLine: Move[] | null;
  aiMove?: Move;
}

export interface GameServiceOptions {
  sessionTtlMs: number;
  now?: () => number;
  random?: () => number;
}

export class GameService {
  private readonly now: () => number;

  constructor(
    private readonly store: SessionStore,
    private readonly options: GameServiceOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  get sessionCount(): number {
    return this.store.size;
  }

  createGame(request: NewGameRequest): GameView {
    const { mode, difficulty } = NewGameInput.parse(request);
    const session: GameSession = {
      id: uuidv4(),
      mode,
      difficulty: mode === 'ai' ? difficulty : null,
      board: new Board(),
      ai: mode === 'ai' ? new AiPlayer({ difficulty, player: AI_MARK, random: this.options.random }) : null,
      updatedAt: this.now(),
    };
    this.store.set(session);
    console.info('[games] Created game', { gameId: session.id, mode, difficulty: session.difficulty });
    return toView(session);
  }

  getGame(id: string): GameView {
    const session = this.requireSession(id);
    session.updatedAt = this.now();
    return toView(session);
  }

  makeMove(id: string, request: MoveRequest): GameView {
    const session = this.requireSession(id);
    const { r, c } = MoveInput.parse(request);
    const { board, ai } = session;

    if (board.outcome() !== 'ongoing') {
      throw new InvalidMoveError('Game is already over');
    }
    if (!board.applyMove(r, c)) {
      throw new InvalidMoveError();
    }
    session.updatedAt = this.now();

    if (!ai || board.outcome() !== 'ongoing' || board.current !== ai.player) {
      return toView(session);
    }

    const aiMove = ai.chooseMove(board);
    board.applyMove(aiMove.r, aiMove.c);
    console.info('[games] AI moved', { gameId: id, difficulty: ai.difficulty, move: aiMove });
    return { ...toView(session), aiMove };
  }

  /** Drops sessions that have not been touched within the TTL. */
  pruneIdle(): number {
    const cutoff = this.now() - this.options.sessionTtlMs;
    const stale: string[] = [];
    for (const session of this.store.values()) {
      if (session.updatedAt < cutoff) {
        stale.push(session.id);
      }
    }
    for (const id of stale) {
      this.store.delete(id);
    }
    if (stale.length > 0) {
      console.info('[games] Pruned idle sessions', { count: stale.length, remaining: this.store.size });
    }
    return stale.length;
  }

  private requireSession(id: string): GameSession {
    const session = this.store.get(id);
    if (!session) {
      throw new GameNotFoundError(id);
    }
    return session;
  }
}

function toView(session: GameSession): GameView {
  const { board } = session;
  return {
    gameId: session.id,
    mode: session.mode,
    difficulty: session.difficulty,
    board: board.rows(),
    currentPlayer: board.current,
    outcome: board.outcome(),
    winningLine: board.winningLine(),
  };
}
