import type { AiPlayer, Board, Difficulty } from '@tictactoe/engine';

export type GameMode = 'ai' | 'human';

export interface GameSession {
  id: string;
  mode: GameMode;
  difficulty: Difficulty | null;
  board: Board;
  ai: AiPlayer | null;
  updatedAt: number;
}

/**
 * Where the web service keeps its games. Each session owns its board; nothing
 * is shared between sessions.
 */
export interface SessionStore {
  get(id: string): GameSession | undefined;
  set(session: GameSession): void;
  delete(id: string): boolean;
  values(): Iterable<GameSession>;
  readonly size: number;
}

export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, GameSession>();

  get(id: string): GameSession | undefined {
    return this.sessions.get(id);
  }

  set(session: GameSession): void {
    this.sessions.set(session.id, session);
  }

  delete(id: string): boolean {
    return this.sessions.delete(id);
  }

  values(): Iterable<GameSession> {
    return this.sessions.values();
  }

  get size(): number {
    return this.sessions.size;
  }
}
