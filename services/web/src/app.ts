import express, { type NextFunction, type Request, type Response } from 'express';
import { fileURLToPath } from 'node:url';
import { ZodError } from 'zod';
import { HttpError } from './errors.js';
import { GameService, MoveInput, NewGameInput } from './games.js';

export { GameService } from './games.js';
export type { GameView, GameServiceOptions } from './games.js';
export { InMemorySessionStore, type SessionStore, type GameSession } from './sessions.js';
export { GameNotFoundError, HttpError, InvalidMoveError } from './errors.js';
export { loadConfig, type ServerConfig } from './config.js';

const PUBLIC_DIR = fileURLToPath(new URL('../public', import.meta.url));

export function createApp(games: GameService): express.Express {
  const app = express();
  app.use(express.json());
  app.use(express.static(PUBLIC_DIR));

  app.get('/health', (_req, res) => res.json({ ok: true, sessions: games.sessionCount }));

  app.post('/api/games', (req, res) => {
    const view = games.createGame(NewGameInput.parse(req.body));
    res.status(201).json(view);
  });

  app.get('/api/games/:id', (req, res) => {
    res.json(games.getGame(req.params.id));
  });

  app.post('/api/games/:id/moves', (req, res) => {
    const move = MoveInput.parse(req.body);
    res.json(games.makeMove(req.params.id, move));
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ZodError) {
      res.status(400).json({ error: 'Invalid input', issues: err.issues });
      return;
    }
    if (err instanceof HttpError) {
      res.status(err.status).json({ error: err.message });
      return;
    }
    const status = clientErrorStatus(err);
    if (status !== null) {
      res.status(status).json({ error: isBodyParseError(err) ? 'Invalid JSON body' : 'Invalid request body' });
      return;
    }
    console.error('[server] Unhandled request error', err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

// express.json() reports unreadable bodies as errors carrying a 4xx `status`.
function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null || !('status' in err)) {
    return null;
  }
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

function isBodyParseError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}
