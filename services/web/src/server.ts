import 'dotenv/config';
import type { Server } from 'node:http';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { GameService } from './games.js';
import { InMemorySessionStore } from './sessions.js';

const config = loadConfig();
const games = new GameService(new InMemorySessionStore(), { sessionTtlMs: config.sessionTtlMs });
const app = createApp(games);

let httpServer: Server | null = null;
let sweepTimer: ReturnType<typeof setInterval> | null = null;
let shuttingDown = false;

function startServer() {
  httpServer = app.listen(config.port, config.host, () => {
    const address = httpServer?.address();
    if (!address || typeof address === 'string') {
      console.info(`[server] Tic-tac-toe listening on port ${config.port}`);
      return;
    }
    const { address: host, port } = address;
    const displayHost = host === '::' || host === '0.0.0.0' ? 'localhost' : host;
    console.info(`[server] Tic-tac-toe listening on http://${displayHost}:${port}`);
  });

  httpServer.on('error', (err: NodeJS.ErrnoException) => {
    if (err.code === 'EADDRINUSE') {
      console.error(`[server] Port ${config.port} is already in use. Stop the other process or set PORT to an available value.`);
    } else {
      console.error('[server] HTTP server error', err);
    }
    shutdown('HTTP server failed to start', 1).catch(() => process.exit(1));
  });

  sweepTimer = setInterval(() => {
    games.pruneIdle();
  }, config.sweepIntervalMs);
  sweepTimer.unref();
}

/** Stops the idle sweep and waits for open connections to finish. */
async function closeServer(): Promise<void> {
  if (sweepTimer) {
    clearInterval(sweepTimer);
    sweepTimer = null;
  }
  const server = httpServer;
  httpServer = null;
  if (!server) {
    return;
  }
  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

async function shutdown(reason: string, exitCode = 0) {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  console.info(`[server] ${reason}`, { sessions: games.sessionCount });

  const code = await closeServer().then(
    () => exitCode,
    (err: unknown) => {
      console.warn('[server] Error while closing HTTP server', err);
      return exitCode || 1;
    }
  );
  process.exit(code);
}

const handleSignal = (signal: NodeJS.Signals) => {
  shutdown(`Received ${signal}, shutting down...`).catch((err) => {
    console.error('[server] Error while shutting down', err);
    process.exit(1);
  });
};

process.once('SIGINT', handleSignal);
process.once('SIGTERM', handleSignal);

startServer();
