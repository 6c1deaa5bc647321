import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { CliGame } from './game.js';
import { PromptClosedError, ReadlinePrompt } from './prompt.js';

const PackageJson = z.object({ version: z.string() });

function readVersion(): string {
  const raw = readFileSync(new URL('../package.json', import.meta.url), 'utf8');
  return PackageJson.parse(JSON.parse(raw)).version;
}

const args = process.argv.slice(2);
let color = Boolean(process.stdout.isTTY) && !process.env.NO_COLOR;

for (const arg of args) {
  if (arg === '--help' || arg === '-h') {
    console.log(`
Tic Tac Toe - a classic game with AI opponents

Usage: npm run start:cli -- [options]

Options:
  --no-color       Disable coloured output
  -v, --version    Print the version and exit
  -h, --help       Show this help message

Modes:
  Human vs Human, or Human vs Computer at Easy, Medium or Hard.
`);
    process.exit(0);
  } else if (arg === '--version' || arg === '-v') {
    console.log(`Tic Tac Toe v${readVersion()}`);
    process.exit(0);
  } else if (arg === '--no-color') {
    color = false;
  } else {
    console.error(`[cli] Unknown option: ${arg}`);
    process.exit(2);
  }
}

const prompt = new ReadlinePrompt();
const game = new CliGame({ prompt, color });

game
  .run()
  .then(() => {
    prompt.close();
  })
  .catch((err: unknown) => {
    prompt.close();
    if (err instanceof PromptClosedError) {
      console.log('\nGame interrupted. Goodbye!');
      return;
    }
    console.error('[cli] Unexpected error', err);
    process.exitCode = 1;
  });
