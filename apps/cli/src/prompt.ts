import { createInterface, type Interface } from 'node:readline/promises';

export class PromptClosedError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'PromptClosedError';
  }
}

/** Line-based terminal I/O the game loop talks to. */
export interface Prompt {
  ask(question: string): Promise<string>;
  print(line?: string): void;
  close(): void;
}

export class ReadlinePrompt implements Prompt {
  private readonly rl: Interface;
  private closed = false;
  private rejectPending: ((err: Error) => void) | null = null;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = createInterface({ input, output });
    this.rl.on('SIGINT', () => this.rl.close());
    this.rl.on('close', () => {
      this.closed = true;
      this.rejectPending?.(new PromptClosedError());
      this.rejectPending = null;
    });
  }

  ask(question: string): Promise<string> {
    if (this.closed) {
      return Promise.reject(new PromptClosedError());
    }
    return new Promise<string>((resolve, reject) => {
      this.rejectPending = reject;
      this.rl.question(question).then(
        (answer) => {
          this.rejectPending = null;
          resolve(answer);
        },
        (err: unknown) => {
          this.rejectPending = null;
          reject(this.closed ? new PromptClosedError() : err);
        }
      );
    });
  }

  print(line = ''): void {
    this.output.write(`${line}\n`);
  }

  close(): void {
    if (!this.closed) {
      this.rl.close();
    }
  }
}
