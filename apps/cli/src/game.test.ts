import { beforeEach, describe, expect, test } from 'vitest';
import { CliGame } from './game.js';
import { PromptClosedError, type Prompt } from './prompt.js';

class ScriptedPrompt implements Prompt {
  readonly output: string[] = [];
  closed = false;

  constructor(private readonly answers: string[]) {}

  async ask(question: string): Promise<string> {
    this.output.push(question);
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new PromptClosedError();
    }
    return answer;
  }

  print(line = ''): void {
    this.output.push(line);
  }

  close(): void {
    this.closed = true;
  }

  count(line: string): number {
    return this.output.filter((entry) => entry === line).length;
  }
}

const INVALID_FORMAT = 'Invalid format! Please enter row,col (e.g., 1,2) or row col (e.g., 1 2).';
const INVALID_MOVE = 'Invalid move! Cell is already occupied or out of bounds.';

describe('CliGame', () => {
  let prompt: ScriptedPrompt;

  describe('two players', () => {
    beforeEach(() => {
      prompt = new ScriptedPrompt(['2', '0,0', '1,0', '0 1', '1 1', '0,2', 'n']);
    });

    test('plays a game to a win and says goodbye', async () => {
      const game = new CliGame({ prompt });
      await game.run();

      expect(prompt.count('Game started! Player 1 is X, Player 2 is O.')).toBe(1);
      expect(prompt.count('Player X wins!')).toBe(1);
      expect(prompt.output.at(-1)).toBe('Thanks for playing! Goodbye!');
      expect(game.board.outcome()).toBe('x_wins');
    });

    test('labels each player on their turn', async () => {
      await new CliGame({ prompt }).run();
      expect(prompt.count("Player 1 (X)'s turn (format: row,col or row col): ")).toBe(3);
      expect(prompt.count("Player 2 (O)'s turn (format: row,col or row col): ")).toBe(2);
    });
  });

  test('re-prompts on bad menu choices and bad moves', async () => {
    prompt = new ScriptedPrompt(['3', '1', '7', '3', 'abc', '1 1', '0,0', '5,5']);
    const game = new CliGame({ prompt });

    await expect(game.run()).rejects.toBeInstanceOf(PromptClosedError);

    expect(prompt.count('Invalid choice! Please enter 1 or 2.')).toBe(1);
    expect(prompt.count('Invalid choice! Please enter 1, 2, or 3.')).toBe(1);
    expect(prompt.count('Game started! You are X, Computer is O.')).toBe(1);
    expect(prompt.count(INVALID_FORMAT)).toBe(1);
    expect(prompt.count('Computer plays: 0,0')).toBe(1);
    expect(prompt.count(INVALID_MOVE)).toBe(2);
    expect(game.board.cell(1, 1)).toBe('X');
    expect(game.board.cell(0, 0)).toBe('O');
    expect(game.board.current).toBe('X');
  });

  test('resets the board for another game', async () => {
    prompt = new ScriptedPrompt([
      '2',
      '0,0', '0,1', '0,2', '1,1', '1,0', '1,2', '2,1', '2,0', '2,2',
      'maybe',
      'y',
      '2',
      '0,0',
    ]);
    const game = new CliGame({ prompt });

    await expect(game.run()).rejects.toBeInstanceOf(PromptClosedError);

    expect(prompt.count("It's a draw!")).toBe(1);
    expect(prompt.count("Please enter 'y' for yes or 'n' for no.")).toBe(1);
    expect(prompt.count('Game started! Player 1 is X, Player 2 is O.')).toBe(2);
    expect(prompt.count(INVALID_MOVE)).toBe(0);
    expect(game.board.cell(0, 0)).toBe('X');
    expect(game.board.emptyCells()).toHaveLength(8);
  });

  test('the computer finishes the game when it can', async () => {
    // Easy with a fixed random source always takes the first free cell.
    prompt = new ScriptedPrompt(['1', '1', '2,2', '2,1', '1,0', 'n']);
    const game = new CliGame({ prompt, random: () => 0 });

    await game.run();

    expect(prompt.output).toContain('Computer plays: 0,0');
    expect(prompt.output).toContain('Computer plays: 0,1');
    expect(prompt.output).toContain('Computer plays: 0,2');
    expect(prompt.count('Player O wins!')).toBe(1);
  });
});
