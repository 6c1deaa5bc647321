import { AiPlayer, Board, type Difficulty, type Move, type Outcome, type RandomSource } from '@tictactoe/engine';
import { createPainter, type Painter } from './colors.js';
import { parseChoice, parseMoveInput } from './input.js';
import type { Prompt } from './prompt.js';
import { renderBoard } from './render.js';

export { PromptClosedError, ReadlinePrompt, type Prompt } from './prompt.js';
export { parseMoveInput } from './input.js';
export { renderBoard } from './render.js';

type GameMode = 'human_vs_ai' | 'human_vs_human';

const MODES: Record<string, GameMode> = { '1': 'human_vs_ai', '2': 'human_vs_human' };
const DIFFICULTIES: Record<string, Difficulty> = { '1': 'easy', '2': 'medium', '3': 'hard' };
const ANSWERS: Record<string, boolean> = { y: true, yes: true, n: false, no: false };

export interface CliGameOptions {
  prompt: Prompt;
  color?: boolean;
  random?: RandomSource;
}

/** Interactive game loop: menus, move prompts, the computer's turns and the replay question. */
export class CliGame {
  readonly board = new Board();
  private readonly prompt: Prompt;
  private readonly paint: Painter;
  private readonly random?: RandomSource;

  constructor(options: CliGameOptions) {
    this.prompt = options.prompt;
    this.paint = createPainter(options.color ?? false);
    this.random = options.random;
  }

  async run(): Promise<void> {
    this.printTitle();
    for (;;) {
      await this.playOne();
      if (!(await this.askPlayAgain())) {
        break;
      }
      this.board.reset();
      this.printTitle();
    }
    this.prompt.print();
    this.prompt.print(this.paint('Thanks for playing! Goodbye!', 'cyan'));
  }

  private async playOne(): Promise<void> {
    const mode = await this.askMode();
    let ai: AiPlayer | null = null;

    this.prompt.print();
    if (mode === 'human_vs_ai') {
      const difficulty = await this.askDifficulty();
      ai = new AiPlayer({ difficulty, player: 'O', random: this.random });
      this.prompt.print(this.paint('Game started! You are X, Computer is O.', 'green'));
    } else {
      this.prompt.print(this.paint('Game started! Player 1 is X, Player 2 is O.', 'green'));
    }

    for (;;) {
      this.printBoard();
      const outcome = this.board.outcome();
      if (outcome !== 'ongoing') {
        this.printResult(outcome);
        return;
      }

      let move: Move;
      if (ai && this.board.current === ai.player) {
        this.prompt.print(this.paint('Computer is thinking...', 'magenta'));
        move = ai.chooseMove(this.board);
        this.prompt.print(this.paint(`Computer plays: ${move.r},${move.c}`, 'magenta'));
      } else {
        const label = ai ? 'You (X)' : this.board.current === 'X' ? 'Player 1 (X)' : 'Player 2 (O)';
        move = await this.askMove(label);
      }
      this.board.applyMove(move.r, move.c);
    }
  }

  private async askMode(): Promise<GameMode> {
    for (;;) {
      this.prompt.print();
      this.prompt.print(this.paint('Select Game Mode:', 'bold'));
      this.prompt.print(`${this.paint('1.', 'green')} Human vs Computer`);
      this.prompt.print(`${this.paint('2.', 'green')} Human vs Human`);
      const mode = parseChoice(await this.prompt.ask(this.paint('Enter your choice (1-2): ', 'cyan')), MODES);
      if (mode) {
        return mode;
      }
      this.prompt.print(this.paint('Invalid choice! Please enter 1 or 2.', 'red'));
    }
  }

  private async askDifficulty(): Promise<Difficulty> {
    for (;;) {
      this.prompt.print(this.paint('Select Difficulty:', 'bold'));
      this.prompt.print(`${this.paint('1.', 'green')} Easy (Random moves)`);
      this.prompt.print(`${this.paint('2.', 'yellow')} Medium (Basic strategy)`);
      this.prompt.print(`${this.paint('3.', 'red')} Hard (Unbeatable)`);
      const difficulty = parseChoice(await this.prompt.ask(this.paint('Enter difficulty (1-3): ', 'cyan')), DIFFICULTIES);
      if (difficulty) {
        return difficulty;
      }
      this.prompt.print(this.paint('Invalid choice! Please enter 1, 2, or 3.', 'red'));
    }
  }

  private async askMove(label: string): Promise<Move> {
    for (;;) {
      const answer = await this.prompt.ask(`${this.paint(`${label}'s turn`, 'bold')} (format: row,col or row col): `);
      const move = parseMoveInput(answer);
      if (!move) {
        this.prompt.print(this.paint('Invalid format! Please enter row,col (e.g., 1,2) or row col (e.g., 1 2).', 'red'));
        continue;
      }
      if (!this.board.isValidMove(move.r, move.c)) {
        this.prompt.print(this.paint('Invalid move! Cell is already occupied or out of bounds.', 'red'));
        continue;
      }
      return move;
    }
  }

  private async askPlayAgain(): Promise<boolean> {
    for (;;) {
      const again = parseChoice(await this.prompt.ask(this.paint('Play again? (y/n): ', 'cyan')), ANSWERS);
      if (again !== null) {
        return again;
      }
      this.prompt.print(this.paint("Please enter 'y' for yes or 'n' for no.", 'red'));
    }
  }

  private printTitle(): void {
    this.prompt.print(this.paint('==================================', 'cyan', 'bold'));
    this.prompt.print(this.paint('           TIC TAC TOE            ', 'cyan', 'bold'));
    this.prompt.print(this.paint('==================================', 'cyan', 'bold'));
  }

  private printBoard(): void {
    this.prompt.print();
    this.prompt.print(this.paint('Current Board:', 'bold'));
    for (const line of renderBoard(this.board, this.paint)) {
      this.prompt.print(line);
    }
  }

  private printResult(outcome: Exclude<Outcome, 'ongoing'>): void {
    this.prompt.print();
    switch (outcome) {
      case 'x_wins':
        this.prompt.print(this.paint('Player X wins!', 'green', 'bold'));
        break;
      case 'o_wins':
        this.prompt.print(this.paint('Player O wins!', 'green', 'bold'));
        break;
      case 'draw':
        this.prompt.print(this.paint("It's a draw!", 'yellow', 'bold'));
        break;
    }
  }
}
