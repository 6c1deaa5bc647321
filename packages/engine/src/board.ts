import type { Cell, Move, Outcome, Player } from './types.js';

export const BOARD_SIZE = 3;

// Rows, then columns, then the two diagonals.
const LINES: ReadonlyArray<readonly [Move, Move, Move]> = [
  [{ r: 0, c: 0 }, { r: 0, c: 1 }, { r: 0, c: 2 }],
  [{ r: 1, c: 0 }, { r: 1, c: 1 }, { r: 1, c: 2 }],
  [{ r: 2, c: 0 }, { r: 2, c: 1 }, { r: 2, c: 2 }],
  [{ r: 0, c: 0 }, { r: 1, c: 0 }, { r: 2, c: 0 }],
  [{ r: 0, c: 1 }, { r: 1, c: 1 }, { r: 2, c: 1 }],
  [{ r: 0, c: 2 }, { r: 1, c: 2 }, { r: 2, c: 2 }],
  [{ r: 0, c: 0 }, { r: 1, c: 1 }, { r: 2, c: 2 }],
  [{ r: 0, c: 2 }, { r: 1, c: 1 }, { r: 2, c: 0 }],
];

function createGrid(): Cell[][] {
  return Array.from({ length: BOARD_SIZE }, () => Array<Cell>(BOARD_SIZE).fill(null));
}

function cloneGrid(grid: Cell[][]): Cell[][] {
  return grid.map((row) => row.slice());
}

export function inBounds(r: number, c: number): boolean {
  return Number.isInteger(r) && Number.isInteger(c) && r >= 0 && c >= 0 && r < BOARD_SIZE && c < BOARD_SIZE;
}

export function nextPlayer(p: Player): Player {
  return p === 'X' ? 'O' : 'X';
}

export function outcomeForWinner(p: Player): Outcome {
  return p === 'X' ? 'x_wins' : 'o_wins';
}

export function isTerminal(outcome: Outcome): boolean {
  return outcome !== 'ongoing';
}

/**
 * A 3x3 grid plus the player to move.
 *
 * The grid only changes through {@link Board.applyMove} and {@link Board.reset};
 * the outcome is recomputed from the grid on every call.
 */
export class Board {
  private grid: Cell[][] = createGrid();
  private turn: Player = 'X';

  /**
   * Builds a board from explicit rows. Used to set up positions that did not
   * arise from alternating play, so the grid is not checked for reachability.
   */
  static fromRows(rows: Cell[][], current: Player = 'X'): Board {
    if (rows.length !== BOARD_SIZE || rows.some((row) => row.length !== BOARD_SIZE)) {
      throw new Error(`Board must be ${BOARD_SIZE}x${BOARD_SIZE}`);
    }
    const board = new Board();
    board.grid = cloneGrid(rows);
    board.turn = current;
    return board;
  }

  get current(): Player {
    return this.turn;
  }

  cell(r: number, c: number): Cell {
    return inBounds(r, c) ? this.grid[r][c] : null;
  }

  rows(): Cell[][] {
    return cloneGrid(this.grid);
  }

  isValidMove(r: number, c: number): boolean {
    return inBounds(r, c) && this.grid[r][c] === null;
  }

  applyMove(r: number, c: number): boolean {
    if (!this.isValidMove(r, c)) {
      return false;
    }
    this.grid[r][c] = this.turn;
    this.turn = nextPlayer(this.turn);
    return true;
  }

  emptyCells(): Move[] {
    const out: Move[] = [];
    for (let r = 0; r < BOARD_SIZE; r++) {
      for (let c = 0; c < BOARD_SIZE; c++) {
        if (this.grid[r][c] === null) out.push({ r, c });
      }
    }
    return out;
  }

  winningLine(): Move[] | null {
    for (const line of LINES) {
      const [a, b, c] = line;
      const first = this.grid[a.r][a.c];
      if (first !== null && first === this.grid[b.r][b.c] && first === this.grid[c.r][c.c]) {
        return line.map((m) => ({ r: m.r, c: m.c }));
      }
    }
    return null;
  }

  winner(): Player | null {
    const line = this.winningLine();
    if (!line) {
      return null;
    }
    return this.grid[line[0].r][line[0].c];
  }

  outcome(): Outcome {
    const winner = this.winner();
    if (winner) {
      return outcomeForWinner(winner);
    }
    if (this.emptyCells().length === 0) return 'draw';
    return 'ongoing';
  }

  clone(): Board {
    return Board.fromRows(this.grid, this.turn);
  }

  reset(): void {
    this.grid = createGrid();
    this.turn = 'X';
  }

  /** Places a mark without touching the turn; used by search to explore positions. */
  place(r: number, c: number, p: Player): Board {
    const next = this.clone();
    next.grid[r][c] = p;
    return next;
  }
}
