import { describe, expect, test } from 'vitest';
import { Board } from '../board.js';
import type { Cell, Outcome, Player } from '../types.js';
import { AiPlayer } from './player.js';

const _ = null;

function boardWithEmpties(empties: number): Board {
  for (;;) {
    const board = new Board();
    while (board.emptyCells().length > empties && board.outcome() === 'ongoing') {
      const moves = board.emptyCells();
      const move = moves[Math.floor(Math.random() * moves.length)];
      board.applyMove(move.r, move.c);
    }
    if (board.outcome() === 'ongoing') {
      return board;
    }
  }
}

/** Plays every possible line for the side the AI is not playing and collects the outcomes. */
function reachableOutcomes(board: Board, ai: AiPlayer, seen: Set<Outcome>): Set<Outcome> {
  const outcome = board.outcome();
  if (outcome !== 'ongoing') {
    seen.add(outcome);
    return seen;
  }
  if (board.current === ai.player) {
    const move = ai.chooseMove(board);
    const next = board.clone();
    expect(next.applyMove(move.r, move.c)).toBe(true);
    return reachableOutcomes(next, ai, seen);
  }
  for (const move of board.emptyCells()) {
    const next = board.clone();
    next.applyMove(move.r, move.c);
    reachableOutcomes(next, ai, seen);
  }
  return seen;
}

describe('easy', () => {
  test('always picks a valid cell', () => {
    const ai = new AiPlayer({ difficulty: 'easy', player: 'O' });
    for (let empties = 1; empties <= 9; empties++) {
      for (let trial = 0; trial < 25; trial++) {
        const board = boardWithEmpties(empties);
        const move = ai.chooseMove(board);
        expect(board.isValidMove(move.r, move.c)).toBe(true);
      }
    }
  });

  test('maps the random source onto the empty cells', () => {
    const board = Board.fromRows([
      ['X', 'O', 'X'],
      [_, 'O', _],
      ['X', _, _],
    ]);
    expect(new AiPlayer({ difficulty: 'easy', player: 'O', random: () => 0 }).chooseMove(board)).toEqual({ r: 1, c: 0 });
    expect(new AiPlayer({ difficulty: 'easy', player: 'O', random: () => 0.99 }).chooseMove(board)).toEqual({ r: 2, c: 2 });
  });
});

describe('medium', () => {
  const medium = (player: Player, random?: () => number) => new AiPlayer({ difficulty: 'medium', player, random });

  test('takes an immediate win', () => {
    const board = Board.fromRows(
      [
        ['O', 'O', _],
        [_, _, _],
        [_, _, _],
      ],
      'O'
    );
    expect(medium('O').chooseMove(board)).toEqual({ r: 0, c: 2 });
  });

  test('blocks the opponent', () => {
    const board = Board.fromRows(
      [
        ['X', 'X', _],
        [_, _, _],
        [_, _, _],
      ],
      'O'
    );
    expect(medium('O').chooseMove(board)).toEqual({ r: 0, c: 2 });
  });

  test('blocks O when playing X', () => {
    const board = Board.fromRows(
      [
        ['O', 'O', _],
        ['X', _, _],
        [_, _, 'X'],
      ],
      'X'
    );
    expect(medium('X').chooseMove(board)).toEqual({ r: 0, c: 2 });
  });

  test('prefers winning over blocking', () => {
    const board = Board.fromRows(
      [
        ['O', 'O', _],
        ['X', 'X', _],
        ['X', _, _],
      ],
      'O'
    );
    expect(medium('O').chooseMove(board)).toEqual({ r: 0, c: 2 });
  });

  test('takes the centre when nothing is urgent', () => {
    const board = Board.fromRows(
      [
        ['X', _, _],
        [_, _, _],
        [_, _, _],
      ],
      'O'
    );
    expect(medium('O', () => 0.99).chooseMove(board)).toEqual({ r: 1, c: 1 });
  });

  test('falls back to a random cell', () => {
    const board = Board.fromRows(
      [
        [_, _, _],
        [_, 'X', _],
        [_, _, _],
      ],
      'O'
    );
    expect(medium('O', () => 0).chooseMove(board)).toEqual({ r: 0, c: 0 });
  });
});

describe('hard', () => {
  const hard = (player: Player) => new AiPlayer({ difficulty: 'hard', player });

  test('opens in the first corner on an empty board', () => {
    expect(hard('X').chooseMove(new Board())).toEqual({ r: 0, c: 0 });
  }, 30_000);

  test('answers a centre opening with a corner', () => {
    const board = new Board();
    board.applyMove(1, 1);
    expect(hard('O').chooseMove(board)).toEqual({ r: 0, c: 0 });
  });

  test('finishes a line when it can', () => {
    const rows: Cell[][] = [
      ['O', 'O', _],
      ['X', 'X', _],
      ['X', _, _],
    ];
    expect(hard('O').chooseMove(Board.fromRows(rows, 'O'))).toEqual({ r: 0, c: 2 });
  });

  test('blocks a threat', () => {
    const rows: Cell[][] = [
      [_, _, 'X'],
      [_, 'O', 'X'],
      [_, _, _],
    ];
    expect(hard('O').chooseMove(Board.fromRows(rows, 'O'))).toEqual({ r: 2, c: 2 });
  });

  test('is deterministic', () => {
    const board = new Board();
    board.applyMove(0, 1);
    const first = hard('O').chooseMove(board);
    for (let i = 0; i < 3; i++) {
      expect(hard('O').chooseMove(board)).toEqual(first);
    }
  });

  test('never loses as O against any sequence of replies', () => {
    const outcomes = reachableOutcomes(new Board(), hard('O'), new Set());
    expect(outcomes.has('x_wins')).toBe(false);
    expect(outcomes.has('draw')).toBe(true);
  }, 60_000);

  test('never loses as X against any sequence of replies', () => {
    const outcomes = reachableOutcomes(new Board(), hard('X'), new Set());
    expect(outcomes.has('o_wins')).toBe(false);
    expect(outcomes.has('x_wins')).toBe(true);
  }, 60_000);
});

test('refuses to move on a finished board', () => {
  const board = Board.fromRows([
    ['X', 'X', 'X'],
    ['O', 'O', _],
    [_, _, _],
  ]);
  expect(() => new AiPlayer({ difficulty: 'hard', player: 'O' }).chooseMove(board)).toThrow('No legal moves available');
});
