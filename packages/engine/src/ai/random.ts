import type { Board } from '../board.js';
import type { Move, RandomSource } from '../types.js';

export function randomMove(board: Board, random: RandomSource = Math.random): Move | null {
  const moves = board.emptyCells();
  if (moves.length === 0) {
    return null;
  }
  const index = Math.min(Math.floor(random() * moves.length), moves.length - 1);
  return moves[index];
}
