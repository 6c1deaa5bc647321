import { nextPlayer, type Board } from '../board.js';
import type { Move, Player } from '../types.js';

const WIN_SCORE = 1;
const LOSS_SCORE = -1;
const DRAW_SCORE = 0;

/**
 * Scores a position from `forPlayer`'s point of view by searching every line
 * of play to the end. No pruning and no transposition table: the 3x3 tree is
 * small enough to walk in full.
 */
export function minimax(board: Board, forPlayer: Player, isAiTurn: boolean): number {
  const outcome = board.outcome();
  if (outcome === 'draw') {
    return DRAW_SCORE;
  }
  if (outcome !== 'ongoing') {
    return board.winner() === forPlayer ? WIN_SCORE : LOSS_SCORE;
  }

  const mover = isAiTurn ? forPlayer : nextPlayer(forPlayer);
  let best = isAiTurn ? -Infinity : Infinity;
  for (const move of board.emptyCells()) {
    const score = minimax(board.place(move.r, move.c, mover), forPlayer, !isAiTurn);
    best = isAiTurn ? Math.max(best, score) : Math.min(best, score);
  }
  return best;
}

/**
 * Highest-scoring move for `forPlayer`. Ties go to the first move in row-major
 * order, so the result is deterministic for a given board.
 */
export function bestMove(board: Board, forPlayer: Player): Move | null {
  let best: Move | null = null;
  let bestScore = -Infinity;

  for (const move of board.emptyCells()) {
    const score = minimax(board.place(move.r, move.c, forPlayer), forPlayer, false);
    if (score > bestScore) {
      bestScore = score;
      best = move;
    }
  }

  return best;
}
