import { nextPlayer, outcomeForWinner, type Board } from '../board.js';
import type { Move, Player, RandomSource } from '../types.js';
import { randomMove } from './random.js';

const CENTER: Move = { r: 1, c: 1 };

/** First empty cell, in row-major order, on which `player` completes a line. */
export function findWinningMove(board: Board, player: Player): Move | null {
  const target = outcomeForWinner(player);
  for (const move of board.emptyCells()) {
    if (board.place(move.r, move.c, player).outcome() === target) {
      return move;
    }
  }
  return null;
}

/**
 * Win if possible, otherwise block, otherwise take the centre, otherwise play
 * anywhere.
 */
export function heuristicMove(board: Board, forPlayer: Player, random: RandomSource = Math.random): Move | null {
  const opponent = nextPlayer(forPlayer);

  const win = findWinningMove(board, forPlayer);
  if (win) {
    return win;
  }

  const block = findWinningMove(board, opponent);
  if (block) {
    return block;
  }

  if (board.isValidMove(CENTER.r, CENTER.c)) {
    return { ...CENTER };
  }

  return randomMove(board, random);
}
