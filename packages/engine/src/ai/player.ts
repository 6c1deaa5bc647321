import type { Board } from '../board.js';
import type { Difficulty, Move, Player, RandomSource } from '../types.js';
import { heuristicMove } from './heuristics.js';
import { bestMove } from './minimax.js';
import { randomMove } from './random.js';

export interface AiPlayerOptions {
  difficulty: Difficulty;
  player: Player;
  random?: RandomSource;
}

export class AiPlayer {
  readonly difficulty: Difficulty;
  readonly player: Player;
  private readonly random: RandomSource;

  constructor(options: AiPlayerOptions) {
    this.difficulty = options.difficulty;
    this.player = options.player;
    this.random = options.random ?? Math.random;
  }

  /**
   * Picks the next move for {@link AiPlayer.player}. The board must still be
   * in play; checking that is the caller's job.
   */
  chooseMove(board: Board): Move {
    if (board.outcome() !== 'ongoing') {
      throw new Error('No legal moves available');
    }
    const move = this.select(board);
    if (!move) {
      throw new Error('No legal moves available');
    }
    return move;
  }

  private select(board: Board): Move | null {
    switch (this.difficulty) {
      case 'hard':
        return bestMove(board, this.player);
      case 'medium':
        return heuristicMove(board, this.player, this.random);
      case 'easy':
      default:
        return randomMove(board, this.random);
    }
  }
}
