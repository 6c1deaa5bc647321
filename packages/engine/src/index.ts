export * from './types.js';
export {
  Board,
  BOARD_SIZE,
  inBounds,
  isTerminal,
  nextPlayer,
  outcomeForWinner,
} from './board.js';
export { AiPlayer, type AiPlayerOptions } from './ai/player.js';
export { randomMove } from './ai/random.js';
export { findWinningMove, heuristicMove } from './ai/heuristics.js';
export { bestMove, minimax } from './ai/minimax.js';
