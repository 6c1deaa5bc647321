export type Player = 'X' | 'O';
export type Cell = Player | null;

export type Outcome = 'ongoing' | 'x_wins' | 'o_wins' | 'draw';

export type Difficulty = 'easy' | 'medium' | 'hard';

export interface Move {
  r: number;
  c: number;
}

/** Source of uniform numbers in [0, 1). */
export type RandomSource = () => number;
