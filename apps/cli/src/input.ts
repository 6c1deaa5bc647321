import type { Move } from '@tictactoe/engine';

const INTEGER = /^-?\d+$/;

/**
 * Reads a move typed as "row,col" or "row col". Range and occupancy are left
 * to the board.
 */
export function parseMoveInput(text: string): Move | null {
  const trimmed = text.trim();
  const parts = trimmed.includes(',') ? trimmed.split(',') : trimmed.split(/\s+/);
  if (parts.length !== 2) {
    return null;
  }
  const [r, c] = parts.map((part) => part.trim());
  if (!INTEGER.test(r) || !INTEGER.test(c)) {
    return null;
  }
  return { r: Number(r), c: Number(c) };
}

export type MenuChoice<T> = Record<string, T>;

export function parseChoice<T>(text: string, choices: MenuChoice<T>): T | null {
  const key = text.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(choices, key) ? choices[key] : null;
}
