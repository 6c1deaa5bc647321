import { BOARD_SIZE, type Board } from '@tictactoe/engine';
import type { Painter } from './colors.js';

export function renderBoard(board: Board, paint: Painter): string[] {
  const winning = new Set((board.winningLine() ?? []).map((m) => `${m.r}:${m.c}`));
  const header = Array.from({ length: BOARD_SIZE }, (_, c) => `${c}`).join('   ');
  const lines = [paint(`   ${header}`, 'yellow')];

  board.rows().forEach((row, r) => {
    const cells = row.map((cell, c) => {
      if (cell === null) {
        return ' ';
      }
      const styles = cell === 'X' ? (['red', 'bold'] as const) : (['blue', 'bold'] as const);
      return winning.has(`${r}:${c}`) ? paint(cell, ...styles, 'underline') : paint(cell, ...styles);
    });
    lines.push(`${paint(`${r}`, 'yellow')}  ${cells.join(paint(' | ', 'white'))}`);
    if (r < BOARD_SIZE - 1) {
      lines.push(paint('  ---|---|---', 'white'));
    }
  });

  return lines;
}
