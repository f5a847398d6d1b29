import { Cell, type Board } from '../src/index.js';

const CHARS: Record<string, Cell> = {
  '.': Cell.Empty,
  M: Cell.Maximizer,
  m: Cell.Minimizer,
};

/** Builds a board from three row strings: 'M' Maximizer, 'm' Minimizer, '.' empty. */
export function boardOf(rows: [string, string, string]): Board {
  return rows.map((row) =>
    row.split('').map((ch) => {
      const cell = CHARS[ch];
      if (cell === undefined) throw new Error(`Unknown cell character: ${ch}`);
      return cell;
    })
  );
}

const SYMBOLS: Record<Cell, string> = {
  [Cell.Empty]: '.',
  [Cell.Maximizer]: 'M',
  [Cell.Minimizer]: 'm',
};

export function keyOf(board: Board): string {
  return board.map((row) => row.map((cell) => SYMBOLS[cell]).join('')).join('/');
}
