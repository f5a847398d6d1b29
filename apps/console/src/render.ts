import { BOARD_SIZE, Cell } from '@noughts/engine';
import type { Board, Coord, Player } from '@noughts/engine';

export type Mark = 'X' | 'O';
export type Marks = Record<Player, Mark>;

export function renderBoard(board: Board, marks: Marks): string {
  const header = `  ${board[0].map((_, c) => c + 1).join(' ')}`;
  const rows = board.map(
    (row, r) => `${r + 1} ${row.map((cell) => (cell === Cell.Empty ? '.' : marks[cell])).join(' ')}`
  );
  return [header, ...rows].join('\n');
}

/** 1-based cell number as typed at the prompt. */
export function cellNumber({ row, col }: Coord): number {
  return row * BOARD_SIZE + col + 1;
}
