import { Cell } from './types.js';
import type { Board, Coord, Outcome, Player, Score } from './types.js';

export const BOARD_SIZE = 3;

type Line = readonly [Readonly<Coord>, Readonly<Coord>, Readonly<Coord>];

export const WIN_LINES: ReadonlyArray<Line> = [
  // rows
  [{ row: 0, col: 0 }, { row: 0, col: 1 }, { row: 0, col: 2 }],
  [{ row: 1, col: 0 }, { row: 1, col: 1 }, { row: 1, col: 2 }],
  [{ row: 2, col: 0 }, { row: 2, col: 1 }, { row: 2, col: 2 }],
  // columns
  [{ row: 0, col: 0 }, { row: 1, col: 0 }, { row: 2, col: 0 }],
  [{ row: 0, col: 1 }, { row: 1, col: 1 }, { row: 2, col: 1 }],
  [{ row: 0, col: 2 }, { row: 1, col: 2 }, { row: 2, col: 2 }],
  // diagonals
  [{ row: 0, col: 0 }, { row: 1, col: 1 }, { row: 2, col: 2 }],
  [{ row: 2, col: 0 }, { row: 1, col: 1 }, { row: 0, col: 2 }],
];

export function createBoard(): Board {
  return Array.from({ length: BOARD_SIZE }, () => Array<Cell>(BOARD_SIZE).fill(Cell.Empty));
}

export function cloneBoard(b: Board): Board {
  return b.map((row) => row.slice());
}

export function place(b: Board, r: number, c: number, p: Player): Board {
  const nb = cloneBoard(b);
  nb[r][c] = p;
  return nb;
}

export function opponent(p: Player): Player {
  return p === Cell.Maximizer ? Cell.Minimizer : Cell.Maximizer;
}

export function winner(board: Board, player: Player): boolean {
  return WIN_LINES.some((line) => line.every(({ row, col }) => board[row][col] === player));
}

export function emptyCells(board: Board): Coord[] {
  const out: Coord[] = [];
  for (let row = 0; row < BOARD_SIZE; row++) {
    for (let col = 0; col < BOARD_SIZE; col++) {
      if (board[row][col] === Cell.Empty) out.push({ row, col });
    }
  }
  return out;
}

/**
 * A board is terminal once either side owns a line or no empty cell remains.
 * Both sides owning a line at once cannot arise from legal play and is not
 * treated specially.
 */
export function isTerminal(board: Board): boolean {
  return (
    winner(board, Cell.Maximizer) || winner(board, Cell.Minimizer) || emptyCells(board).length === 0
  );
}

/**
 * Scores a board from the Maximizer's side. Non-terminal boards score 0, so
 * only call this on terminal positions.
 */
export function evaluate(board: Board): Score {
  if (winner(board, Cell.Maximizer)) return 1;
  if (winner(board, Cell.Minimizer)) return -1;
  return 0;
}

/** One independent copy per empty cell, in row-major order. */
export function legalMoves(board: Board, player: Player): Board[] {
  return emptyCells(board).map(({ row, col }) => place(board, row, col, player));
}

export function gameOutcome(board: Board): Outcome {
  if (winner(board, Cell.Maximizer)) return 'MaximizerWin';
  if (winner(board, Cell.Minimizer)) return 'MinimizerWin';
  if (emptyCells(board).length === 0) return 'Draw';
  return 'InProgress';
}

/** Locates the single cell that differs between two boards. */
export function diffMove(before: Board, after: Board): Coord | null {
  let found: Coord | null = null;
  for (let row = 0; row < BOARD_SIZE; row++) {
    for (let col = 0; col < BOARD_SIZE; col++) {
      if (before[row][col] === after[row][col]) continue;
      if (found) return null;
      found = { row, col };
    }
  }
  return found;
}
