export enum Cell {
  Empty = 'empty',
  Maximizer = 'max',
  Minimizer = 'min',
}

export type Player = Cell.Maximizer | Cell.Minimizer;

// Row-major 3x3 grid. Treated as immutable everywhere except the live game board.
export type Board = Cell[][];

export interface Coord {
  row: number;
  col: number;
}

export type Outcome = 'MaximizerWin' | 'MinimizerWin' | 'Draw' | 'InProgress';

export type Score = 1 | -1 | 0;

export interface SearchStats {
  nodes: number;
  cutoffs: number;
}

export interface SearchResult {
  board: Board;
  move: Coord;
  score: number;
  stats: SearchStats;
}
