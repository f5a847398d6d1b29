import { Cell } from '../types.js';
import type { Board, Player, SearchResult, SearchStats } from '../types.js';
import { diffMove, emptyCells, evaluate, isTerminal, legalMoves } from '../board.js';

export function createStats(): SearchStats {
  return { nodes: 0, cutoffs: 0 };
}

/**
 * Minimax with alpha-beta pruning. Scores are from the Maximizer's side:
 * +1 win, -1 loss, 0 draw. Pass alpha = -Infinity and beta = Infinity at the
 * root.
 */
export function minimax(
  board: Board,
  depth: number,
  alpha: number,
  beta: number,
  maximizing: boolean,
  stats?: SearchStats
): number {
  if (stats) stats.nodes++;

  if (depth === 0 || isTerminal(board)) {
    return evaluate(board);
  }

  if (maximizing) {
    let best = -Infinity;
    for (const child of legalMoves(board, Cell.Maximizer)) {
      const score = minimax(child, depth - 1, alpha, beta, false, stats);
      best = Math.max(best, score);
      alpha = Math.max(alpha, best);
      if (beta <= alpha) {
        if (stats) stats.cutoffs++;
        break;
      }
    }
    return best;
  }

  let best = Infinity;
  for (const child of legalMoves(board, Cell.Minimizer)) {
    const score = minimax(child, depth - 1, alpha, beta, true, stats);
    best = Math.min(best, score);
    beta = Math.min(beta, best);
    if (beta <= alpha) {
      if (stats) stats.cutoffs++;
      break;
    }
  }
  return best;
}

export function searchBestMove(board: Board, player: Player = Cell.Maximizer): SearchResult | null {
  const depth = emptyCells(board).length;
  const stats = createStats();
  const maximizer = player === Cell.Maximizer;

  let best: Board | null = null;
  let bestScore = maximizer ? -Infinity : Infinity;

  for (const child of legalMoves(board, player)) {
    // The mover's mark is already in `child`, so the reply belongs to the other side.
    const score = minimax(child, depth, -Infinity, Infinity, !maximizer, stats);
    const better = maximizer ? score > bestScore : score < bestScore;
    if (better) {
      bestScore = score;
      best = child;
    }
  }

  if (!best) {
    return null;
  }
  const move = diffMove(board, best);
  if (!move) {
    throw new Error('Search produced a board without a single new mark');
  }
  return { board: best, move, score: bestScore, stats };
}

/**
 * Picks the move `player` should make next and returns the resulting board,
 * or null when the board has no empty cell. Ties go to the earliest empty
 * cell in row-major order.
 */
export function selectBestMove(board: Board, player: Player = Cell.Maximizer): Board | null {
  return searchBestMove(board, player)?.board ?? null;
}
