export * from './types.js';
export {
  BOARD_SIZE,
  WIN_LINES,
  createBoard,
  cloneBoard,
  place,
  opponent,
  winner,
  isTerminal,
  evaluate,
  emptyCells,
  legalMoves,
  gameOutcome,
  diffMove,
} from './board.js';
export { minimax, searchBestMove, selectBestMove, createStats } from './ai/minimax.js';
