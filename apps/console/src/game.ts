import { Cell, createBoard, gameOutcome, isTerminal, opponent, searchBestMove } from '@noughts/engine';
import type { Board, Coord, Outcome, Player } from '@noughts/engine';
import type { AppConfig } from './config.js';
import { InvalidMoveError, parseMoveInput } from './input.js';
import type { GameIO } from './io.js';
import { cellNumber, renderBoard, type Marks } from './render.js';

export interface GameResult {
  outcome: Outcome;
  aborted: boolean;
  moves: Coord[];
}

const RESULT_TEXT: Record<Outcome, string> = {
  MinimizerWin: 'Congratulations, you win!',
  MaximizerWin: 'AI wins. Better luck next time!',
  Draw: "It's a draw!",
  InProgress: 'Game aborted.',
};

/**
 * Runs one game on a single live board. The human plays the Minimizer and
 * the computer the Maximizer.
 */
export async function playGame(io: GameIO, config: AppConfig): Promise<GameResult> {
  const marks: Marks = {
    [Cell.Maximizer]: config.computerMark,
    [Cell.Minimizer]: config.humanMark,
  };
  const board = createBoard();
  const moves: Coord[] = [];

  io.print('Welcome to Tic Tac Toe!');
  io.print(renderBoard(board, marks));

  let turn: Player = config.firstPlayer === 'human' ? Cell.Minimizer : Cell.Maximizer;
  while (!isTerminal(board)) {
    if (turn === Cell.Minimizer) {
      const move = await readHumanMove(io, board);
      if (!move) {
        io.print(RESULT_TEXT.InProgress);
        return { outcome: gameOutcome(board), aborted: true, moves };
      }
      board[move.row][move.col] = Cell.Minimizer;
      moves.push(move);
    } else {
      const move = computerMove(board, config.debug);
      board[move.row][move.col] = Cell.Maximizer;
      moves.push(move);
      io.print(`Computer plays ${cellNumber(move)}.`);
    }
    io.print(renderBoard(board, marks));
    turn = opponent(turn);
  }

  const outcome = gameOutcome(board);
  io.print(RESULT_TEXT[outcome]);
  return { outcome, aborted: false, moves };
}

async function readHumanMove(io: GameIO, board: Board): Promise<Coord | null> {
  while (true) {
    const answer = await io.ask('Choose your move (1-9): ');
    if (answer === null) {
      return null;
    }
    let move: Coord;
    try {
      move = parseMoveInput(answer);
    } catch (err) {
      if (err instanceof InvalidMoveError) {
        io.print('Invalid move. Try again.');
        continue;
      }
      throw err;
    }
    if (board[move.row][move.col] !== Cell.Empty) {
      io.print('Cell is already occupied. Try again.');
      continue;
    }
    return move;
  }
}

function computerMove(board: Board, debug: boolean): Coord {
  const result = searchBestMove(board, Cell.Maximizer);
  if (!result) {
    throw new Error('Computer asked to move on a board with no empty cell');
  }
  if (debug) {
    console.debug('[game] Search finished', {
      move: result.move,
      score: result.score,
      nodes: result.stats.nodes,
      cutoffs: result.stats.cutoffs,
    });
  }
  return result.move;
}
