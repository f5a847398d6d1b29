import assert from 'node:assert/strict';
import test from 'node:test';
import { Cell, createBoard, place } from '@noughts/engine';
import { InvalidMoveError, parseMoveInput } from '../src/input.js';
import { cellNumber, renderBoard } from '../src/render.js';

test('maps cell numbers onto row-major coordinates', () => {
  assert.deepEqual(parseMoveInput('1'), { row: 0, col: 0 });
  assert.deepEqual(parseMoveInput('3'), { row: 0, col: 2 });
  assert.deepEqual(parseMoveInput(' 5 '), { row: 1, col: 1 });
  assert.deepEqual(parseMoveInput('7'), { row: 2, col: 0 });
  assert.deepEqual(parseMoveInput('9'), { row: 2, col: 2 });
});

test('rejects anything but a whole number from 1 to 9', () => {
  for (const text of ['', '0', '10', '-1', '2.5', 'x', '1e0']) {
    assert.throws(() => parseMoveInput(text), InvalidMoveError, text);
  }
});

test('cell numbers invert the parsed coordinates', () => {
  for (let n = 1; n <= 9; n++) {
    assert.equal(cellNumber(parseMoveInput(String(n))), n);
  }
});

test('renders marks with a header and row numbers', () => {
  let board = createBoard();
  board = place(board, 0, 2, Cell.Maximizer);
  board = place(board, 2, 0, Cell.Minimizer);
  const text = renderBoard(board, { [Cell.Maximizer]: 'O', [Cell.Minimizer]: 'X' });
  assert.equal(text, '  1 2 3\n1 . . O\n2 . . .\n3 X . .');
});
