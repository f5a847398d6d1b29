import { z } from 'zod';
import { BOARD_SIZE } from '@noughts/engine';
import type { Coord } from '@noughts/engine';

export class InvalidMoveError extends Error {
  constructor(readonly input: string) {
    super(`Invalid move: ${JSON.stringify(input)}`);
    this.name = 'InvalidMoveError';
  }
}

const MoveNumber = z
  .string()
  .trim()
  .regex(/^\d+$/)
  .transform(Number)
  .pipe(z.number().int().min(1).max(BOARD_SIZE * BOARD_SIZE));

/** Maps a typed cell number 1-9 onto row-major coordinates. */
export function parseMoveInput(text: string): Coord {
  const parsed = MoveNumber.safeParse(text);
  if (!parsed.success) {
    throw new InvalidMoveError(text);
  }
  const n = parsed.data - 1;
  return { row: Math.floor(n / BOARD_SIZE), col: n % BOARD_SIZE };
}
