import { z } from 'zod';
import type { Mark } from './render.js';

export type FirstPlayer = 'human' | 'computer';

export interface AppConfig {
  firstPlayer: FirstPlayer;
  humanMark: Mark;
  computerMark: Mark;
  debug: boolean;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

// Blank values fall back to the default.
const envText = (normalize: (value: string) => string) => (value: unknown) => {
  if (typeof value !== 'string') {
    return value;
  }
  const trimmed = normalize(value.trim());
  return trimmed === '' ? undefined : trimmed;
};

const lower = envText((value) => value.toLowerCase());
const upper = envText((value) => value.toUpperCase());

const EnvSchema = z.object({
  NOUGHTS_FIRST_PLAYER: z.preprocess(lower, z.enum(['human', 'computer']).default('human')),
  NOUGHTS_HUMAN_MARK: z.preprocess(upper, z.enum(['X', 'O']).default('X')),
  NOUGHTS_DEBUG: z.preprocess(lower, z.enum(['true', 'false']).default('false')),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  const { NOUGHTS_FIRST_PLAYER, NOUGHTS_HUMAN_MARK, NOUGHTS_DEBUG } = parsed.data;
  return {
    firstPlayer: NOUGHTS_FIRST_PLAYER,
    humanMark: NOUGHTS_HUMAN_MARK,
    computerMark: NOUGHTS_HUMAN_MARK === 'X' ? 'O' : 'X',
    debug: NOUGHTS_DEBUG === 'true',
  };
}
