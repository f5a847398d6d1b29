import 'dotenv/config';
import { ConfigError, loadConfig } from './config.js';
import { playGame } from './game.js';
import { createConsoleIO } from './io.js';

async function main(): Promise<number> {
  const config = loadConfig();
  if (config.debug) {
    console.debug('[console] Loaded configuration', config);
  }

  const io = createConsoleIO(process.stdin, process.stdout);
  const handleSignal = (signal: NodeJS.Signals) => {
    console.info(`[console] Received ${signal}, closing game...`);
    io.close();
  };
  process.once('SIGINT', handleSignal);
  process.once('SIGTERM', handleSignal);

  try {
    const result = await playGame(io, config);
    if (result.aborted) {
      console.info('[console] Game ended before a result', { moves: result.moves.length });
    }
    return 0;
  } finally {
    process.off('SIGINT', handleSignal);
    process.off('SIGTERM', handleSignal);
    io.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    if (err instanceof ConfigError) {
      console.error('[console] Invalid configuration', { issues: err.issues });
    } else {
      console.error('[console] Game failed', err);
    }
    process.exitCode = 1;
  });
