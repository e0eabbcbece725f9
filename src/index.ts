#!/usr/bin/env node
import { config, getPublicConfig } from './config';
import { logger } from './utils/logger';
import { IDisplay, createConsoleDisplay } from './adapter';
import { GraphBoard } from './board/graph.board';
import { loadGameDefinition } from './board/definition';
import { createGameState } from './board/setup';
import { GameController } from './game/controller';
import { HealthServer } from './health/server';
import { IResultStore, createResultStore } from './storage/result-store';
import { createRandom } from './utils/random';

interface CliArgs {
  gameFile: string;
  seed: number;
  aiOnly: boolean;
  maxTurns: number;
}

function parseArgs(argv: string[]): CliArgs {
  const opts: CliArgs = {
    gameFile: config.gameFile,
    seed: config.seed ?? Date.now(),
    aiOnly: config.aiOnly,
    maxTurns: config.maxTurns,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--':
        break;
      case '--ai-only':
        opts.aiOnly = true;
        break;
      case '--game': {
        const next = argv[++i];
        if (!next) throw new Error('Missing value for --game');
        opts.gameFile = next;
        break;
      }
      case '--seed':
      case '--max-turns': {
        const next = argv[++i];
        const n = Number(next);
        if (!next || !Number.isInteger(n)) throw new Error(`Invalid value "${next ?? ''}" for ${arg}`);
        if (arg === '--seed') opts.seed = n;
        else opts.maxTurns = n;
        break;
      }
      default:
        // A bare argument is the game file
        if (arg.startsWith('--')) throw new Error(`Unknown argument "${arg}"`);
        opts.gameFile = arg;
    }
  }

  return opts;
}

let display: IDisplay | null = null;
let healthServer: HealthServer | null = null;
let store: IResultStore | null = null;
let shuttingDown = false;

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  logger.info({ config: getPublicConfig(), args }, 'Starting Whodunit...');

  const definition = loadGameDefinition(args.gameFile);
  const rng = createRandom(args.seed);
  const state = createGameState(definition, rng, { aiOnly: args.aiOnly, settings: { maxTurns: args.maxTurns } });

  display = createConsoleDisplay({
    promptTimeoutSeconds: config.promptTimeout,
    onInterrupt: () => void shutdown(0),
  });
  store = createResultStore(config.mongoUri);

  const controller = new GameController(state, {
    board: new GraphBoard(definition),
    display,
    rng,
    store,
  });

  if (config.statusPort > 0) {
    healthServer = new HealthServer(config.statusPort, () => controller.getStatus());
    healthServer.start();
  }

  await controller.run();
}

async function shutdown(code: number = 0): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info('Shutting down...');

  if (display) {
    await display.close();
    display = null;
  }

  if (healthServer) {
    healthServer.stop();
    healthServer = null;
  }

  if (store) {
    try {
      await store.close();
    } catch (error) {
      logger.error({ error }, 'Failed to close result store');
    }
    store = null;
  }

  process.exit(code);
}

process.on('SIGINT', () => void shutdown(0));
process.on('SIGTERM', () => void shutdown(0));

main()
  .then(() => shutdown(0))
  .catch((error) => {
    const errorMessage = error instanceof Error ? error.message : String(error);
    const errorStack = error instanceof Error ? error.stack : undefined;
    logger.error({ error: errorMessage, stack: errorStack }, 'Fatal error');
    console.error(`Fatal: ${errorMessage}`);
    return shutdown(1);
  });
