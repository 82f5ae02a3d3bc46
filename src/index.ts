#!/usr/bin/env node
import { nanoid } from 'nanoid';
import { loadConfig } from './config.js';
import { StorySession } from './engine/orchestrator.js';
import { createModel } from './model/factory.js';
import { openDatabase } from './persistence/db.js';
import { StoryStore } from './persistence/stories.js';
import { TerminalConsole } from './ui/console.js';
import { GameShell } from './ui/play.js';
import {
  StoryError,
  formatErrorForLogging,
  formatErrorForUser,
  setupGlobalErrorHandlers,
} from './utils/errorhandler.js';
import { logger } from './utils/logger.js';
import { createSeededRandom } from './utils/random.js';

async function main() {
  const config = loadConfig();
  const model = await createModel(config);
  const db = openDatabase(config.storyDbPath);
  const io = new TerminalConsole(config.console.wrapWidth, config.console.bell);

  setupGlobalErrorHandlers(() => {
    io.close();
    db.close();
  });

  const seed = config.randomSeed ?? nanoid(12);
  logger.info('Starting', { model: model.name, seed });

  const session = new StorySession({
    model,
    config,
    seed,
    rng: createSeededRandom(seed),
    onToken: (tokenId, text) => logger.debug('Token', { tokenId, text }),
  });

  try {
    await new GameShell({ io, session, store: new StoryStore(db) }).run();
  } finally {
    io.close();
    db.close();
  }
}

main().catch((error: unknown) => {
  if (error instanceof StoryError) {
    logger.error(formatErrorForUser(error), formatErrorForLogging(error));
  } else {
    logger.error('Fatal error', formatErrorForLogging(error));
  }
  process.exitCode = 1;
});
