/**
 * HTTP relay entry point.
 */

import { logger } from './logger.js';
import { createRelay } from './relay.js';
import { serve } from './server.js';

const start = async () => {
  logger.info('Ollama relay starting up...');
  const relay = createRelay();

  try {
    const restored = await relay.orchestrator.warmCache();
    if (restored > 0) {
      logger.info(`Restored ${restored} cached responses`);
    }
  } catch (error) {
    logger.warn(`Starting with an empty cache, disk mirror unreadable: ${error}`);
  }

  await serve(relay);
};

void start();
