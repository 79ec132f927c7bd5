#!/usr/bin/env node
import { loadConfig, loadDotenv } from './config.js';
import { logger, configureLogger, errorMessage } from './utils/logger.js';
import { isFatal } from './utils/errors.js';
import { VoiceSortAssistant } from './assistant.js';

loadDotenv();
configureLogger();

// Global error handlers to prevent silent crashes
process.on('uncaughtException', (error) => {
  logger.error(`Uncaught exception: ${error.stack || error.message}`);
});
process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled rejection: ${errorMessage(reason)}`);
});

async function main(): Promise<void> {
  const config = loadConfig();
  const assistant = new VoiceSortAssistant(config);

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info(`Received ${signal}, shutting down gracefully...`);
    await assistant.stop();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  try {
    await assistant.start();
    await assistant.wait();
  } catch (error) {
    if (!stopping) {
      await assistant.stop();
    }
    throw error;
  }
}

main().catch((error: unknown) => {
  const kind = isFatal(error) ? `Fatal (${error.code})` : 'Failed';
  logger.error(`${kind}: ${errorMessage(error)}`);
  process.exit(1);
});
