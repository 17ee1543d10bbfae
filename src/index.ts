#!/usr/bin/env node

/**
 * Paper Harvest Server - Entry Point
 */

import { getConfig, printConfigInfo } from './config.js';
import { HarvestServer } from './presentation/HarvestServer.js';

async function main() {
  let server: HarvestServer | null = null;

  try {
    const config = getConfig();
    printConfigInfo(config);

    server = new HarvestServer(config);
    await server.start();
    console.error('\n🚀 Server is running. Press Ctrl+C to stop.\n');
  } catch (error) {
    console.error('💥 Fatal error in main():', error);
    if (server) {
      await server.shutdown({ wait: false });
    }
    process.exit(1);
  }

  let stopping = false;

  // Setup graceful shutdown
  const shutdown = async (signal: string, exitCode = 0) => {
    if (stopping || !server) {
      return;
    }
    stopping = true;
    console.error(`\n📛 Received ${signal}, waiting for running searches to finish...`);

    try {
      await server.shutdown({ wait: signal !== 'UNCAUGHT_EXCEPTION' });
    } catch (error) {
      console.error('✗ Error during shutdown:', error);
      exitCode = 1;
    }

    console.error('👋 Goodbye!\n');
    process.exit(exitCode);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  process.on('uncaughtException', (error) => {
    console.error('💥 Uncaught Exception:', error);
    void shutdown('UNCAUGHT_EXCEPTION', 1);
  });

  process.on('unhandledRejection', (reason) => {
    console.error('💥 Unhandled Rejection:', reason);
  });
}

// Start the server
void main();
