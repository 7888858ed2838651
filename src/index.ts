/**
 * sweepbench - Main Entry Point
 *
 * Opens the bench session and serves the measurement API.
 */

import 'dotenv/config';
import { createServer } from 'http';

import { config } from './config.js';
import { log, toError } from './utils/logger.js';
import { createApp } from './app.js';
import { createBenchSession } from './services/bench/bench-session.js';
import { setBenchSession, getBenchSession, clearBenchSession } from './state.js';

async function startServer(): Promise<void> {
  const app = createApp();
  const httpServer = createServer(app);

  // Open the bench; the API stays up and /ready reports 503 without it
  const session = createBenchSession(config);
  try {
    await session.open();
    setBenchSession(session);
    log.info('Bench session ready', { port: config.serial.path, opm: config.opm.resource });
  } catch (error) {
    log.error('Failed to open bench session', toError(error), { port: config.serial.path });
  }

  // Start server
  httpServer.listen(config.port, () => {
    log.info('sweepbench started', {
      httpPort: config.port,
      nodeEnv: config.nodeEnv,
      version: config.version,
      buildId: config.buildId,
    });
  });

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    log.info(`Received ${signal}, shutting down gracefully...`);

    const active = getBenchSession();
    if (active) {
      try {
        await active.close();
      } catch (error) {
        log.error('Bench session close failed', toError(error));
      }
      clearBenchSession();
    }

    httpServer.close(() => {
      log.info('HTTP server closed');
      process.exit(0);
    });

    // Force exit after 30 seconds
    setTimeout(() => {
      log.error('Forced shutdown after timeout');
      process.exit(1);
    }, 30000).unref();
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

startServer().catch((error) => {
  log.error('Failed to start server', toError(error));
  process.exit(1);
});
