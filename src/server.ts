import { Server } from 'http';
import { createApp } from './app';
import { env } from './config/env';
import { logger } from './utils/logger';

let server: Server | undefined;

function startServer() {
  try {
    const app = createApp();

    server = app.listen(env.PORT, () => {
      logger.info(`Server running on port ${env.PORT}`);
      logger.info(`Environment: ${env.NODE_ENV}`);
      logger.info(`Skills vocabulary: ${env.SKILLS_CSV_PATH}`);
      logger.info('=== Skill Gap Analyzer Started ===');
    });
  } catch (error) {
    logger.error('Failed to start server', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  }
}

// Handle graceful shutdown
function shutdown(signal: NodeJS.Signals) {
  logger.info(`Received ${signal}, shutting down gracefully...`);
  if (!server) {
    process.exit(0);
  }
  server.close(error => {
    if (error) {
      logger.error('Error during shutdown', { error: error.message });
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

// Start the server
if (require.main === module) {
  startServer();
}
