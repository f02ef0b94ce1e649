import { createApp } from './app.js';
import { CloneConfig, loadConfig } from './config.js';
import { describeError } from './errors.js';
import { createConsoleLogger } from './logger.js';

/**
 * Start the server
 */
function bootstrap() {
  const logger = createConsoleLogger();
  let config: CloneConfig;
  try {
    config = loadConfig({ logger });
  } catch (err) {
    logger.error(describeError(err));
    process.exit(1);
  }

  const app = createApp(config);

  const server = app.listen(config.port, () => {
    console.log(`Clone API listening on http://localhost:${config.port}, repository ${config.repositoryRoot}`);
  });

  // Graceful shutdown handler
  const shutdown = (signal: string) => {
    console.log(`\nReceived ${signal}, shutting down gracefully...`);

    server.close(() => {
      console.log('Server closed');
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      console.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000);
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

bootstrap();
