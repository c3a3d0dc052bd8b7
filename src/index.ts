import { validateEnvironment, getConfig } from './auth/middleware.js';
import { startServer } from './server.js';
import { ToolRegistry } from './tools/index.js';
import { closeRedis } from './utils/redis.js';

async function main() {
  try {
    // Validate environment variables before starting
    validateEnvironment();

    const config = getConfig();

    console.log('Starting Pacekeeper MCP Server...');
    console.log(`Intervals.icu: configured for athlete ${config.intervals.athleteId}`);
    console.log(`Webhook secret: ${config.webhookSecret ? 'configured' : 'not configured'}`);
    console.log(`Event store: ${config.redisUrl ? 'redis' : 'in-memory'}`);

    const registry = new ToolRegistry({
      intervals: config.intervals,
      webhookSecret: config.webhookSecret,
      redisUrl: config.redisUrl,
      downloadDir: config.downloadDir,
    });

    const server = await startServer({ port: config.port, registry });

    const shutdown = (signal: string) => {
      console.log(`Received ${signal}, shutting down...`);
      server.close();
      registry
        .shutdown()
        .then(() => closeRedis())
        .then(() => process.exit(0))
        .catch((error) => {
          console.error('Error during shutdown:', error);
          process.exit(1);
        });
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
}

main();
