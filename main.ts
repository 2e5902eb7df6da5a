/**
 * Application Entry Point
 *
 * Boot sequence: load configuration, register routes, start the server.
 */

import { createApp, Logger, loadConfig, toError } from './framework/mod.ts';
import { registerRoutes } from './src/mod.ts';

async function main(): Promise<void> {
  // 1. Load configuration (config.json, then environment)
  const config = await loadConfig();

  // 2. Create application instance
  const app = createApp({ config });

  // 3. Register routes (from src/)
  registerRoutes(app);

  // 4. Start server
  const addr = await app.listen();
  app.getLogger().info(`jsonroute ready on http://localhost:${addr.port}`);

  const shutdown = (signal: string) => {
    app.getLogger().info('Shutting down', { signal });
    app.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        app.getLogger().error('Shutdown failed', toError(error));
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

// Handle startup
main().catch((error: unknown) => {
  new Logger({ format: 'pretty' }).error('Failed to start', toError(error));
  process.exit(1);
});
