import 'dotenv/config';
import { loadConfig } from '../config';
import { createEngine, createScheduler } from '../container';
import { describeError } from '../errors';
import { createApp } from './app';

function main(): void {
  const config = loadConfig();
  const engine = createEngine(config);
  const app = createApp(engine, { corsOrigin: process.env.CORS_ORIGIN });
  const scheduler = process.env.RUN_SCHEDULER === 'true' ? createScheduler(engine) : null;

  const server = app.listen(config.apiPort, () => {
    console.log(`[API Server] Listening on port ${config.apiPort}`);
    console.log(`[API Server] Environment: ${process.env.NODE_ENV || 'development'}`);
    console.log(`[API Server] Database: ${config.databaseUrl.replace(/:[^:@]+@/, ':****@')}`);
  });
  scheduler?.start();

  const shutdown = (signal: string) => {
    console.log('[API Server] Shutting down', { signal });
    scheduler?.stop();
    server.close(() => {
      engine.close().then(
        () => process.exit(0),
        error => {
          console.error('[API Server] Failed to close database pool', { error: describeError(error) });
          process.exit(1);
        }
      );
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

if (require.main === module) {
  main();
}
