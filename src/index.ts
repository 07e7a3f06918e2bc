import 'dotenv/config';
import { bootstrap } from './infra/bootstrap';
import { createLogger } from './infra/logging/logger';

const logger = createLogger('main');

async function main(): Promise<void> {
  const runtime = bootstrap();

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`received ${signal}, shutting down...`);
    await runtime.stop();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  await runtime.start();
}

void main().catch((error: unknown) => {
  logger.error('bot startup failed', {
    error: error instanceof Error ? error.message : String(error)
  });
  process.exit(1);
});
