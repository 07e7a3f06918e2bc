import cron, { type ScheduledTask } from 'node-cron';
import type { LoggerPort } from '../../app/ports/logger_port';

export interface CronController {
  start(): void;
  stop(): void;
}

export function createHourlyCron(
  schedule: string,
  task: () => Promise<void>,
  logger: LoggerPort
): CronController {
  let running = false;

  const runTick = async (): Promise<void> => {
    if (running) {
      logger.warn('previous round still running, skipping tick', { schedule });
      return;
    }

    running = true;
    try {
      await task();
    } finally {
      running = false;
    }
  };

  const cronTask: ScheduledTask = cron.schedule(
    schedule,
    () => {
      void runTick().catch((error: unknown) => {
        logger.error('cron task failed', {
          error: error instanceof Error ? error.message : String(error)
        });
      });
    },
    {
      scheduled: false,
      timezone: 'UTC'
    }
  );

  return {
    start() {
      logger.info('scheduler started (hourly, UTC)', { schedule });
      cronTask.start();
    },
    stop() {
      logger.info('scheduler stopped');
      cronTask.stop();
    }
  };
}
