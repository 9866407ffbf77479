import 'dotenv/config';
import cron, { type ScheduledTask } from 'node-cron';
import { pathToFileURL } from 'node:url';
import { ContentComposer } from './publisher/composer.js';
import type { ComposedContent } from './shared/types.js';
import { config } from './shared/config.js';
import { logger } from './shared/logger.js';
import { monitor } from './shared/monitor.js';

export type DigestSink = (content: ComposedContent) => void;

const printDigest: DigestSink = content => {
  console.log(`\n${content.text}\n\n🖼  ${content.imageUrl}\n`);
};

export async function runDigest(
  composer: Pick<ContentComposer, 'getContent'>,
  sink: DigestSink = printDigest
): Promise<ComposedContent> {
  logger.info('=== Starting digest run ===');

  const content = await composer.getContent();
  sink(content);

  logger.info(`=== Digest run complete (${content.charCount} chars) ===`);
  return content;
}

export function startSchedules(
  composer: Pick<ContentComposer, 'getContent'>,
  schedules: string[],
  sink: DigestSink = printDigest
): ScheduledTask[] {
  return schedules.map(expression => {
    logger.info(`Scheduling digest: ${expression}`);
    return cron.schedule(expression, () => {
      runDigest(composer, sink).catch(error => {
        const err = error instanceof Error ? error : new Error(String(error));
        logger.error('Scheduled digest failed', err.message);
      });
    });
  });
}

async function main() {
  config.logConfig();
  const composer = new ContentComposer(config.getAll());

  if (config.get('runOnStart')) {
    await runDigest(composer);
  }

  const tasks = startSchedules(composer, config.get('schedules'));

  const shutdown = () => {
    logger.info('Shutting down scheduler');
    tasks.forEach(task => task.stop());
    console.log(monitor.getDashboard());
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch(error => {
    logger.error('Scheduler error', (error as Error).message);
    process.exit(1);
  });
}
