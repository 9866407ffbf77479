#!/usr/bin/env node

import 'dotenv/config';
import { logger } from './shared/logger.js';
import { monitor } from './shared/monitor.js';
import { config } from './shared/config.js';
import { ContentComposer } from './publisher/composer.js';
import { runDigest, startSchedules } from './orchestrator.js';

const command: string | undefined = process.argv[2];
const args = process.argv.slice(3);

async function main() {
  logger.debug(`Crypto Digest CLI - Command: ${command}`);

  switch (command) {
    case 'digest':
      await showDigest(args.includes('--json'));
      break;
    case 'ping':
      await ping();
      break;
    case 'config':
      showConfig();
      break;
    case 'schedule':
      schedule();
      break;
    case 'help':
    case undefined:
      showHelp();
      break;
    default:
      console.log(`Unknown command: ${command}`);
      showHelp();
  }
}

async function showDigest(asJson: boolean) {
  const composer = new ContentComposer(config.getAll());

  if (asJson) {
    const content = await composer.getContent();
    console.log(JSON.stringify(content, null, 2));
    return;
  }

  await runDigest(composer);
  console.log(monitor.getDashboard());
}

async function ping() {
  const composer = new ContentComposer(config.getAll());
  const reachable = await composer.testConnection();
  console.log(reachable ? '✓ Completion API reachable' : '✗ Completion API unreachable');
  if (!reachable) process.exitCode = 1;
}

function showConfig() {
  console.log('\n=== CONFIGURATION ===');
  const cfg = config.getAll();
  console.log(`API Key: ${cfg.apiKey ? 'set' : 'missing'}`);
  console.log(`Endpoint: ${cfg.baseUrl}`);
  console.log(`Model: ${cfg.model}`);
  console.log(`Max Tokens: ${cfg.maxTokens}`);
  console.log(`Temperature: ${cfg.temperature}`);
  console.log(`Request Timeout: ${cfg.requestTimeoutMs}ms`);
  console.log(`Connection Timeout: ${cfg.connectionTimeoutMs}ms`);
  console.log(`Image Probe Timeout: ${cfg.imageProbeTimeoutMs}ms`);
  console.log(`Validation: ${cfg.enableValidation ? 'enabled' : 'disabled'}`);
  console.log(`Run on Start: ${cfg.runOnStart ? 'enabled' : 'disabled'}`);
  console.log(`Schedules: ${cfg.schedules.join(', ')}`);
}

function schedule() {
  const composer = new ContentComposer(config.getAll());
  const tasks = startSchedules(composer, config.get('schedules'));
  console.log(`Scheduled ${tasks.length} digest run(s). Press Ctrl+C to stop.`);

  process.on('SIGINT', () => {
    tasks.forEach(task => task.stop());
    console.log('\n' + monitor.getDashboard());
    process.exit(0);
  });
}

function showHelp() {
  console.log(`
Crypto Digest CLI

Commands:
  digest [--json]      Compose today's digest and print it
  ping                 Check that the completion API answers
  config               Show current configuration
  schedule             Run digests on the configured cron schedules
  help                 Show this help

Environment:
  PERPLEXITY_API_KEY   API key for the completion endpoint
  PERPLEXITY_BASE_URL  Override the completion endpoint
  DIGEST_SCHEDULES     Comma-separated cron expressions
  LOG_LEVEL            debug | info | warn | error | silent

Examples:
  npm run cli digest
  npm run cli digest --json
  npm run cli ping
  `);
}

main().catch(error => {
  logger.error('CLI error', (error as Error).message);
  process.exit(1);
});
