#!/usr/bin/env node
/**
 * coffeepair CLI
 *
 * Commands:
 *   coffeepair run      - Pair the channel and post the announcement
 *   coffeepair preview  - Same, without posting
 *   coffeepair history  - Print pairs parsed from earlier announcements
 *   coffeepair serve    - Run rounds on the configured cron schedule
 */

import 'dotenv/config';
import { existsSync } from 'node:fs';
import { parseArgs, USAGE } from './cli/args.js';
import type { CliArgs } from './cli/args.js';
import { loadConfig, resolveConfigPath } from './config/index.js';
import type { CoffeePairConfig } from './config/index.js';
import { createSlackWorkspace } from './channels/slack.js';
import { readHistory, resolveRoundOptions, runCoffeeRound } from './core/round.js';
import type { RoundStatus } from './core/round.js';
import { formatPairLine } from './core/formatter.js';
import { CoffeeScheduler } from './cron/service.js';

// Statuses that mean the round did not do its job
const FAILED_STATUSES: RoundStatus[] = ['members-unavailable', 'post-failed'];

async function runRound(config: CoffeePairConfig, args: CliArgs): Promise<number> {
  const workspace = createSlackWorkspace(config.slack.token);
  const options = resolveRoundOptions(config, { testing: args.testing, dryRun: args.dryRun });
  const result = await runCoffeeRound(workspace, options);

  if (options.dryRun && result.message) {
    console.log(`\nWould post to ${options.announceChannel}:\n`);
    console.log(result.message);
  }

  return FAILED_STATUSES.includes(result.status) ? 1 : 0;
}

async function showHistory(config: CoffeePairConfig, args: CliArgs): Promise<number> {
  const workspace = createSlackWorkspace(config.slack.token);
  const options = resolveRoundOptions(config, { testing: args.testing });
  const history = await readHistory(workspace, options.announceChannel, options.lookbackDays);

  if (history.length === 0) {
    console.log(`No announcements found in ${options.announceChannel} in the last ${options.lookbackDays} days`);
    return 0;
  }

  console.log(`Previous rounds in ${options.announceChannel}, most recent first:`);
  history.forEach((batch, i) => {
    console.log(`\nRound ${i + 1}`);
    batch.forEach(([first, second], j) => console.log(formatPairLine(j + 1, first, second)));
  });
  return 0;
}

function serve(config: CoffeePairConfig, args: CliArgs): void {
  const workspace = createSlackWorkspace(config.slack.token);
  const options = resolveRoundOptions(config, { testing: args.testing, dryRun: args.dryRun });
  const scheduler = new CoffeeScheduler(() => runCoffeeRound(workspace, options), config.schedule);

  scheduler.start();

  const shutdown = () => {
    scheduler.stop();
    process.exit(0);
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

// null: keep running (serve)
async function main(): Promise<number | null> {
  const args = parseArgs(process.argv.slice(2));

  if (args.unknown.length > 0) {
    console.error(`Unknown argument(s): ${args.unknown.join(' ')}`);
    console.log(USAGE);
    return 1;
  }

  if (args.command === 'help') {
    console.log(USAGE);
    return 0;
  }

  const configPath = resolveConfigPath();
  console.log(`[Config] Loaded from ${existsSync(configPath) ? configPath : 'defaults + environment variables'}`);
  const config = loadConfig(configPath);

  switch (args.command) {
    case 'run':
    case 'preview':
      return runRound(config, args);
    case 'history':
      return showHistory(config, args);
    case 'serve':
      serve(config, args);
      return null;
  }
}

main()
  .then((code) => {
    // serve keeps the process alive through its scheduled job
    if (code !== null) process.exit(code);
  })
  .catch((err) => {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
  });
