/**
 * Coffee Round
 *
 * One pass of the bot: list members, rebuild history from earlier
 * announcements, pair, format and post.
 */

import type { CoffeePairConfig } from '../config/types.js';
import type { ChatWorkspace } from './interfaces.js';
import type { MemberStyle, PairingBatch, RandomSource } from './types.js';
import { formatAnnouncement } from './formatter.js';
import { extractHistory } from './history.js';
import { generatePairs } from './pairing.js';
import { defaultRandom } from './random.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface RoundOptions {
  memberChannel: string;     // Members are read from here
  announceChannel: string;   // History is read from and the announcement posted to here
  memberStyle: MemberStyle;
  lookbackDays: number;
  dryRun?: boolean;
  now?: () => Date;
  random?: RandomSource;
}

export type RoundStatus =
  | 'posted'
  | 'post-failed'
  | 'dry-run'
  | 'no-members'
  | 'members-unavailable';

export interface RoundResult {
  status: RoundStatus;
  memberCount: number;
  historyCount: number;
  pairs: PairingBatch;
  message: string | null;
}

/**
 * Map config plus command-line flags to round options.
 * Testing mode renders silent @names and posts to the testing channel.
 */
export function resolveRoundOptions(
  config: CoffeePairConfig,
  overrides: { testing?: boolean; dryRun?: boolean } = {},
): RoundOptions {
  const testing = overrides.testing ?? config.testing;
  return {
    memberChannel: config.channel,
    announceChannel: testing ? config.testingChannel : config.channel,
    memberStyle: testing ? 'display' : 'mention',
    lookbackDays: config.history.lookbackDays,
    dryRun: overrides.dryRun ?? false,
  };
}

/**
 * Read earlier announcements from a channel. A failed lookup counts as no history.
 */
export async function readHistory(
  workspace: ChatWorkspace,
  channel: string,
  lookbackDays: number,
  now: Date = new Date(),
): Promise<PairingBatch[]> {
  const since = new Date(now.getTime() - lookbackDays * DAY_MS);
  const messages = await workspace.listRecentMessages(channel, since, now);
  if (!messages) {
    console.warn(`[Round] Could not read history from ${channel}, pairing without it`);
    return [];
  }
  return extractHistory(messages);
}

export async function runCoffeeRound(workspace: ChatWorkspace, options: RoundOptions): Promise<RoundResult> {
  const now = options.now ? options.now() : new Date();
  const random = options.random ?? defaultRandom;

  const members = await workspace.listMembers(options.memberChannel, options.memberStyle);
  if (!members) {
    console.error(`[Round] Could not list members of ${options.memberChannel}`);
    return { status: 'members-unavailable', memberCount: 0, historyCount: 0, pairs: [], message: null };
  }
  if (members.length === 0) {
    console.log(`[Round] No members in ${options.memberChannel}, nothing to post`);
    return { status: 'no-members', memberCount: 0, historyCount: 0, pairs: [], message: null };
  }

  const history = await readHistory(workspace, options.announceChannel, options.lookbackDays, now);
  console.log(`[Round] ${members.length} members, ${history.length} previous rounds in the last ${options.lookbackDays} days`);

  const pairs = generatePairs(members, history, random);
  const message = formatAnnouncement(pairs);
  const result = {
    memberCount: members.length,
    historyCount: history.length,
    pairs,
    message,
  };

  // Non-empty members always give at least one pair
  if (!message) {
    return { ...result, status: 'no-members' };
  }

  if (options.dryRun) {
    console.log(`[Round] Dry run, not posting to ${options.announceChannel}`);
    return { ...result, status: 'dry-run' };
  }

  const ok = await workspace.postMessage(options.announceChannel, message);
  if (!ok) {
    console.error(`[Round] Failed to post announcement to ${options.announceChannel}`);
    return { ...result, status: 'post-failed' };
  }

  console.log(`[Round] Posted ${pairs.length} pairs to ${options.announceChannel}`);
  return { ...result, status: 'posted' };
}
