/**
 * History Extractor
 *
 * Rebuilds past pairing rounds from the channel's own announcements.
 * There is no other store: whatever the bot posted before is the history.
 *
 * Announcements are recognised by the marker phrase plus at least one
 * member-shaped token. A user who pastes something that looks the same
 * will be counted too.
 */

import type { ChannelMessage, Pair, PairingBatch } from './types.js';
import { ANNOUNCEMENT_MARKER } from './formatter.js';

// Matches both <@U0123ABCD> and @jane.doe
const MEMBER_TOKEN = /@[\w.-]+/;

// " 3. <@U1> and <@U2>"
const PAIR_LINE = /^\s*\d+\.\s+(\S+)\s+and\s+(\S+)\s*$/;

export class HistoryParseError extends Error {
  readonly line: string;

  constructor(line: string) {
    super(`Unrecognised pair line: "${line}"`);
    this.name = 'HistoryParseError';
    this.line = line;
  }
}

/**
 * Whether a message looks like one of our announcements
 */
export function isAnnouncement(text: string): boolean {
  return text.includes(ANNOUNCEMENT_MARKER) && MEMBER_TOKEN.test(text);
}

/**
 * Parse a single announcement into its pairs.
 * Throws HistoryParseError on any line between header and footer that is not a pair.
 */
export function parseAnnouncement(text: string): PairingBatch {
  const lines = text.trimEnd().split('\n');
  // Drop header and footer
  const body = lines.slice(1, -1);

  return body.map((line): Pair => {
    const match = PAIR_LINE.exec(line);
    if (!match) {
      throw new HistoryParseError(line);
    }
    return [match[1], match[2]];
  });
}

/**
 * Extract every parseable announcement from a window of messages.
 * Malformed announcements are logged and skipped.
 */
export function extractHistory(messages: readonly ChannelMessage[]): PairingBatch[] {
  const history: PairingBatch[] = [];

  for (const message of messages) {
    if (!isAnnouncement(message.text)) continue;

    try {
      history.push(parseAnnouncement(message.text));
    } catch (err) {
      if (!(err instanceof HistoryParseError)) throw err;
      console.warn(`[History] Skipping malformed announcement: ${err.message}`);
    }
  }

  return history;
}
