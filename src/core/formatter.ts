/**
 * Announcement Formatter
 *
 * Renders a pairing batch as the Slack announcement. The history
 * extractor reads these messages back on later rounds, so the layout
 * here is a contract: header line, one numbered line per pair, footer.
 */

import type { PairingBatch } from './types.js';

// The header doubles as the marker that identifies our own announcements
export const ANNOUNCEMENT_MARKER = 'This weeks random coffees are:';
export const ANNOUNCEMENT_FOOTER = 'If there are an uneven number of members one person will have two conversations';

/**
 * Format one numbered pair line, e.g. " 2. <@U1> and <@U2>"
 */
export function formatPairLine(index: number, first: string, second: string): string {
  return ` ${index}. ${first} and ${second}`;
}

/**
 * Build the announcement text. Returns null when there is nothing to post.
 */
export function formatAnnouncement(batch: PairingBatch): string | null {
  if (batch.length === 0) return null;

  const lines = [
    ANNOUNCEMENT_MARKER,
    ...batch.map(([first, second], i) => formatPairLine(i + 1, first, second)),
    ANNOUNCEMENT_FOOTER,
  ];
  return lines.join('\n');
}
