/**
 * ChatWorkspace interface - the contract for talking to the chat platform.
 *
 * The coffee round depends on this interface, not on the Slack client,
 * so tests can pass an in-memory workspace instead.
 *
 * Implementations catch their own API errors: a failed lookup resolves
 * to null and a failed post resolves to false.
 */

import type { ChannelMessage, MemberId, MemberStyle } from './types.js';

export interface ChatWorkspace {
  /** Human members of a channel (bots excluded), rendered in the given style */
  listMembers(channel: string, style: MemberStyle): Promise<MemberId[] | null>;

  /** Messages posted to a channel between since and until, oldest pages flattened */
  listRecentMessages(channel: string, since: Date, until: Date): Promise<ChannelMessage[] | null>;

  /** Post plain text to a channel */
  postMessage(channel: string, text: string): Promise<boolean>;
}
