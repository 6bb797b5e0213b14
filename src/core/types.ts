/**
 * Core Types
 *
 * Shared by the generator, formatter, history extractor and the chat
 * workspace adapters.
 */

/**
 * A member as written in the channel, e.g. `<@U0123ABCD>` or `@jane`
 */
export type MemberId = string;

/**
 * How members are rendered in the announcement
 *
 * - mention: `<@U0123ABCD>`, notifies the user when posted
 * - display: `@name`, silent (used in testing mode)
 */
export type MemberStyle = 'mention' | 'display';

/**
 * Two members meeting for coffee. Order carries no meaning.
 */
export type Pair = readonly [MemberId, MemberId];

/**
 * All pairs produced by one round
 */
export type PairingBatch = Pair[];

/**
 * Message as returned by the chat workspace
 */
export interface ChannelMessage {
  text: string;
}

/**
 * Returns a float in [0, 1), same contract as Math.random
 */
export type RandomSource = () => number;
