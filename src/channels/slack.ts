/**
 * Slack Workspace
 *
 * Implements ChatWorkspace on top of the Slack Web API. Every call
 * follows cursors, so callers always see complete lists.
 */

import { WebClient } from '@slack/web-api';
import type {
  ChatPostMessageResponse,
  ConversationsHistoryResponse,
  ConversationsListResponse,
  ConversationsMembersResponse,
  UsersListResponse,
} from '@slack/web-api';
import type { ChatWorkspace } from '../core/interfaces.js';
import type { ChannelMessage, MemberId, MemberStyle } from '../core/types.js';

// Slackbot is not flagged as a bot in users.list
const SLACKBOT_ID = 'USLACKBOT';

const PAGE_LIMIT = 200;

/**
 * The slice of WebClient this adapter uses. WebClient satisfies it;
 * tests pass an in-memory stand-in.
 */
export interface SlackApi {
  conversations: {
    list(args: { cursor?: string; limit?: number; types?: string; exclude_archived?: boolean }): Promise<ConversationsListResponse>;
    members(args: { channel: string; cursor?: string; limit?: number }): Promise<ConversationsMembersResponse>;
    history(args: { channel: string; oldest?: string; latest?: string; cursor?: string; limit?: number }): Promise<ConversationsHistoryResponse>;
  };
  users: {
    list(args: { cursor?: string; limit?: number }): Promise<UsersListResponse>;
  };
  chat: {
    postMessage(args: { channel: string; text: string }): Promise<ChatPostMessageResponse>;
  };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Slack timestamps are epoch seconds as strings
 */
export function toSlackTimestamp(date: Date): string {
  return String(date.getTime() / 1000);
}

export class SlackWorkspace implements ChatWorkspace {
  private api: SlackApi;
  private channelIds: Map<string, string> = new Map();

  constructor(api: SlackApi) {
    this.api = api;
  }

  /**
   * Resolve "#name" to a channel ID. Anything else is taken to be an ID already.
   */
  async resolveChannelId(channel: string): Promise<string | null> {
    if (!channel.startsWith('#')) return channel;

    const name = channel.slice(1);
    const cached = this.channelIds.get(name);
    if (cached) return cached;

    let cursor: string | undefined;
    do {
      const page = await this.api.conversations.list({
        cursor,
        limit: 1000,
        types: 'public_channel,private_channel',
        exclude_archived: true,
      });
      for (const c of page.channels ?? []) {
        if (c.id && c.name) {
          this.channelIds.set(c.name, c.id);
        }
      }
      const found = this.channelIds.get(name);
      if (found) return found;
      cursor = page.response_metadata?.next_cursor || undefined;
    } while (cursor);

    console.error(`[Slack] Channel ${channel} not found`);
    return null;
  }

  async listMembers(channel: string, style: MemberStyle): Promise<MemberId[] | null> {
    try {
      const channelId = await this.resolveChannelId(channel);
      if (!channelId) return null;

      const memberIds = new Set<string>();
      let cursor: string | undefined;
      do {
        const page = await this.api.conversations.members({ channel: channelId, cursor, limit: PAGE_LIMIT });
        for (const id of page.members ?? []) {
          memberIds.add(id);
        }
        cursor = page.response_metadata?.next_cursor || undefined;
      } while (cursor);

      const members: MemberId[] = [];
      cursor = undefined;
      do {
        const page = await this.api.users.list({ cursor, limit: PAGE_LIMIT });
        for (const user of page.members ?? []) {
          if (!user.id || !memberIds.has(user.id)) continue;
          if (user.is_bot || user.deleted || user.id === SLACKBOT_ID) continue;
          members.push(style === 'mention' ? `<@${user.id}>` : `@${user.name || user.id}`);
        }
        cursor = page.response_metadata?.next_cursor || undefined;
      } while (cursor);

      return members;
    } catch (err) {
      console.error(`[Slack] Error getting members of ${channel}:`, errorMessage(err));
      return null;
    }
  }

  async listRecentMessages(channel: string, since: Date, until: Date): Promise<ChannelMessage[] | null> {
    try {
      const channelId = await this.resolveChannelId(channel);
      if (!channelId) return null;

      const messages: ChannelMessage[] = [];
      let cursor: string | undefined;
      do {
        const page = await this.api.conversations.history({
          channel: channelId,
          oldest: toSlackTimestamp(since),
          latest: toSlackTimestamp(until),
          cursor,
          limit: PAGE_LIMIT,
        });
        for (const message of page.messages ?? []) {
          if (message.text) {
            messages.push({ text: message.text });
          }
        }
        cursor = page.response_metadata?.next_cursor || undefined;
      } while (cursor);

      return messages;
    } catch (err) {
      console.error(`[Slack] Error reading history of ${channel}:`, errorMessage(err));
      return null;
    }
  }

  async postMessage(channel: string, text: string): Promise<boolean> {
    try {
      const channelId = await this.resolveChannelId(channel);
      if (!channelId) return false;

      const result = await this.api.chat.postMessage({ channel: channelId, text });
      if (!result.ok) {
        // Soft failure: the API answered but refused
        console.error(`[Slack] Post to ${channel} rejected: ${result.error ?? 'unknown error'}`);
        return false;
      }

      console.log(`[Slack] Sent to ${channel} (ts: ${result.ts})`);
      return true;
    } catch (err) {
      console.error(`[Slack] Error posting to ${channel}:`, errorMessage(err));
      return false;
    }
  }
}

/**
 * Build a workspace backed by a real WebClient
 */
export function createSlackWorkspace(token: string | undefined): SlackWorkspace {
  if (!token) {
    throw new Error('SLACK_BOT_TOKEN not set');
  }
  return new SlackWorkspace(new WebClient(token));
}
