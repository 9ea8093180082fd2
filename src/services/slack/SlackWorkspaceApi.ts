// MARK: - Slack Workspace API
// WorkspaceApi backed by the Slack Web API client

import { ErrorCode, type WebAPIPlatformError, type WebClient } from '@slack/web-api';
import { MessageNotFoundError, RecoverableApiError } from '../../utils/errors';
import type { Page } from '../../utils/paginate';
import type { ChannelMessage, DirectoryMember, MessageReaction, WorkspaceApi } from './WorkspaceApi';

const DIRECTORY_PAGE_SIZE = 200;
const MEMBERS_PAGE_SIZE = 1000;
const REPLIES_PAGE_SIZE = 200;

interface RawReaction {
  name?: string;
  users?: string[];
}

interface RawMessage {
  ts?: string;
  user?: string;
  subtype?: string;
  reactions?: RawReaction[];
}

export function isPlatformError(error: unknown): error is WebAPIPlatformError {
  return error instanceof Error && 'code' in error && error.code === ErrorCode.PlatformError;
}

function toReactions(raw: RawReaction[] | undefined): MessageReaction[] {
  return (raw ?? []).map(reaction => ({ name: reaction.name, users: reaction.users ?? [] }));
}

function toChannelMessage(raw: RawMessage): ChannelMessage {
  return {
    ts: raw.ts,
    user: raw.user,
    subtype: raw.subtype,
    reactions: toReactions(raw.reactions),
  };
}

export class SlackWorkspaceApi implements WorkspaceApi {
  constructor(private readonly client: WebClient) {}

  async listDirectory(cursor?: string): Promise<Page<DirectoryMember>> {
    const response = await this.client.users.list({ limit: DIRECTORY_PAGE_SIZE, cursor });
    const items: DirectoryMember[] = [];

    for (const member of response.members ?? []) {
      if (!member.id) {
        continue;
      }
      items.push({
        id: member.id,
        name: member.name,
        is_bot: member.is_bot,
        deleted: member.deleted,
        profile: member.profile
          ? {
              display_name: member.profile.display_name,
              display_name_normalized: member.profile.display_name_normalized,
              real_name: member.profile.real_name,
              real_name_normalized: member.profile.real_name_normalized,
            }
          : undefined,
      });
    }

    return { items, nextCursor: response.response_metadata?.next_cursor };
  }

  async listChannelMembers(channelId: string, cursor?: string): Promise<Page<string>> {
    const response = await this.client.conversations.members({
      channel: channelId,
      limit: MEMBERS_PAGE_SIZE,
      cursor,
    });

    return { items: response.members ?? [], nextCursor: response.response_metadata?.next_cursor };
  }

  async getMessage(channelId: string, ts: string): Promise<ChannelMessage> {
    const response = await this.client.conversations.history({
      channel: channelId,
      latest: ts,
      inclusive: true,
      limit: 1,
    });

    const message = response.messages?.[0];
    if (!message || message.ts !== ts) {
      throw new MessageNotFoundError();
    }

    return toChannelMessage(message);
  }

  async getReactions(channelId: string, ts: string): Promise<MessageReaction[]> {
    try {
      const response = await this.client.reactions.get({ channel: channelId, timestamp: ts, full: true });
      return toReactions(response.message?.reactions);
    } catch (error) {
      if (isPlatformError(error)) {
        throw new RecoverableApiError(error.data.error, { cause: error });
      }
      throw error;
    }
  }

  async listThreadReplies(channelId: string, ts: string, cursor?: string): Promise<Page<ChannelMessage>> {
    const response = await this.client.conversations.replies({
      channel: channelId,
      ts,
      limit: REPLIES_PAGE_SIZE,
      cursor,
    });

    return {
      items: (response.messages ?? []).map(toChannelMessage),
      nextCursor: response.response_metadata?.next_cursor,
    };
  }
}
