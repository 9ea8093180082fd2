// MARK: - Engagement Collector
// Who reacted to a message, and who replied in its thread

import { paginate } from '../utils/paginate';
import { describeError, RecoverableApiError } from '../utils/errors';
import { logger } from '../utils/logger';
import type { MessageReaction, WorkspaceApi } from './slack/WorkspaceApi';

export type ReactionSource = 'reactions' | 'message';

export interface ReactorResult {
  userIds: Set<string>;
  /** Which lookup produced the reactions; `message` means the fallback ran. */
  source: ReactionSource;
}

function reactionUsers(reactions: MessageReaction[] | undefined): Set<string> {
  const users = new Set<string>();
  for (const reaction of reactions ?? []) {
    for (const userId of reaction.users ?? []) {
      users.add(userId);
    }
  }
  return users;
}

export class EngagementCollector {
  constructor(private readonly api: WorkspaceApi) {}

  /**
   * Reads reactions directly, falling back to the message body only when the
   * platform rejects the direct lookup.
   */
  async collectReactors(channelId: string, ts: string): Promise<ReactorResult> {
    try {
      const reactions = await this.api.getReactions(channelId, ts);
      return { userIds: reactionUsers(reactions), source: 'reactions' };
    } catch (error) {
      if (!(error instanceof RecoverableApiError)) {
        throw error;
      }

      logger.info('Reaction lookup rejected, reading reactions from message body', {
        channelId,
        ts,
        apiError: error.apiError,
      });

      const message = await this.api.getMessage(channelId, ts);
      return { userIds: reactionUsers(message.reactions), source: 'message' };
    }
  }

  /**
   * Authors of plain thread replies, minus the parent message's author.
   */
  async collectRepliers(channelId: string, ts: string): Promise<Set<string>> {
    const repliers = new Set<string>();

    for await (const messages of paginate(cursor => this.api.listThreadReplies(channelId, ts, cursor))) {
      for (const message of messages) {
        if (message.user && !message.subtype) {
          repliers.add(message.user);
        }
      }
    }

    // A failed parent lookup leaves the set as collected.
    try {
      const parent = await this.api.getMessage(channelId, ts);
      if (parent.user) {
        repliers.delete(parent.user);
      }
    } catch (error) {
      logger.warn('Could not resolve thread parent author, keeping all repliers', {
        channelId,
        ts,
        error: describeError(error),
      });
    }

    return repliers;
  }
}
