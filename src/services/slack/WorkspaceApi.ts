// MARK: - Workspace API Contract
// The platform operations the engagement engine reads from

import type { Page } from '../../utils/paginate';

export interface MemberProfile {
  display_name?: string;
  display_name_normalized?: string;
  real_name?: string;
  real_name_normalized?: string;
}

export interface DirectoryMember {
  id: string;
  name?: string;
  is_bot?: boolean;
  deleted?: boolean;
  profile?: MemberProfile;
}

export interface MessageReaction {
  name?: string;
  users?: string[];
}

export interface ChannelMessage {
  ts?: string;
  user?: string;
  subtype?: string;
  reactions?: MessageReaction[];
}

export interface WorkspaceApi {
  listDirectory(cursor?: string): Promise<Page<DirectoryMember>>;
  listChannelMembers(channelId: string, cursor?: string): Promise<Page<string>>;
  /** Rejects with MessageNotFoundError when nothing exists at `ts`. */
  getMessage(channelId: string, ts: string): Promise<ChannelMessage>;
  /** Rejects with RecoverableApiError when the platform refuses the lookup. */
  getReactions(channelId: string, ts: string): Promise<MessageReaction[]>;
  listThreadReplies(channelId: string, ts: string, cursor?: string): Promise<Page<ChannelMessage>>;
}
