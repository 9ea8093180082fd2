// MARK: - Direct Messenger
// Private delivery of results to the requesting user

import type { WebClient } from '@slack/web-api';

export const CSV_FILENAME = 'non_engagers.csv';
export const CSV_TITLE = 'Non-engagers';

export interface Messenger {
  openDirectMessage(userId: string): Promise<string>;
  postMessage(channelId: string, text: string): Promise<void>;
  postEphemeral(channelId: string, userId: string, text: string): Promise<void>;
  uploadCsv(channelId: string, content: Buffer): Promise<void>;
}

export class DirectMessenger implements Messenger {
  constructor(private readonly client: WebClient) {}

  async openDirectMessage(userId: string): Promise<string> {
    const response = await this.client.conversations.open({ users: userId });
    const channelId = response.channel?.id;
    if (!channelId) {
      throw new Error(`Could not open a direct message with ${userId}`);
    }
    return channelId;
  }

  async postMessage(channelId: string, text: string): Promise<void> {
    await this.client.chat.postMessage({ channel: channelId, text });
  }

  async postEphemeral(channelId: string, userId: string, text: string): Promise<void> {
    await this.client.chat.postEphemeral({ channel: channelId, user: userId, text });
  }

  async uploadCsv(channelId: string, content: Buffer): Promise<void> {
    await this.client.files.uploadV2({
      channel_id: channelId,
      filename: CSV_FILENAME,
      title: CSV_TITLE,
      file: content,
    });
  }
}
