// MARK: - Commands Index
// Registers the slash command and message shortcut on the Bolt app

import type { App } from '@slack/bolt';
import { logger } from '../utils/logger';
import type { CommandContext } from './context';
import * as findNonEngagers from './findNonEngagers';
import * as nonEngagers from './nonEngagers';

export function registerCommands(app: App, context: CommandContext): void {
  app.command(nonEngagers.COMMAND_NAME, async ({ ack, command, respond }) => {
    await ack();
    await nonEngagers.execute(
      { userId: command.user_id, text: command.text },
      async text => {
        await respond(text);
      },
      context,
    );
  });

  app.shortcut(findNonEngagers.CALLBACK_ID, async ({ ack, shortcut }) => {
    await ack();

    if (shortcut.type !== 'message_action') {
      logger.warn('Shortcut invoked outside a message', { callbackId: shortcut.callback_id });
      return;
    }

    await findNonEngagers.execute(
      {
        userId: shortcut.user.id,
        teamId: shortcut.team?.id,
        channelId: shortcut.channel.id,
        ts: shortcut.message.ts,
      },
      context,
    );
  });

  logger.info('Registered handlers', {
    command: nonEngagers.COMMAND_NAME,
    shortcut: findNonEngagers.CALLBACK_ID,
  });
}
