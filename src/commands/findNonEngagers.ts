// MARK: - Find Non-Engagers Shortcut
// Message shortcut that DMs the requester a non-engager report

import { metrics } from '../health';
import { buildCsv, buildSummaryText } from '../services/ResultRenderer';
import { describeError } from '../utils/errors';
import { InflightGuard } from '../utils/inflightGuard';
import { logger } from '../utils/logger';
import { buildThreadLink } from '../utils/permalink';
import { DUPLICATE_TRIGGER_TEXT, failureText, type CommandContext } from './context';

export const CALLBACK_ID = 'find_non_engagers';

export interface ShortcutRequest {
  userId: string;
  teamId?: string;
  channelId: string;
  ts: string;
}

export function buildHeading(request: ShortcutRequest): string {
  if (!request.teamId) {
    return '*Non-engagers for this message*';
  }
  const link = buildThreadLink(request.teamId, request.channelId, request.ts);
  return `*Non-engagers for <${link}|this message>*`;
}

export async function execute(request: ShortcutRequest, context: CommandContext): Promise<void> {
  const { userId, channelId, ts } = request;
  const key = InflightGuard.key(userId, channelId, ts);

  try {
    const outcome = await context.guard.run(key, async () => {
      const result = await context.engine.computeNonEngagers(channelId, ts);
      const dmChannelId = await context.messenger.openDirectMessage(userId);

      await context.messenger.postMessage(
        dmChannelId,
        buildSummaryText(result, { limit: context.summaryLimit, heading: buildHeading(request) }),
      );

      if (result.nonEngagedIds.length > 0) {
        await context.messenger.uploadCsv(dmChannelId, buildCsv(result));
      }
      return result;
    });

    if (!outcome.started) {
      metrics.duplicateTriggers++;
      await context.messenger.postEphemeral(channelId, userId, DUPLICATE_TRIGGER_TEXT);
      return;
    }

    metrics.computationsCompleted++;
    logger.info('Shortcut executed', {
      callbackId: CALLBACK_ID,
      userId,
      channelId,
      ts,
      nonEngaged: outcome.value.nonEngagedIds.length,
    });
  } catch (error) {
    metrics.computationsFailed++;
    logger.error('Shortcut execution failed', {
      callbackId: CALLBACK_ID,
      userId,
      channelId,
      ts,
      error: describeError(error),
      stack: error instanceof Error ? error.stack : undefined,
    });

    await context.messenger.postEphemeral(channelId, userId, failureText(describeError(error)));
  }
}
