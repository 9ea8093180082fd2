// MARK: - /nonengagers Command
// Reports non-engagers for a message given by its permalink

import { metrics } from '../health';
import { buildCsv, buildStatsLine, buildSummaryText, EVERYONE_ENGAGED_TEXT } from '../services/ResultRenderer';
import { describeError } from '../utils/errors';
import { InflightGuard } from '../utils/inflightGuard';
import { logger } from '../utils/logger';
import { parsePermalink } from '../utils/permalink';
import { DUPLICATE_TRIGGER_TEXT, failureText, type CommandContext } from './context';

export const COMMAND_NAME = '/nonengagers';

export const USAGE_TEXT =
  'Usage: `/nonengagers <message link>`\n' +
  'Tip: Long-press a message → *Copy link* and paste here.';

export const DM_SENT_TEXT = 'I’ve DMed you the results (CSV + summary).';

export interface NonEngagersRequest {
  userId: string;
  text: string;
}

export type Respond = (text: string) => Promise<void>;

export async function execute(request: NonEngagersRequest, respond: Respond, context: CommandContext): Promise<void> {
  const location = parsePermalink(request.text.trim());
  if (!location) {
    await respond(USAGE_TEXT);
    return;
  }

  const { channelId, ts } = location;
  const key = InflightGuard.key(request.userId, channelId, ts);

  try {
    const outcome = await context.guard.run(key, async () => {
      const result = await context.engine.computeNonEngagers(channelId, ts);

      if (result.nonEngagedIds.length === 0) {
        await respond(`${buildStatsLine(result)}\n\n${EVERYONE_ENGAGED_TEXT}`);
        return result;
      }

      const dmChannelId = await context.messenger.openDirectMessage(request.userId);
      await respond(DM_SENT_TEXT);
      await context.messenger.postMessage(dmChannelId, buildSummaryText(result, { limit: context.summaryLimit }));
      await context.messenger.uploadCsv(dmChannelId, buildCsv(result));
      return result;
    });

    if (!outcome.started) {
      metrics.duplicateTriggers++;
      await respond(DUPLICATE_TRIGGER_TEXT);
      return;
    }

    metrics.computationsCompleted++;
    logger.info('Command executed', {
      commandName: COMMAND_NAME,
      userId: request.userId,
      channelId,
      ts,
      nonEngaged: outcome.value.nonEngagedIds.length,
    });
  } catch (error) {
    metrics.computationsFailed++;
    logger.error('Command execution failed', {
      commandName: COMMAND_NAME,
      userId: request.userId,
      channelId,
      ts,
      error: describeError(error),
      stack: error instanceof Error ? error.stack : undefined,
    });

    await respond(failureText(describeError(error)));
  }
}
