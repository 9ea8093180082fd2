// MARK: - Command Context
// Collaborators shared by the command and shortcut handlers

import type { InflightGuard } from '../utils/inflightGuard';
import type { NonEngagerResult } from '../services/ReconciliationEngine';
import type { Messenger } from '../services/slack/DirectMessenger';

export interface NonEngagerComputer {
  computeNonEngagers(channelId: string, ts: string): Promise<NonEngagerResult>;
}

export interface CommandContext {
  engine: NonEngagerComputer;
  messenger: Messenger;
  guard: InflightGuard;
  summaryLimit: number;
}

export const DUPLICATE_TRIGGER_TEXT = 'Already working on that message — results will arrive by DM.';

export function failureText(errorMessage: string): string {
  return `Sorry, I couldn’t compute that: \`${errorMessage}\``;
}
