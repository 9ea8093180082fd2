// MARK: - Result Renderer
// Human summary and CSV export of a non-engager report

import { DEFAULT_SUMMARY_LIMIT } from '../config';
import type { NonEngagerResult } from './ReconciliationEngine';

export const EVERYONE_ENGAGED_TEXT = '🎉 Everyone engaged (reacted or replied)!';

const CSV_HEADER = ['user_id', 'name'];

export interface SummaryOptions {
  limit?: number;
  /** Optional first line, e.g. a link back to the message. */
  heading?: string;
}

/**
 * Bulleted names up to `limit`, with an overflow count line when truncated.
 */
export function summarizeNames(names: string[], limit = DEFAULT_SUMMARY_LIMIT): string {
  const shown = names.slice(0, limit);
  const extra = names.length - shown.length;
  const lines = shown.map(name => `• ${name}`);

  if (extra > 0) {
    lines.push(`…and ${extra} more`);
  }

  return lines.join('\n');
}

export function buildStatsLine(result: NonEngagerResult): string {
  return (
    `*Members considered:* ${result.populationIds.size}  ·  ` +
    `*Engaged:* ${result.engagedIds.size}  ·  ` +
    `*Non-engagers:* ${result.nonEngagedIds.length}`
  );
}

export function buildSummaryText(result: NonEngagerResult, options: SummaryOptions = {}): string {
  const body = result.nonEngagedNames.length > 0
    ? summarizeNames(result.nonEngagedNames, options.limit)
    : EVERYONE_ENGAGED_TEXT;

  const sections = [buildStatsLine(result), '', body];
  if (options.heading) {
    sections.unshift(options.heading);
  }

  return sections.join('\n');
}

function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Complete export, one row per non-engager in identifier order.
 */
export function buildCsv(result: NonEngagerResult): Buffer {
  const rows = [CSV_HEADER];
  result.nonEngagedIds.forEach((userId, index) => {
    rows.push([userId, result.nonEngagedNames[index] ?? '']);
  });

  const text = rows.map(row => row.map(escapeCsvField).join(',')).join('\r\n') + '\r\n';
  return Buffer.from(text, 'utf-8');
}
