import { vi } from 'vitest';
import type { CommandContext } from '../../src/commands/context';
import type { NonEngagerResult } from '../../src/services/ReconciliationEngine';
import { InflightGuard } from '../../src/utils/inflightGuard';

export function buildResult(nonEngaged: Array<[string, string]>): NonEngagerResult {
  return {
    populationIds: new Set(['UA', 'U1', ...nonEngaged.map(([id]) => id)]),
    engagedIds: new Set(['UA', 'U1']),
    nonEngagedIds: nonEngaged.map(([id]) => id),
    nonEngagedNames: nonEngaged.map(([, name]) => name),
  };
}

export function createCommandContext(result: NonEngagerResult) {
  const computeNonEngagers = vi.fn().mockResolvedValue(result);
  const messenger = {
    openDirectMessage: vi.fn().mockResolvedValue('D1'),
    postMessage: vi.fn().mockResolvedValue(undefined),
    postEphemeral: vi.fn().mockResolvedValue(undefined),
    uploadCsv: vi.fn().mockResolvedValue(undefined),
  };

  const context: CommandContext = {
    engine: { computeNonEngagers },
    messenger,
    guard: new InflightGuard(),
    summaryLimit: 20,
  };

  return { context, computeNonEngagers, messenger };
}
