// MARK: - Reconciliation Engine
// Combines population and engagement into the non-engager report

import { logger } from '../utils/logger';
import { DirectoryResolver, formatMemberName } from './DirectoryResolver';
import { EngagementCollector } from './EngagementCollector';
import { PopulationResolver } from './PopulationResolver';
import type { WorkspaceApi } from './slack/WorkspaceApi';

export interface NonEngagerResult {
  /** Countable channel members, exclusions already removed. */
  populationIds: Set<string>;
  /** Engaged members who belong to the channel population. */
  engagedIds: Set<string>;
  /** Population minus engaged, sorted by identifier. */
  nonEngagedIds: string[];
  /** Display names, index-aligned with nonEngagedIds. */
  nonEngagedNames: string[];
}

export interface ReconciliationOptions {
  excludedUserIds?: ReadonlySet<string>;
}

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export class ReconciliationEngine {
  private readonly directoryResolver: DirectoryResolver;
  private readonly populationResolver: PopulationResolver;
  private readonly engagementCollector: EngagementCollector;
  private readonly excludedUserIds: ReadonlySet<string>;

  constructor(private readonly api: WorkspaceApi, options: ReconciliationOptions = {}) {
    this.directoryResolver = new DirectoryResolver(api);
    this.populationResolver = new PopulationResolver(api);
    this.engagementCollector = new EngagementCollector(api);
    this.excludedUserIds = new Set(options.excludedUserIds ?? []);
  }

  async computeNonEngagers(channelId: string, ts: string): Promise<NonEngagerResult> {
    const directory = await this.directoryResolver.resolveDirectory();
    const population = await this.populationResolver.resolvePopulation(channelId, directory);
    const message = await this.api.getMessage(channelId, ts);

    const reactors = await this.engagementCollector.collectReactors(channelId, ts);
    const repliers = await this.engagementCollector.collectRepliers(channelId, ts);

    const engaged = new Set<string>([...reactors.userIds, ...repliers]);
    if (message.user) {
      engaged.add(message.user);
    }

    // Engagement from outside the channel does not count.
    const engagedIds = new Set([...engaged].filter(userId => population.has(userId)));

    // Exclusions apply to the population only, after the intersection above.
    const populationIds = new Set([...population].filter(userId => !this.excludedUserIds.has(userId)));

    const nonEngagedIds = [...populationIds].filter(userId => !engagedIds.has(userId)).sort(compareIds);
    const nonEngagedNames = nonEngagedIds.map(userId => formatMemberName(directory.get(userId)));

    logger.info('Non-engagers computed', {
      channelId,
      ts,
      population: populationIds.size,
      engaged: engagedIds.size,
      nonEngaged: nonEngagedIds.length,
      reactionSource: reactors.source,
    });

    return { populationIds, engagedIds, nonEngagedIds, nonEngagedNames };
  }
}
