// MARK: - Population Resolver
// Channel members who count toward engagement

import { paginate } from '../utils/paginate';
import { logger } from '../utils/logger';
import type { MemberDirectory } from './DirectoryResolver';
import type { DirectoryMember, WorkspaceApi } from './slack/WorkspaceApi';

export const SYSTEM_USER_ID = 'USLACKBOT';

export function keepMember(member: DirectoryMember | undefined): member is DirectoryMember {
  if (!member) {
    return false;
  }
  if (member.is_bot || member.id === SYSTEM_USER_ID) {
    return false;
  }
  if (member.deleted) {
    return false;
  }
  return true;
}

export class PopulationResolver {
  constructor(private readonly api: WorkspaceApi) {}

  async resolvePopulation(channelId: string, directory: MemberDirectory): Promise<Set<string>> {
    const population = new Set<string>();
    let skipped = 0;

    for await (const memberIds of paginate(cursor => this.api.listChannelMembers(channelId, cursor))) {
      for (const memberId of memberIds) {
        if (keepMember(directory.get(memberId))) {
          population.add(memberId);
        } else {
          skipped++;
        }
      }
    }

    logger.debug('Channel population resolved', { channelId, population: population.size, skipped });
    return population;
  }
}
