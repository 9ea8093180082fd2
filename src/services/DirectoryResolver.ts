// MARK: - Directory Resolver
// Workspace member lookup and display-name formatting

import { collectPages } from '../utils/paginate';
import { logger } from '../utils/logger';
import type { DirectoryMember, WorkspaceApi } from './slack/WorkspaceApi';

export type MemberDirectory = Map<string, DirectoryMember>;

/**
 * Picks the label shown for a member. Order matters:
 * "display (real)" when both exist and differ, then display, real, handle, id.
 */
export function formatMemberName(member: DirectoryMember | undefined): string {
  const profile = member?.profile ?? {};
  const display = profile.display_name_normalized || profile.display_name;
  const real = profile.real_name_normalized || profile.real_name;

  if (display && display !== real) {
    return real ? `${display} (${real})` : display;
  }

  return display || real || member?.name || member?.id || 'unknown';
}

export class DirectoryResolver {
  constructor(private readonly api: WorkspaceApi) {}

  /**
   * Fetches the whole workspace directory, regardless of channel size.
   */
  async resolveDirectory(): Promise<MemberDirectory> {
    const members = await collectPages(cursor => this.api.listDirectory(cursor));
    const directory: MemberDirectory = new Map();

    for (const member of members) {
      directory.set(member.id, member);
    }

    logger.debug('Directory resolved', { members: directory.size });
    return directory;
  }
}
