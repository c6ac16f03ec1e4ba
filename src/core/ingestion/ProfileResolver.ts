import type { Logger } from '../../infra/logger/logger.js';
import { errorMessage } from '../../infra/logger/logger.js';
import type { UserDirectory } from '../../adapter/slack/types.js';
import type { Profile } from '../storage/types.js';

export function unknownProfile(userId: string): Profile {
  return { id: userId, name: 'Unknown', realName: '', displayName: '', email: '' };
}

/**
 * Looks up the sender of each message. No caching: every call hits the directory.
 */
export class ProfileResolver {
  constructor(
    private directory: UserDirectory,
    private logger: Logger,
  ) {}

  /** Never rejects; a failed lookup yields the "Unknown" placeholder. */
  async resolve(userId: string): Promise<Profile> {
    try {
      const user = await this.directory.usersInfo(userId);
      return {
        id: user.id,
        name: user.name,
        realName: user.real_name ?? '',
        displayName: user.profile?.display_name ?? '',
        email: user.profile?.email ?? '',
      };
    } catch (err) {
      this.logger.warn('profile', `Lookup failed for ${userId}: ${errorMessage(err)}`);
      return unknownProfile(userId);
    }
  }
}
