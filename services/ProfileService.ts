import { UserProfileModel } from '../models/UserProfileModel';
import { BaseService } from './base/BaseService';
import { validatePayload } from '../shared/schemas/validatePayload';
import { UserProfileSchema } from '../shared/schemas/profileSchemas';
import type { UserProfilePayload } from '../shared/schemas/profileSchemas';
import { systemClock } from '../utils/dates';
import type { Clock } from '../utils/dates';
import type { StoreResult, UserProfile } from '../shared/types';

interface ProfileServiceDeps {
  userProfileModel: UserProfileModel;
  clock?: Clock;
}

export class ProfileService extends BaseService<ProfileServiceDeps> {
  private readonly clock: Clock;

  constructor(deps: ProfileServiceDeps) {
    super('ProfileService', deps);
    this.clock = deps.clock ?? systemClock;
    this.logger.info("[ProfileService] Initialized.");
  }

  /**
   * Get the user profile, or null before one has been saved.
   */
  async getProfile(): Promise<UserProfile | null> {
    return this.execute('getProfile', async () => this.deps.userProfileModel.get());
  }

  /**
   * Replace the profile. The first creation time is kept across saves.
   */
  async saveProfile(payload: UserProfilePayload): Promise<StoreResult<UserProfile>> {
    return this.executeWrite('saveProfile', 'profile', async () => {
      const data = validatePayload(UserProfileSchema, payload, 'profile');
      const existing = this.deps.userProfileModel.get();

      const profile = this.deps.userProfileModel.save({
        ...data,
        createdAt: data.createdAt ?? existing?.createdAt ?? this.clock().toISOString(),
      });

      this.logger.info("[ProfileService] Profile saved:", { name: profile.name });
      return profile;
    });
  }
}
