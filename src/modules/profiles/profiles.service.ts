import type { SessionRecord, UserProfile } from '../../core/@types';
import type { ProfileStore } from '../../core/memory/profileStore';

export class ProfilesService {
  public constructor(private readonly store: ProfileStore) {}

  /** Users who have not trained yet get the starting profile. */
  public getProfile(userId: string): Promise<UserProfile> {
    return this.store.loadProfile(userId);
  }

  public listSessions(userId: string, limit: number): Promise<SessionRecord[]> {
    return this.store.listSessionRecords(userId, limit);
  }
}
