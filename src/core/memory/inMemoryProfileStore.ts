import type { SessionRecord, UserProfile } from '../@types';
import { KeyedSerialQueue } from '../shared/keyed-queue';
import { systemClock, toIso, type Clock } from '../shared/runtime';
import { createDefaultProfile } from '../tools/difficulty';
import {
  parseSessionRecord,
  parseUserProfile,
  type ProfileStore,
  type ProfileUpdater,
} from './profileStore';

/**
 * Keeps serialized JSON rather than live objects so callers can never mutate
 * stored state, and every read goes through the same validation as Postgres.
 */
export class InMemoryProfileStore implements ProfileStore {
  public readonly driver = 'memory' as const;
  private readonly profiles = new Map<string, string>();
  private readonly records = new Map<string, string[]>();
  private readonly userQueue = new KeyedSerialQueue();

  public constructor(private readonly clock: Clock = systemClock) {}

  public isReady(): Promise<boolean> {
    return Promise.resolve(true);
  }

  public loadProfile(userId: string): Promise<UserProfile> {
    return Promise.resolve(this.readProfile(userId));
  }

  public saveProfile(profile: UserProfile): Promise<void> {
    return this.userQueue.run(profile.userId, () => {
      this.writeProfile(profile);
      return Promise.resolve();
    });
  }

  public updateProfile(userId: string, updater: ProfileUpdater): Promise<UserProfile> {
    return this.userQueue.run(userId, () => {
      const next = updater(this.readProfile(userId));

      if (next.userId !== userId) {
        return Promise.reject(new Error(`Profile updater changed userId ${userId} to ${next.userId}.`));
      }

      this.writeProfile(next);
      return Promise.resolve(parseUserProfile(JSON.parse(JSON.stringify(next))));
    });
  }

  public appendSessionRecord(record: SessionRecord): Promise<void> {
    const validated = parseSessionRecord(record);
    const existing = this.records.get(validated.userId) ?? [];

    if (!existing.some((item) => parseSessionRecord(JSON.parse(item)).sessionId === validated.sessionId)) {
      this.records.set(validated.userId, [...existing, JSON.stringify(validated)]);
    }

    return Promise.resolve();
  }

  public listSessionRecords(userId: string, limit = 20): Promise<SessionRecord[]> {
    const stored = this.records.get(userId) ?? [];
    return Promise.resolve(
      stored
        .map((item) => parseSessionRecord(JSON.parse(item)))
        .reverse()
        .slice(0, Math.max(0, limit)),
    );
  }

  private readProfile(userId: string): UserProfile {
    const stored = this.profiles.get(userId);
    return stored === undefined
      ? createDefaultProfile(userId, 'general', toIso(this.clock.now()))
      : parseUserProfile(JSON.parse(stored));
  }

  private writeProfile(profile: UserProfile): void {
    this.profiles.set(profile.userId, JSON.stringify(parseUserProfile(profile)));
  }
}
