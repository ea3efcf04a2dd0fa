import type { DataSource, EntityManager } from 'typeorm';

import type { SessionRecord, UserProfile } from '../core/@types';
import {
  parseSessionRecord,
  parseUserProfile,
  type ProfileStore,
  type ProfileUpdater,
} from '../core/memory/profileStore';
import { logger, toErrorMessage } from '../core/shared/logger';
import { systemClock, toIso, type Clock } from '../core/shared/runtime';
import { createDefaultProfile } from '../core/tools/difficulty';
import { SessionRecordEntity } from './entities/SessionRecordEntity';
import { UserProfileEntity } from './entities/UserProfileEntity';

const toProfile = (row: UserProfileEntity): UserProfile =>
  parseUserProfile({
    userId: row.userId,
    role: row.role,
    difficultyLevel: row.difficultyLevel,
    history: row.history,
    vulnerabilityCounts: row.vulnerabilityCounts,
    recentPatternIds: row.recentPatternIds,
    cumulativeTrainingSeconds: Number(row.cumulativeTrainingSeconds),
    totalSessions: row.totalSessions,
    hintsUsedTotal: row.hintsUsedTotal,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  });

const toProfileRow = (manager: EntityManager, profile: UserProfile): UserProfileEntity =>
  manager.create(UserProfileEntity, {
    ...profile,
    createdAt: new Date(profile.createdAt),
    updatedAt: new Date(profile.updatedAt),
  });

const toRecord = (row: SessionRecordEntity): SessionRecord =>
  parseSessionRecord({
    sessionId: row.sessionId,
    userId: row.userId,
    scenarioType: row.scenarioType,
    patternId: row.patternId,
    difficultyLevel: row.difficultyLevel,
    overallScore: row.overallScore === null ? null : Number(row.overallScore),
    riskLevel: row.riskLevel,
    decisionCount: row.decisionCount,
    correctDecisions: row.correctDecisions,
    hintsUsed: row.hintsUsed,
    durationSeconds: Number(row.durationSeconds),
    categoryBreakdown: row.categoryBreakdown,
    completedAt: row.completedAt.toISOString(),
  });

/** Postgres-backed profiles. Read-modify-write runs under a per-user transaction lock. */
export class TypeOrmProfileStore implements ProfileStore {
  public readonly driver = 'postgres' as const;

  public constructor(
    private readonly dataSource: DataSource,
    private readonly clock: Clock = systemClock,
  ) {}

  public async isReady(): Promise<boolean> {
    if (!this.dataSource.isInitialized) {
      return false;
    }

    try {
      await this.dataSource.query('SELECT 1');
      return true;
    } catch (error: unknown) {
      logger.warn('database_unreachable', { error: toErrorMessage(error) });
      return false;
    }
  }

  public async loadProfile(userId: string): Promise<UserProfile> {
    const row = await this.dataSource.getRepository(UserProfileEntity).findOneBy({ userId });
    return row ? toProfile(row) : this.defaultProfile(userId);
  }

  public async saveProfile(profile: UserProfile): Promise<void> {
    const validated = parseUserProfile(profile);
    await this.dataSource.manager.save(toProfileRow(this.dataSource.manager, validated));
  }

  public updateProfile(userId: string, updater: ProfileUpdater): Promise<UserProfile> {
    return this.dataSource.transaction(async (manager) => {
      // Serializes first-time creation too, where there is no row to lock yet.
      await manager.query('SELECT pg_advisory_xact_lock(hashtext($1))', [userId]);

      const row = await manager.findOne(UserProfileEntity, {
        where: { userId },
        lock: { mode: 'pessimistic_write' },
      });
      const next = parseUserProfile(updater(row ? toProfile(row) : this.defaultProfile(userId)));

      if (next.userId !== userId) {
        throw new Error(`Profile updater changed userId ${userId} to ${next.userId}.`);
      }

      const saved = await manager.save(toProfileRow(manager, next));
      return toProfile(saved);
    });
  }

  public async appendSessionRecord(record: SessionRecord): Promise<void> {
    const validated = parseSessionRecord(record);

    await this.dataSource
      .createQueryBuilder()
      .insert()
      .into(SessionRecordEntity)
      .values({ ...validated, completedAt: new Date(validated.completedAt) })
      .orIgnore()
      .execute();
  }

  public async listSessionRecords(userId: string, limit = 20): Promise<SessionRecord[]> {
    if (limit <= 0) {
      return [];
    }

    const rows = await this.dataSource.getRepository(SessionRecordEntity).find({
      where: { userId },
      order: { completedAt: 'DESC' },
      take: limit,
    });

    return rows.map(toRecord);
  }

  private defaultProfile(userId: string): UserProfile {
    return createDefaultProfile(userId, 'general', toIso(this.clock.now()));
  }
}
