import { z } from 'zod';

import {
  SCENARIO_TYPES,
  USER_ROLES,
  VULNERABILITY_CATEGORIES,
  type SessionRecord,
  type UserProfile,
} from '../@types';

/** Receives the stored profile, or a fresh default one for a new user. */
export type PersistenceDriver = 'memory' | 'postgres';

export type ProfileUpdater = (current: UserProfile) => UserProfile;

/**
 * Persistence boundary for learner profiles and finished sessions.
 * `loadProfile` never misses: an unknown user gets a default, unsaved profile.
 * `updateProfile` is an atomic read-modify-write per user.
 */
export interface ProfileStore {
  readonly driver: PersistenceDriver;
  /** False when the backing store cannot currently serve reads. */
  isReady(): Promise<boolean>;
  loadProfile(userId: string): Promise<UserProfile>;
  saveProfile(profile: UserProfile): Promise<void>;
  updateProfile(userId: string, updater: ProfileUpdater): Promise<UserProfile>;
  appendSessionRecord(record: SessionRecord): Promise<void>;
  /** Newest first. */
  listSessionRecords(userId: string, limit?: number): Promise<SessionRecord[]>;
}

const difficultySchema = z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4), z.literal(5)]);

const riskLevelSchema = z.enum(['critical', 'high', 'moderate', 'low', 'insufficient_data']);

export const categoryCountsSchema = z.object({
  urgency: z.number().int().min(0),
  authority: z.number().int().min(0),
  curiosity: z.number().int().min(0),
  fear: z.number().int().min(0),
  greed: z.number().int().min(0),
});

const outcomeEntrySchema = z.object({
  sessionId: z.string().min(1),
  scenarioType: z.enum(SCENARIO_TYPES),
  patternId: z.string().min(1),
  overallScore: z.number().nullable(),
  riskLevel: riskLevelSchema,
  difficultyLevel: difficultySchema,
  failuresByCategory: categoryCountsSchema,
  completedAt: z.string().datetime(),
});

export const userProfileSchema = z.object({
  userId: z.string().min(1),
  role: z.enum(USER_ROLES),
  difficultyLevel: difficultySchema,
  history: z.array(outcomeEntrySchema),
  vulnerabilityCounts: categoryCountsSchema,
  recentPatternIds: z.array(z.string().min(1)),
  cumulativeTrainingSeconds: z.number().min(0),
  totalSessions: z.number().int().min(0),
  hintsUsedTotal: z.number().int().min(0),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
});

export const categoryBreakdownSchema = z.object({
  category: z.enum(VULNERABILITY_CATEGORIES),
  decisionCount: z.number().int().min(0),
  averageScore: z.number(),
  failures: z.number().int().min(0),
  trend: z.array(z.number()),
});

export const sessionRecordSchema = z.object({
  sessionId: z.string().min(1),
  userId: z.string().min(1),
  scenarioType: z.enum(SCENARIO_TYPES),
  patternId: z.string().min(1),
  difficultyLevel: difficultySchema,
  overallScore: z.number().nullable(),
  riskLevel: riskLevelSchema,
  decisionCount: z.number().int().min(0),
  correctDecisions: z.number().int().min(0),
  hintsUsed: z.number().int().min(0),
  durationSeconds: z.number().min(0),
  categoryBreakdown: z.array(categoryBreakdownSchema),
  completedAt: z.string().datetime(),
});

export const parseUserProfile = (raw: unknown): UserProfile => userProfileSchema.parse(raw);

export const parseSessionRecord = (raw: unknown): SessionRecord => sessionRecordSchema.parse(raw);
