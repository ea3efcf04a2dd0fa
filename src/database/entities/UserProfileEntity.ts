import { Check, Column, Entity, PrimaryColumn } from 'typeorm';

import type { CategoryCounts, OutcomeEntry } from '../../core/@types';

@Entity({ name: 'user_profiles' })
@Check(`"difficulty_level" BETWEEN 1 AND 5`)
export class UserProfileEntity {
  @PrimaryColumn({ name: 'user_id', type: 'varchar', length: 120 })
  userId!: string;

  @Column({ type: 'varchar', length: 32, default: 'general' })
  role!: string;

  @Column({ name: 'difficulty_level', type: 'smallint', default: 1 })
  difficultyLevel!: number;

  @Column({ type: 'jsonb', default: () => `'[]'` })
  history!: OutcomeEntry[];

  @Column({ name: 'vulnerability_counts', type: 'jsonb' })
  vulnerabilityCounts!: CategoryCounts;

  @Column({ name: 'recent_pattern_ids', type: 'jsonb', default: () => `'[]'` })
  recentPatternIds!: string[];

  @Column({ name: 'cumulative_training_seconds', type: 'double precision', default: 0 })
  cumulativeTrainingSeconds!: number;

  @Column({ name: 'total_sessions', type: 'integer', default: 0 })
  totalSessions!: number;

  @Column({ name: 'hints_used_total', type: 'integer', default: 0 })
  hintsUsedTotal!: number;

  @Column({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @Column({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;
}
