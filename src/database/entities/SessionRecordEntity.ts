import { Column, Entity, Index, PrimaryColumn } from 'typeorm';

import type { CategoryBreakdown } from '../../core/@types';

@Entity({ name: 'session_records' })
@Index(['userId', 'completedAt'])
export class SessionRecordEntity {
  @PrimaryColumn({ name: 'session_id', type: 'uuid' })
  sessionId!: string;

  @Column({ name: 'user_id', type: 'varchar', length: 120 })
  userId!: string;

  @Column({ name: 'scenario_type', type: 'varchar', length: 32 })
  scenarioType!: string;

  @Column({ name: 'pattern_id', type: 'varchar', length: 120 })
  patternId!: string;

  @Column({ name: 'difficulty_level', type: 'smallint' })
  difficultyLevel!: number;

  @Column({ name: 'overall_score', type: 'real', nullable: true })
  overallScore!: number | null;

  @Column({ name: 'risk_level', type: 'varchar', length: 32 })
  riskLevel!: string;

  @Column({ name: 'decision_count', type: 'integer' })
  decisionCount!: number;

  @Column({ name: 'correct_decisions', type: 'integer' })
  correctDecisions!: number;

  @Column({ name: 'hints_used', type: 'integer', default: 0 })
  hintsUsed!: number;

  @Column({ name: 'duration_seconds', type: 'double precision' })
  durationSeconds!: number;

  @Column({ name: 'category_breakdown', type: 'jsonb' })
  categoryBreakdown!: CategoryBreakdown[];

  @Column({ name: 'completed_at', type: 'timestamptz' })
  completedAt!: Date;
}
