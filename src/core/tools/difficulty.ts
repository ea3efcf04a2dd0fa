import {
  VULNERABILITY_CATEGORIES,
  type CategoryCounts,
  type DifficultyAdjustment,
  type DifficultyLevel,
  type OutcomeEntry,
  type ScenarioCatalog,
  type ScenarioPattern,
  type ScenarioType,
  type ScoreResult,
  type UserProfile,
  type UserRole,
  type VulnerabilityCategory,
} from '../@types';
import { pickRandom, type RandomSource } from '../shared/runtime';

export interface AdaptiveConfig {
  /** Minimum overall score that counts as a passed session. */
  passThreshold: number;
  historyWindow: number;
  recencyWindow: number;
}

export const DEFAULT_ADAPTIVE_CONFIG: AdaptiveConfig = {
  passThreshold: 70,
  historyWindow: 10,
  recencyWindow: 5,
};

const RAISE_ABOVE = 0.85;
const LOWER_BELOW = 0.55;
/** At or below this many failures in every category there is no clear weakness. */
const FOCUS_SIGNAL_FLOOR = 3;
const DIFFICULTY_TOLERANCE = 2;

const DIFFICULTY_LEVELS: readonly DifficultyLevel[] = [1, 2, 3, 4, 5];

export const clampDifficulty = (value: number): DifficultyLevel => {
  const rounded = Number.isFinite(value) ? Math.round(value) : 1;
  return DIFFICULTY_LEVELS[Math.max(1, Math.min(5, rounded)) - 1] ?? 1;
};

export const emptyCategoryCounts = (): CategoryCounts => ({
  urgency: 0,
  authority: 0,
  curiosity: 0,
  fear: 0,
  greed: 0,
});

export const sumFailures = (history: readonly OutcomeEntry[]): CategoryCounts => {
  const totals = emptyCategoryCounts();

  for (const entry of history) {
    for (const category of VULNERABILITY_CATEGORIES) {
      totals[category] += entry.failuresByCategory[category];
    }
  }

  return totals;
};

export const nextDifficulty = (
  current: DifficultyLevel,
  scores: readonly (number | null)[],
  passThreshold = DEFAULT_ADAPTIVE_CONFIG.passThreshold,
): DifficultyAdjustment => {
  const scored = scores.filter((score): score is number => score !== null);

  if (scored.length === 0) {
    return { previous: current, next: current, successRate: null, reason: 'insufficient_history' };
  }

  const successRate = scored.filter((score) => score >= passThreshold).length / scored.length;

  if (successRate > RAISE_ABOVE) {
    return { previous: current, next: clampDifficulty(current + 1), successRate, reason: 'performing_well' };
  }

  if (successRate < LOWER_BELOW) {
    return { previous: current, next: clampDifficulty(current - 1), successRate, reason: 'struggling' };
  }

  return { previous: current, next: current, successRate, reason: 'on_target' };
};

/**
 * Picks the category with the most failures. Ties resolve in taxonomy order.
 * Without a clear weakness the category is drawn uniformly at random.
 */
export const selectFocusCategory = (counts: CategoryCounts, random: RandomSource): VulnerabilityCategory => {
  let best: VulnerabilityCategory = VULNERABILITY_CATEGORIES[0];

  for (const category of VULNERABILITY_CATEGORIES) {
    if (counts[category] > counts[best]) {
      best = category;
    }
  }

  if (counts[best] <= FOCUS_SIGNAL_FLOOR) {
    return pickRandom(VULNERABILITY_CATEGORIES, random) ?? best;
  }

  return best;
};

export interface PatternCriteria {
  scenarioType?: ScenarioType;
  difficulty: DifficultyLevel;
  focus: VulnerabilityCategory;
  role: UserRole;
  /** Oldest first. */
  recentPatternIds: readonly string[];
}

const patternFit = (pattern: ScenarioPattern, criteria: PatternCriteria): number => {
  let fit = 0;

  if (pattern.beats.some((beat) => beat.category === criteria.focus)) {
    fit += 2;
  }

  if (pattern.targetRoles.includes(criteria.role)) {
    fit += 1;
  }

  if (Math.abs(pattern.baseDifficulty - criteria.difficulty) <= DIFFICULTY_TOLERANCE) {
    fit += 1;
  }

  return fit;
};

export const selectScenarioPattern = (
  catalog: ScenarioCatalog,
  criteria: PatternCriteria,
  random: RandomSource,
): ScenarioPattern => {
  const candidates = catalog.patterns.filter(
    (pattern) => !criteria.scenarioType || pattern.scenarioType === criteria.scenarioType,
  );

  if (candidates.length === 0) {
    return catalog.fallbacks[criteria.scenarioType ?? 'phishing'];
  }

  const unused = candidates.filter((pattern) => !criteria.recentPatternIds.includes(pattern.id));

  if (unused.length === 0) {
    const lastUse = (pattern: ScenarioPattern): number => criteria.recentPatternIds.lastIndexOf(pattern.id);
    return candidates.reduce((oldest, pattern) => (lastUse(pattern) < lastUse(oldest) ? pattern : oldest));
  }

  const fits = unused.map((pattern) => patternFit(pattern, criteria));
  const bestFit = Math.max(...fits);
  const best = unused.filter((_pattern, index) => fits[index] === bestFit);

  return pickRandom(best, random) ?? unused[0] ?? candidates[0] ?? catalog.fallbacks.phishing;
};

export const createDefaultProfile = (userId: string, role: UserRole, nowIso: string): UserProfile => ({
  userId,
  role,
  difficultyLevel: 1,
  history: [],
  vulnerabilityCounts: emptyCategoryCounts(),
  recentPatternIds: [],
  cumulativeTrainingSeconds: 0,
  totalSessions: 0,
  hintsUsedTotal: 0,
  createdAt: nowIso,
  updatedAt: nowIso,
});

export interface SessionOutcome {
  sessionId: string;
  scenarioType: ScenarioType;
  patternId: string;
  difficultyLevel: DifficultyLevel;
  score: ScoreResult;
  failuresByCategory: CategoryCounts;
  durationSeconds: number;
  hintsUsed: number;
  completedAt: string;
}

export interface AppliedOutcome {
  profile: UserProfile;
  adjustment: DifficultyAdjustment;
}

/** Returns a new profile; the input profile is left untouched. */
export const applySessionOutcome = (
  profile: UserProfile,
  outcome: SessionOutcome,
  config: AdaptiveConfig = DEFAULT_ADAPTIVE_CONFIG,
): AppliedOutcome => {
  const entry: OutcomeEntry = {
    sessionId: outcome.sessionId,
    scenarioType: outcome.scenarioType,
    patternId: outcome.patternId,
    overallScore: outcome.score.overallScore,
    riskLevel: outcome.score.riskLevel,
    difficultyLevel: outcome.difficultyLevel,
    failuresByCategory: { ...outcome.failuresByCategory },
    completedAt: outcome.completedAt,
  };

  const history = [...profile.history, entry].slice(-Math.max(1, config.historyWindow));
  const recentPatternIds = [
    ...profile.recentPatternIds.filter((id) => id !== outcome.patternId),
    outcome.patternId,
  ].slice(-Math.max(1, config.recencyWindow));

  const vulnerabilityCounts = { ...profile.vulnerabilityCounts };
  for (const category of VULNERABILITY_CATEGORIES) {
    vulnerabilityCounts[category] += outcome.failuresByCategory[category];
  }

  const adjustment = nextDifficulty(
    profile.difficultyLevel,
    history.map((item) => item.overallScore),
    config.passThreshold,
  );

  return {
    adjustment,
    profile: {
      ...profile,
      difficultyLevel: adjustment.next,
      history,
      vulnerabilityCounts,
      recentPatternIds,
      cumulativeTrainingSeconds: profile.cumulativeTrainingSeconds + Math.max(0, outcome.durationSeconds),
      totalSessions: profile.totalSessions + 1,
      hintsUsedTotal: profile.hintsUsedTotal + outcome.hintsUsed,
      updatedAt: outcome.completedAt,
    },
  };
};
