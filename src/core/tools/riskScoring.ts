import {
  VULNERABILITY_CATEGORIES,
  type CategoryBreakdown,
  type DecisionPoint,
  type DifficultyLevel,
  type InsufficientDataResult,
  type Recommendation,
  type ScoreResult,
  type ScoredRiskLevel,
  type UserAction,
  type VulnerabilityCategory,
} from '../@types';

export interface ScoringConfig {
  actionPoints: Record<UserAction, number>;
  /** Weight grows by this much per difficulty level: `1 + step * level`. */
  difficultyStep: number;
  categoryMultipliers: Partial<Record<VulnerabilityCategory, number>>;
  maxRecommendations: number;
}

export interface ScoringOverrides {
  actionPoints?: Partial<Record<UserAction, number>>;
  difficultyStep?: number;
  categoryMultipliers?: Partial<Record<VulnerabilityCategory, number>>;
  maxRecommendations?: number;
}

export const MAX_ACTION_POINTS = 100;

export const DEFAULT_SCORING_CONFIG: ScoringConfig = {
  actionPoints: {
    recognized_and_reported: 100,
    verified_first: 80,
    hesitated_then_complied: 40,
    complied_immediately: 0,
  },
  difficultyStep: 0.1,
  categoryMultipliers: {},
  maxRecommendations: 3,
};

const CATEGORY_ADVICE: Record<VulnerabilityCategory, string> = {
  urgency: 'Slow down when a message insists on immediate action; deadlines are a pressure tactic.',
  authority: 'Verify claims of seniority or official status through a channel you already trust.',
  curiosity: 'Treat unexpected links, attachments and teasers as untrusted until the sender is confirmed.',
  fear: 'Threats of account loss or penalties are designed to bypass judgement; check before reacting.',
  greed: 'Offers of bonuses, refunds or prizes that need your credentials are almost always lures.',
};

const clampPoints = (value: number): number => Math.max(0, Math.min(MAX_ACTION_POINTS, value));

const roundTo = (value: number, decimals: number): number => {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
};

export const createScoringConfig = (overrides: ScoringOverrides = {}): ScoringConfig => {
  return {
    actionPoints: {
      ...DEFAULT_SCORING_CONFIG.actionPoints,
      ...overrides.actionPoints,
    },
    difficultyStep: overrides.difficultyStep ?? DEFAULT_SCORING_CONFIG.difficultyStep,
    categoryMultipliers: {
      ...DEFAULT_SCORING_CONFIG.categoryMultipliers,
      ...overrides.categoryMultipliers,
    },
    maxRecommendations: overrides.maxRecommendations ?? DEFAULT_SCORING_CONFIG.maxRecommendations,
  };
};

export const actionPoints = (action: UserAction, config: ScoringConfig = DEFAULT_SCORING_CONFIG): number => {
  return clampPoints(config.actionPoints[action]);
};

export const difficultyWeight = (
  level: DifficultyLevel,
  category: VulnerabilityCategory,
  config: ScoringConfig = DEFAULT_SCORING_CONFIG,
): number => {
  return (1 + config.difficultyStep * level) * (config.categoryMultipliers[category] ?? 1);
};

/** Weighted deficit from a perfect response. */
export const computeRiskImpact = (
  action: UserAction,
  level: DifficultyLevel,
  category: VulnerabilityCategory,
  config: ScoringConfig = DEFAULT_SCORING_CONFIG,
): number => {
  return roundTo((MAX_ACTION_POINTS - actionPoints(action, config)) * difficultyWeight(level, category, config), 4);
};

export const classifyRiskLevel = (overallScore: number): ScoredRiskLevel => {
  if (overallScore >= 80) {
    return 'low';
  }

  if (overallScore >= 60) {
    return 'moderate';
  }

  if (overallScore >= 40) {
    return 'high';
  }

  return 'critical';
};

export const insufficientDataResult = (): InsufficientDataResult => ({
  status: 'insufficient_data',
  overallScore: null,
  riskLevel: 'insufficient_data',
  totalPenalty: 0,
  maxPenalty: 0,
  decisionCount: 0,
  correctDecisions: 0,
  categoryBreakdown: [],
  recommendations: [],
});

const buildCategoryBreakdown = (
  decisions: readonly DecisionPoint[],
  config: ScoringConfig,
): CategoryBreakdown[] => {
  const trends = new Map<VulnerabilityCategory, number[]>();

  for (const decision of decisions) {
    const trend = trends.get(decision.category) ?? [];
    trend.push(actionPoints(decision.userAction, config));
    trends.set(decision.category, trend);
  }

  return VULNERABILITY_CATEGORIES.flatMap((category) => {
    const trend = trends.get(category);

    if (!trend || trend.length === 0) {
      return [];
    }

    const total = trend.reduce((sum, points) => sum + points, 0);
    const failures = decisions.filter(
      (decision) =>
        decision.category === category &&
        (decision.userAction === 'hesitated_then_complied' || decision.userAction === 'complied_immediately'),
    ).length;

    return [
      {
        category,
        decisionCount: trend.length,
        averageScore: roundTo(total / trend.length, 1),
        failures,
        trend,
      },
    ];
  });
};

const buildRecommendations = (
  breakdown: readonly CategoryBreakdown[],
  config: ScoringConfig,
): Recommendation[] => {
  return breakdown
    .filter((entry) => entry.averageScore < MAX_ACTION_POINTS)
    .map((entry, order) => ({ entry, order }))
    .sort((left, right) => left.entry.averageScore - right.entry.averageScore || left.order - right.order)
    .slice(0, Math.max(0, config.maxRecommendations))
    .map(({ entry }) => ({
      category: entry.category,
      averageScore: entry.averageScore,
      advice: CATEGORY_ADVICE[entry.category],
    }));
};

/**
 * Scores one session's decisions. Pure: the same decisions, level and config
 * always give the same result, and nothing is mutated.
 *
 * overall = 100 - (sum of penalties / sum of max penalties) * 100
 */
export const scoreDecisions = (
  decisions: readonly DecisionPoint[],
  difficultyLevel: DifficultyLevel,
  config: ScoringConfig = DEFAULT_SCORING_CONFIG,
): ScoreResult => {
  if (decisions.length === 0) {
    return insufficientDataResult();
  }

  let totalPenalty = 0;
  let maxPenalty = 0;

  for (const decision of decisions) {
    const weight = difficultyWeight(difficultyLevel, decision.category, config);
    totalPenalty += (MAX_ACTION_POINTS - actionPoints(decision.userAction, config)) * weight;
    maxPenalty += MAX_ACTION_POINTS * weight;
  }

  const overallScore = maxPenalty > 0 ? roundTo(100 - (totalPenalty / maxPenalty) * 100, 1) : 100;
  const categoryBreakdown = buildCategoryBreakdown(decisions, config);

  return {
    status: 'scored',
    overallScore,
    riskLevel: classifyRiskLevel(overallScore),
    totalPenalty: roundTo(totalPenalty, 2),
    maxPenalty: roundTo(maxPenalty, 2),
    decisionCount: decisions.length,
    correctDecisions: decisions.filter((decision) => decision.userAction === decision.correctAction).length,
    categoryBreakdown,
    recommendations: buildRecommendations(categoryBreakdown, config),
  };
};
