import type { DecisionPoint, DifficultyLevel, UserAction, VulnerabilityCategory } from '../@types';
import { computeRiskImpact, DEFAULT_SCORING_CONFIG, type ScoringConfig } from '../tools/riskScoring';

export interface NewDecisionInput {
  turnIndex: number;
  category: VulnerabilityCategory;
  userInput: string;
  userAction: UserAction;
  correctAction: UserAction;
  difficultyLevel: DifficultyLevel;
  timestamp: number;
  responseLatencyMs: number;
}

export const isFailureAction = (action: UserAction): boolean => {
  return action === 'hesitated_then_complied' || action === 'complied_immediately';
};

/**
 * Decision points are frozen at creation. The risk impact comes from the same
 * derivation the scoring engine applies and cannot be supplied by callers.
 */
export const createDecisionPoint = (
  input: NewDecisionInput,
  config: ScoringConfig = DEFAULT_SCORING_CONFIG,
): DecisionPoint => {
  return Object.freeze({
    turnIndex: input.turnIndex,
    category: input.category,
    userInput: input.userInput,
    userAction: input.userAction,
    correctAction: input.correctAction,
    difficultyLevel: input.difficultyLevel,
    riskScoreImpact: computeRiskImpact(input.userAction, input.difficultyLevel, input.category, config),
    timestamp: input.timestamp,
    responseLatencyMs: Math.max(0, Math.round(input.responseLatencyMs)),
  });
};
