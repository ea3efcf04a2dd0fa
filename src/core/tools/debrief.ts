import type { Debrief, PerformanceLevel, ScoreResult, Session } from '../@types';
import { humanize } from '../shared/text';

const PERFORMANCE_MESSAGES: Record<PerformanceLevel, string> = {
  excellent: 'You spotted the manipulation tactics and responded the way a security-aware colleague should.',
  good: 'You handled most of the pressure well, with a few moments worth revisiting.',
  developing: 'You caught some of the warning signs. A few habits will make the rest easier to spot.',
  needs_focus: 'This scenario got past your defences. That is exactly what training is for.',
};

export const performanceLevelFor = (correctDecisions: number, decisionCount: number): PerformanceLevel => {
  const successRate = correctDecisions / Math.max(decisionCount, 1);

  if (successRate >= 0.8) {
    return 'excellent';
  }

  if (successRate >= 0.6) {
    return 'good';
  }

  if (successRate >= 0.4) {
    return 'developing';
  }

  return 'needs_focus';
};

const bulletList = (title: string, items: readonly string[]): string[] => {
  if (items.length === 0) {
    return [];
  }

  return [title, ...items.map((item) => `- ${item}`)];
};

/** Post-scenario learning summary. Tone stays growth-focused whatever the score. */
export const generateDebrief = (session: Session, score: ScoreResult): Debrief => {
  const scenario = humanize(session.scenarioType);
  const performanceLevel = performanceLevelFor(score.correctDecisions, score.decisionCount);

  const summary =
    score.status === 'insufficient_data'
      ? `The ${scenario} scenario ended before any decisions were made, so there is nothing to score yet.`
      : `You made ${score.decisionCount} decision${score.decisionCount === 1 ? '' : 's'} in this ${scenario} scenario ` +
        `and ${score.correctDecisions} matched the safest response. Overall score ${score.overallScore.toFixed(1)} ` +
        `(${humanize(score.riskLevel)} risk). ${PERFORMANCE_MESSAGES[performanceLevel]}`;

  const keyLearnings =
    score.recommendations.length > 0
      ? score.recommendations.map((recommendation) => recommendation.advice)
      : score.status === 'scored'
        ? ['You handled every lure in this scenario safely. Keep verifying before you act.']
        : [];

  const nextSteps: string[] = [];
  const weakest = score.recommendations[0];

  if (weakest) {
    nextSteps.push(`Your next scenario will lean on ${humanize(weakest.category)} tactics so you can practise them.`);
  }

  if (session.hintsUsed > 0) {
    nextSteps.push(`You used ${session.hintsUsed} hint${session.hintsUsed === 1 ? '' : 's'}; try the next run without them.`);
  }

  nextSteps.push('Report real suspicious messages to your security team the same way you did here.');

  const redFlags = [...session.redFlagsSeen];
  const content = [
    summary,
    ...bulletList('Red flags in this scenario:', redFlags.map(humanize)),
    ...bulletList('Key learnings:', keyLearnings),
    ...bulletList('Next steps:', nextSteps),
  ].join('\n');

  return {
    summary,
    performanceLevel,
    redFlags,
    keyLearnings,
    nextSteps,
    content,
  };
};
