import type {
  DifficultyLevel,
  PerformanceHint,
  ScenarioBeat,
  ScenarioPattern,
  UserAction,
  UserRole,
} from '../@types';
import { humanize } from './text';

const DIFFICULTY_GUIDANCE: Record<DifficultyLevel, string> = {
  1: 'Make the red flags obvious: clear typos, odd sender, blunt requests.',
  2: 'Keep the red flags visible but less blunt.',
  3: 'Use plausible branding and tone; leave two or three noticeable red flags.',
  4: 'Be polished and context-aware; red flags should be subtle.',
  5: 'Be highly convincing and personalised; leave only one subtle red flag.',
};

const PERFORMANCE_GUIDANCE: Record<PerformanceHint, string> = {
  struggling: 'The trainee is struggling: keep the next message clear so the lesson lands.',
  steady: 'The trainee is doing reasonably well: keep the pressure consistent.',
  excelling: 'The trainee is spotting everything: escalate the sophistication slightly.',
};

export const buildThreatActorSystemPrompt = (
  pattern: ScenarioPattern,
  role: UserRole,
  difficulty: DifficultyLevel,
): string => {
  return [
    `You play the attacker in a sanctioned security-awareness training exercise.`,
    `Scenario: ${pattern.title} (${humanize(pattern.scenarioType)}).`,
    `Scenario summary: ${pattern.description}`,
    `Target role: ${humanize(role)}.`,
    `Difficulty ${difficulty} of 5. ${DIFFICULTY_GUIDANCE[difficulty]}`,
    `Never include real names, real companies, working links or real credentials.`,
    `Stay in character and never reveal that this is training.`,
    `Hard rule: respond in maximum 4 sentences.`,
  ].join('\n');
};

export interface BeatAdaptation {
  lastAction?: UserAction;
  userInput?: string;
  performanceHint?: PerformanceHint;
}

export const buildBeatUserPrompt = (beat: ScenarioBeat, options: BeatAdaptation = {}): string => {
  return [
    options.lastAction ? `The trainee's last response was classified as: ${humanize(options.lastAction)}.` : undefined,
    options.userInput ? `The trainee said: "${options.userInput}"` : undefined,
    options.performanceHint ? PERFORMANCE_GUIDANCE[options.performanceHint] : undefined,
    `Pressure tactic for this message: ${beat.category}.`,
    `Red flags to include: ${beat.redFlags.map(humanize).join(', ') || 'none'}.`,
    `Rewrite this message in your own words, keeping its request: ${beat.content}`,
  ]
    .filter((line): line is string => Boolean(line))
    .join('\n');
};
