import type { Session, VulnerabilityCategory } from '../@types';
import { fillTemplate, humanize } from '../shared/text';

export const DEFAULT_MAX_HINTS = 3;

type HintLevel = 'subtle' | 'moderate' | 'explicit';

const HINT_LEVELS: readonly HintLevel[] = ['subtle', 'moderate', 'explicit'];

const CATEGORY_HINTS: Record<VulnerabilityCategory, Record<HintLevel, string>> = {
  urgency: {
    subtle: 'Before acting, notice how much time pressure this {scenario} message is putting on you.',
    moderate: 'Deadlines like this one are often invented. A short delay to verify rarely costs anything.',
    explicit: 'Red flag: urgent requests for money, access or credentials should be verified through a known channel before you act.',
  },
  authority: {
    subtle: 'Consider whether this request really comes from who it claims to be.',
    moderate: 'Requests that lean on seniority and skip normal procedure deserve a second look through channels you already trust.',
    explicit: 'Red flag: impersonating an executive or IT is a classic tactic. Confirm the request independently, then report it.',
  },
  curiosity: {
    subtle: 'Think about what you actually know about this link, file or device before opening it.',
    moderate: 'Teasers about salaries, bonuses or confidential files are designed to make you click first and think later.',
    explicit: 'Red flag: unexpected attachments, links and found media should never be opened. Hand them to security instead.',
  },
  fear: {
    subtle: 'Notice how the message makes you feel, and whether that feeling is pushing you to act.',
    moderate: 'Threats of account loss, penalties or blame are meant to rush you past normal checks.',
    explicit: 'Red flag: fear-based pressure is a manipulation tactic. Stop, verify with the real team, and report the contact.',
  },
  greed: {
    subtle: 'Ask yourself whether this offer is something a {role} would normally receive this way.',
    moderate: 'Rewards that require your credentials, banking details or a quick favour are rarely genuine.',
    explicit: 'Red flag: if an offer looks too good to be true and needs sensitive information, treat it as an attack and report it.',
  },
};

const GENERAL_HINT = 'Think about how you would verify this request before deciding what to do.';

export const hintLevelFor = (hintsUsed: number): HintLevel => {
  return HINT_LEVELS[Math.min(HINT_LEVELS.length - 1, Math.max(0, hintsUsed))] ?? 'subtle';
};

/**
 * Hints get more explicit with each one used. Returns null once the session
 * has used `maxHints`.
 */
export const buildHint = (session: Session, maxHints = DEFAULT_MAX_HINTS): string | null => {
  if (session.hintsUsed >= maxHints) {
    return null;
  }

  const values = {
    role: humanize(session.userRole),
    scenario: humanize(session.scenarioType),
  };

  if (!session.currentBeat) {
    return fillTemplate(GENERAL_HINT, values);
  }

  return fillTemplate(CATEGORY_HINTS[session.currentBeat.category][hintLevelFor(session.hintsUsed)], values);
};
