import type { ScenarioBeat, Session, UserAction } from '../@types';
import { normalizeWhitespace } from '../shared/text';

export interface ClassificationContext {
  session: Session;
  beat: ScenarioBeat;
}

export interface DecisionClassifier {
  /** Resolves to null when the input does not express a decision. */
  classify(input: string, context: ClassificationContext): Promise<UserAction | null>;
}

const REPORT_TERMS = [
  'report',
  'security team',
  'soc',
  'forward it to security',
  'flag it',
  'phishing',
  'scam',
  'raise an incident',
];

const VERIFY_TERMS = [
  'verify',
  'check',
  'call back',
  'call them back',
  'confirm with',
  'contact',
  'ask',
  'independently',
  'look up',
  'hover',
  'ignore',
  'delete',
  'refuse',
  'decline',
  'hang up',
  'badge',
];

const HEDGE_TERMS = ['not sure', 'maybe', 'i guess', 'probably', 'hmm', 'hesitant', 'i think'];

const COMPLY_TERMS = [
  'click',
  'open',
  'pay',
  'send',
  'transfer',
  'enter',
  'provide',
  'give',
  'install',
  'plug',
  'buy',
  'share',
  'log in',
  'sign in',
  'let them in',
  'let him in',
  'let her in',
  'hold the door',
  'read the code',
  'do it',
  'okay',
  'ok',
  'yes',
];

const NEGATION_BEFORE = /\b(?:don'?t|do not|won'?t|will not|wouldn'?t|never|not|no)\s+(?:\w+\s+){0,2}$/;
const COMPLETION_PATTERN = /^(?:done|i'?m done|i am done|finish(?:ed)?|end(?: scenario)?|that'?s all)[.!]*$/;
const CONFUSION_TERMS = ['confused', 'not sure', 'help', "don't understand", 'what should i do', 'hint'];

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const normalize = (input: string): string => normalizeWhitespace(input.toLowerCase().replace(/[’‘]/g, "'"));

interface TermHits {
  plain: number;
  negated: number;
}

const countHits = (text: string, terms: readonly string[]): TermHits => {
  const hits: TermHits = { plain: 0, negated: 0 };

  for (const term of terms) {
    const pattern = new RegExp(`\\b${escapeRegExp(term)}\\b`, 'g');

    for (const match of text.matchAll(pattern)) {
      const before = text.slice(Math.max(0, (match.index ?? 0) - 24), match.index ?? 0);

      if (NEGATION_BEFORE.test(before)) {
        hits.negated += 1;
      } else {
        hits.plain += 1;
      }
    }
  }

  return hits;
};

/**
 * Keyword classifier. Priority: report, then verify or refuse, then
 * hesitation followed by compliance, then plain compliance.
 */
export const classifyByKeywords = (input: string): UserAction | null => {
  const text = normalize(input);

  if (!text) {
    return null;
  }

  if (countHits(text, REPORT_TERMS).plain > 0) {
    return 'recognized_and_reported';
  }

  const comply = countHits(text, COMPLY_TERMS);

  if (countHits(text, VERIFY_TERMS).plain > 0 || (comply.negated > 0 && comply.plain === 0)) {
    return 'verified_first';
  }

  if (comply.plain > 0) {
    return countHits(text, HEDGE_TERMS).plain > 0 ? 'hesitated_then_complied' : 'complied_immediately';
  }

  return null;
};

export const isCompletionSignal = (input: string): boolean => COMPLETION_PATTERN.test(normalize(input));

export const signalsConfusion = (input: string): boolean => {
  const text = normalize(input);
  return CONFUSION_TERMS.some((term) => text.includes(term));
};

export class KeywordDecisionClassifier implements DecisionClassifier {
  public classify(input: string): Promise<UserAction | null> {
    return Promise.resolve(classifyByKeywords(input));
  }
}
