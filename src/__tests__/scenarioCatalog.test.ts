import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';

import { SCENARIO_TYPES } from '../core/@types';
import { AppError } from '../core/shared/errors/app-error';
import {
  fallbackPattern,
  findPattern,
  loadScenarioCatalog,
  mustFindPattern,
  parseScenarioCatalog,
  renderTemplateBeat,
} from '../core/tools/scenarioCatalog';

describe('scenario catalog', () => {
  const catalog = loadScenarioCatalog();

  it('has a fallback for every scenario type', () => {
    for (const type of SCENARIO_TYPES) {
      expect(fallbackPattern(catalog, type).scenarioType).toBe(type);
    }
  });

  it('finds fallbacks by id', () => {
    expect(findPattern(catalog, 'fallback-bec')?.scenarioType).toBe('bec');
    expect(findPattern(catalog, 'no-such-pattern')).toBeUndefined();
  });

  it('fails loudly for an unknown pattern', () => {
    expect(() => mustFindPattern(catalog, 'no-such-pattern')).toThrow(AppError);
  });

  it('renders a beat for the trainee role', () => {
    const beat = renderTemplateBeat(mustFindPattern(catalog, 'phishing-vendor-payment'), 0, 'finance');

    expect(beat).toEqual({
      index: 0,
      category: 'urgency',
      content:
        'The email says the invoice is 30 days overdue and your finance account will be suspended at 5pm today ' +
        'unless you pay through the secure portal link below.',
      correctAction: 'verified_first',
      redFlags: ['external_email', 'urgency_language', 'financial_request'],
      source: 'template',
    });
  });

  it('returns undefined past the last beat', () => {
    expect(renderTemplateBeat(mustFindPattern(catalog, 'fallback-vishing'), 1, 'general')).toBeUndefined();
  });

  it('rejects duplicate pattern ids', () => {
    const [first] = catalog.patterns;

    expect(() => parseScenarioCatalog({ patterns: [first, first], fallbacks: catalog.fallbacks })).toThrow(ZodError);
  });
});
