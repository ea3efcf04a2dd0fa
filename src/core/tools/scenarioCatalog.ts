import { z } from 'zod';

import {
  SCENARIO_TYPES,
  USER_ACTIONS,
  USER_ROLES,
  VULNERABILITY_CATEGORIES,
  type ScenarioBeat,
  type ScenarioCatalog,
  type ScenarioPattern,
  type ScenarioType,
  type UserRole,
} from '../@types';
import bundledCatalog from '../data/scenario-catalog.json';
import { AppError } from '../shared/errors/app-error';
import { fillTemplate, humanize } from '../shared/text';

const beatTemplateSchema = z.object({
  category: z.enum(VULNERABILITY_CATEGORIES),
  template: z.string().trim().min(1),
  correctAction: z.enum(USER_ACTIONS),
  redFlags: z.array(z.string().trim().min(1)),
});

const patternSchema = z.object({
  id: z.string().trim().min(1),
  scenarioType: z.enum(SCENARIO_TYPES),
  title: z.string().trim().min(1),
  description: z.string(),
  baseDifficulty: z.number().int().min(1).max(5),
  targetRoles: z.array(z.enum(USER_ROLES)).min(1),
  opening: z.string().trim().min(1),
  beats: z.array(beatTemplateSchema).min(1),
});

const catalogSchema = z
  .object({
    patterns: z.array(patternSchema),
    fallbacks: z.object({
      phishing: patternSchema,
      vishing: patternSchema,
      bec: patternSchema,
      physical: patternSchema,
      insider: patternSchema,
    }),
  })
  .superRefine((catalog, ctx) => {
    const seen = new Set<string>();

    for (const [index, pattern] of catalog.patterns.entries()) {
      if (seen.has(pattern.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate pattern id ${pattern.id}.`,
          path: ['patterns', index, 'id'],
        });
      }
      seen.add(pattern.id);
    }

    for (const type of SCENARIO_TYPES) {
      if (catalog.fallbacks[type].scenarioType !== type) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Fallback for ${type} declares scenarioType ${catalog.fallbacks[type].scenarioType}.`,
          path: ['fallbacks', type, 'scenarioType'],
        });
      }
    }
  });

export const parseScenarioCatalog = (raw: unknown): ScenarioCatalog => {
  return catalogSchema.parse(raw);
};

let cachedCatalog: ScenarioCatalog | undefined;

export const loadScenarioCatalog = (): ScenarioCatalog => {
  cachedCatalog ??= parseScenarioCatalog(bundledCatalog);
  return cachedCatalog;
};

export const findPattern = (catalog: ScenarioCatalog, patternId: string): ScenarioPattern | undefined => {
  return (
    catalog.patterns.find((pattern) => pattern.id === patternId) ??
    SCENARIO_TYPES.map((type) => catalog.fallbacks[type]).find((pattern) => pattern.id === patternId)
  );
};

export const mustFindPattern = (catalog: ScenarioCatalog, patternId: string): ScenarioPattern => {
  const pattern = findPattern(catalog, patternId);

  if (!pattern) {
    throw new AppError(500, `Scenario pattern ${patternId} is missing from the catalog.`, 'PATTERN_NOT_FOUND');
  }

  return pattern;
};

export const fallbackPattern = (catalog: ScenarioCatalog, type: ScenarioType): ScenarioPattern => {
  return catalog.fallbacks[type];
};

/** Renders the cached template content for one beat of a pattern. */
export const renderTemplateBeat = (
  pattern: ScenarioPattern,
  beatIndex: number,
  role: UserRole,
): ScenarioBeat | undefined => {
  const template = pattern.beats[beatIndex];

  if (!template) {
    return undefined;
  }

  return {
    index: beatIndex,
    category: template.category,
    content: fillTemplate(template.template, { role: humanize(role) }),
    correctAction: template.correctAction,
    redFlags: [...template.redFlags],
    source: 'template',
  };
};
