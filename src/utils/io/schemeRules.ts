import { z } from 'zod';
import { SchemeRules, SCHEME_IDS } from '../../data/scheme/scheme';
import type { SchemeRulesBook } from '../../data/scheme/scheme';
import type { SchemeId, SchemeRulesBookData } from '../../data/scheme/types';
import { log } from '../logger';
import { load } from './io';

export const SCHEME_RULES_FILE = 'scheme_rules.json';

const schemeRulesDataSchema = z.object({
  id: z.enum(SCHEME_IDS),
  name: z.string().min(1),
  description: z.string(),
  kind: z.enum(['finalSalary', 'careerAverage']),
  accrualDenominator: z.number().positive(),
  normalPensionAge: z.number().int().min(50).max(75),
  automaticLumpSumMultiple: z.number().min(0),
  earlyReductionPerYear: z.number().min(0).lt(1),
  lateIncreasePerYear: z.number().min(0),
});

const schemeRulesBookSchema = z
  .object({
    commutationFactor: z.number().positive(),
    maxCommutationProportion: z.number().min(0).max(1),
    schemes: z.array(schemeRulesDataSchema),
  })
  .superRefine((book, ctx) => {
    for (const id of SCHEME_IDS) {
      const count = book.schemes.filter((scheme) => scheme.id === id).length;
      if (count !== 1) {
        ctx.addIssue({
          code: 'custom',
          path: ['schemes'],
          message: `Expected exactly one entry for scheme ${id}, found ${count}`,
        });
      }
    }
  });

/**
 * Builds a rule book from raw rule data
 * @param data - Rule data, e.g. parsed from the rules file
 * @throws Error describing the first problem when the data is malformed
 */
export function createSchemeRulesBook(data: unknown): SchemeRulesBook {
  const parsed = schemeRulesBookSchema.safeParse(data);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    throw new Error(`Invalid scheme rules at ${issue.path.map(String).join('.') || '(root)'}: ${issue.message}`);
  }
  const bookData: SchemeRulesBookData = parsed.data;
  const schemes = Object.fromEntries(bookData.schemes.map((scheme) => [scheme.id, new SchemeRules(scheme)]));

  return {
    commutationFactor: bookData.commutationFactor,
    maxCommutationProportion: bookData.maxCommutationProportion,
    schemes: {
      '1995': schemes['1995'],
      '2008': schemes['2008'],
      '2015': schemes['2015'],
    } satisfies Record<SchemeId, SchemeRules>,
  };
}

let cachedBook: SchemeRulesBook | null = null;

/**
 * Loads the scheme rules from the data directory, once per process.
 *
 * @returns Validated rule book
 * @throws Error if the file cannot be read or fails validation
 *
 * @example
 * ```typescript
 * const book = loadSchemeRules();
 * book.schemes['1995'].accrualFraction; // 1 / 80
 * ```
 */
export function loadSchemeRules(): SchemeRulesBook {
  if (!cachedBook) {
    cachedBook = createSchemeRulesBook(load(SCHEME_RULES_FILE));
    log('Loaded scheme rules', {
      schemes: Object.keys(cachedBook.schemes).join(','),
      commutationFactor: cachedBook.commutationFactor,
    });
  }
  return cachedBook;
}

/**
 * Drops the cached rule book so the next load re-reads the file
 */
export function resetSchemeRulesCache() {
  cachedBook = null;
}
