import { z } from 'zod';
import { SCHEME_IDS } from '../../data/scheme/scheme';
import { ValidationError } from './errors';

const wholeYears = (min: number, max: number) =>
  z
    .number()
    .int('must be a whole number of years')
    .min(min, `must be at least ${min}`)
    .max(max, `must be at most ${max}`);

const rate = z.number().min(0, 'must not be negative').max(0.1, 'must be at most 0.1 (10%)');

const commutationFactor = z
  .number()
  .min(8, 'must be at least 8')
  .max(20, 'must be at most 20')
  .describe('Lump sum received per £1 of annual pension given up (8-20). Defaults to the scheme factor.');

export const commutationSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('proportion'),
    proportion: z
      .number()
      .min(0, 'must not be negative')
      .max(1, 'must be at most 1')
      .describe('Fraction of the annual pension exchanged for a lump sum (e.g. 0.15)'),
    factor: commutationFactor.optional(),
  }),
  z.object({
    type: z.literal('lumpSum'),
    amount: z.number().min(0, 'must not be negative').describe('Extra lump sum wanted in GBP'),
    factor: commutationFactor.optional(),
  }),
]);

/**
 * Field-level rules of a scenario. Every entry is also a field the assistant may update.
 */
export const scenarioFieldsSchema = z.object({
  scheme: z.enum(SCHEME_IDS, { message: 'Unknown pension scheme' }).describe('The NHS pension scheme section'),
  currentAge: wholeYears(18, 75).describe('Current age in years (18-75)'),
  currentSalary: z
    .number()
    .positive('must be greater than zero')
    .max(10000000, 'must be at most 10000000')
    .describe('Annual pensionable pay in GBP (up to 10,000,000)'),
  serviceYears: z
    .number()
    .min(0, 'must not be negative')
    .max(50, 'must be at most 50')
    .describe('Total years of NHS pensionable service at retirement (0-50)'),
  retirementAge: wholeYears(55, 75).describe('Planned retirement age (55-75)'),
  salaryGrowthRate: rate.describe('Expected annual salary growth as a fraction (e.g. 0.02 for 2%)'),
  investmentGrowthRate: rate.describe('Expected investment growth used to discount benefits, as a fraction'),
  inflationRate: rate.describe('Assumed annual inflation as a fraction, used for real-terms values'),
  normalPensionAge: wholeYears(55, 75)
    .optional()
    .describe('Override of the scheme normal pension age. Typical: 1995=60, 2008=65, 2015=67'),
  earlyReductionPerYear: rate.optional().describe('Override of the reduction per year retired before normal pension age'),
  lateIncreasePerYear: rate.optional().describe('Override of the increase per year retired after normal pension age'),
  revaluationRate: rate.optional().describe('2015 scheme only: annual revaluation of career average slices. Defaults to salary growth'),
  commutation: commutationSchema.optional().describe('Pension exchanged for an extra lump sum'),
});

export const scenarioSchema = scenarioFieldsSchema.superRefine((scenario, ctx) => {
  if (scenario.retirementAge < scenario.currentAge) {
    ctx.addIssue({
      code: 'custom',
      path: ['retirementAge'],
      message: 'Retirement age cannot be before current age',
    });
  }
});

export type ScenarioInput = z.infer<typeof scenarioSchema>;
export type Commutation = z.infer<typeof commutationSchema>;
export type ScenarioField = keyof ScenarioInput;

export function isScenarioField(name: string): name is ScenarioField {
  return Object.hasOwn(scenarioFieldsSchema.shape, name);
}

function toValidationError(error: z.ZodError, prefix: string[] = []): ValidationError {
  const [issue] = error.issues;
  const field = [...prefix, ...issue.path.map(String)].join('.') || 'scenario';
  return new ValidationError(field, `Invalid ${field}: ${issue.message}`);
}

/**
 * Validates a complete scenario
 * @param value - Untrusted scenario, e.g. a request body
 * @returns The scenario with unknown keys removed
 * @throws ValidationError naming the first offending field
 */
export function validateScenario(value: unknown): ScenarioInput {
  const parsed = scenarioSchema.safeParse(value);
  if (!parsed.success) {
    throw toValidationError(parsed.error);
  }
  return parsed.data;
}

/**
 * @throws ValidationError when `name` is not a scenario field
 */
export function toScenarioField(name: string): ScenarioField {
  if (!isScenarioField(name)) {
    throw new ValidationError(name, `Unknown field: ${name}`);
  }
  return name;
}

/**
 * Validates one scenario field in isolation (cross-field rules are checked by validateScenario)
 * @param field - Name of the field
 * @param value - Untrusted value
 * @returns The parsed value
 * @throws ValidationError when the value is rejected
 */
export function validateField(field: ScenarioField, value: unknown): unknown {
  const schema: z.ZodType = scenarioFieldsSchema.shape[field];
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw toValidationError(parsed.error, [field]);
  }
  return parsed.data;
}
