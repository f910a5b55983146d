import { getScheme, SCHEME_IDS } from '../../data/scheme/scheme';
import type { SchemeRules, SchemeRulesBook } from '../../data/scheme/scheme';
import type { SchemeId, SchemeKind } from '../../data/scheme/types';
import type { AccrualOutcome, BenefitResult, SchemeComparison } from '../../data/scenario/types';
import { isValidationError } from '../validate/errors';
import { validateScenario } from '../validate/scenario';
import type { ScenarioInput } from '../validate/scenario';
import { careerAveragePension } from './careerAverage';
import { finalSalaryPension } from './finalSalary';
import { commutePension, retirementAdjustmentFactor } from './adjustments';
import { compoundFactor } from './growth';

type AccrualFormula = (scenario: ScenarioInput, rules: SchemeRules) => AccrualOutcome;

const ACCRUAL_FORMULAS: Record<SchemeKind, AccrualFormula> = {
  finalSalary: finalSalaryPension,
  careerAverage: careerAveragePension,
};

/**
 * Computes the benefits of a scenario. Pure: no I/O and no shared state.
 *
 * The scheme's accrual formula produces the base pension, which is then adjusted for
 * retirement before or after the normal pension age, split between annual pension and
 * lump sum by any commutation, and finally expressed in today's money.
 *
 * @param input - Scenario to evaluate; it is validated again here
 * @param book - Scheme rules
 * @returns Nominal, real-terms and present-value benefits
 * @throws ValidationError when the scenario is rejected
 */
export function calculateBenefits(input: ScenarioInput, book: SchemeRulesBook): BenefitResult {
  const scenario = validateScenario(input);
  const rules = getScheme(book, scenario.scheme);
  const yearsToRetirement = scenario.retirementAge - scenario.currentAge;

  const accrual = ACCRUAL_FORMULAS[rules.kind](scenario, rules);

  const normalPensionAge = scenario.normalPensionAge ?? rules.normalPensionAge;
  const yearsFromNormalPensionAge = scenario.retirementAge - normalPensionAge;
  const adjustmentFactor = retirementAdjustmentFactor(
    yearsFromNormalPensionAge,
    scenario.earlyReductionPerYear ?? rules.earlyReductionPerYear,
    scenario.lateIncreasePerYear ?? rules.lateIncreasePerYear,
  );
  const adjustedPension = accrual.basePension * adjustmentFactor;

  const { factor, commutedPension, commutationLumpSum } = commutePension(adjustedPension, scenario.commutation, book);
  const annualPension = adjustedPension - commutedPension;
  const automaticLumpSum = adjustedPension * rules.automaticLumpSumMultiple;
  const lumpSum = automaticLumpSum + commutationLumpSum;

  const inflationFactor = compoundFactor(scenario.inflationRate, yearsToRetirement);
  const discountFactor = compoundFactor(scenario.investmentGrowthRate, yearsToRetirement);

  return {
    scheme: rules.id,
    kind: rules.kind,
    accrualFraction: rules.accrualFraction,
    normalPensionAge,
    yearsToRetirement,
    projectedSalary: accrual.projectedSalary,
    pensionableSalary: accrual.pensionableSalary,
    basePension: accrual.basePension,
    yearsFromNormalPensionAge,
    adjustmentFactor,
    adjustedPension,
    commutedPension,
    commutationFactor: factor,
    annualPension,
    monthlyPension: annualPension / 12,
    automaticLumpSum,
    commutationLumpSum,
    lumpSum,
    realTerms: {
      inflationFactor,
      annualPension: annualPension / inflationFactor,
      lumpSum: lumpSum / inflationFactor,
    },
    presentValue: {
      discountFactor,
      annualPension: annualPension / discountFactor,
      lumpSum: lumpSum / discountFactor,
    },
    accrualSlices: accrual.accrualSlices,
  };
}

/**
 * Runs the same personal circumstances through several schemes.
 * A normal pension age override is dropped so each scheme uses its own.
 * An invalid scenario rejects the whole comparison; a rejection that depends on the
 * scheme's own benefits is reported against that scheme alone.
 */
export function compareSchemes(
  input: ScenarioInput,
  book: SchemeRulesBook,
  schemes: readonly SchemeId[] = SCHEME_IDS,
): SchemeComparison[] {
  const { normalPensionAge: _normalPensionAge, ...personal } = validateScenario(input);

  return schemes.map((scheme) => {
    const name = getScheme(book, scheme).name;
    try {
      return { scheme, name, result: calculateBenefits({ ...personal, scheme }, book), error: null };
    } catch (error) {
      if (!isValidationError(error)) {
        throw error;
      }
      return { scheme, name, result: null, error: { field: error.field, message: error.message } };
    }
  });
}
