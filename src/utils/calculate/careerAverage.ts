import type { SchemeRules } from '../../data/scheme/scheme';
import type { AccrualOutcome, AccrualSlice } from '../../data/scenario/types';
import type { ScenarioInput } from '../validate/scenario';
import { compoundFactor, projectSalary } from './growth';

/**
 * Annual revaluation applied to each CARE slice between the year it is earned and retirement.
 * Slices keep pace with pay unless the scenario sets its own rate.
 */
export function careRevaluationRate(scenario: ScenarioInput): number {
  return scenario.revaluationRate ?? scenario.salaryGrowthRate;
}

/**
 * Splits service into yearly slices counted back from retirement.
 * Slice k ends k years before retirement, is earned on that year's salary and is revalued k times.
 * The oldest slice carries any fractional year of service.
 */
export function buildAccrualSlices(scenario: ScenarioInput, rules: SchemeRules): AccrualSlice[] {
  const revaluationRate = careRevaluationRate(scenario);
  const slices: AccrualSlice[] = [];

  for (let k = 0; k < scenario.serviceYears; k++) {
    const endAge = scenario.retirementAge - k;
    const weight = Math.min(1, scenario.serviceYears - k);
    // Ages before the current age back-project the salary at the same growth rate
    const salary = projectSalary(scenario.currentSalary, scenario.salaryGrowthRate, endAge - scenario.currentAge);
    const accrued = salary * weight * rules.accrualFraction;
    const revaluationFactor = compoundFactor(revaluationRate, k);

    slices.push({
      endAge,
      salary,
      weight,
      accrued,
      revaluationFactor,
      revalued: accrued * revaluationFactor,
    });
  }

  return slices;
}

/**
 * 2015 Scheme: each year of service earns its own slice of pension, revalued to retirement independently.
 */
export function careerAveragePension(scenario: ScenarioInput, rules: SchemeRules): AccrualOutcome {
  const accrualSlices = buildAccrualSlices(scenario, rules);
  const basePension = accrualSlices.reduce((sum, slice) => sum + slice.revalued, 0);
  const weightedPay = accrualSlices.reduce((sum, slice) => sum + slice.salary * slice.weight, 0);

  return {
    projectedSalary: projectSalary(
      scenario.currentSalary,
      scenario.salaryGrowthRate,
      scenario.retirementAge - scenario.currentAge,
    ),
    pensionableSalary: scenario.serviceYears > 0 ? weightedPay / scenario.serviceYears : 0,
    basePension,
    accrualSlices,
  };
}
