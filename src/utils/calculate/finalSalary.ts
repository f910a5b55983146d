import type { SchemeRules } from '../../data/scheme/scheme';
import type { AccrualOutcome } from '../../data/scenario/types';
import type { ScenarioInput } from '../validate/scenario';
import { projectSalary } from './growth';

/**
 * 1995 and 2008 Sections: the whole of service is valued on the salary at retirement.
 */
export function finalSalaryPension(scenario: ScenarioInput, rules: SchemeRules): AccrualOutcome {
  const projectedSalary = projectSalary(
    scenario.currentSalary,
    scenario.salaryGrowthRate,
    scenario.retirementAge - scenario.currentAge,
  );

  return {
    projectedSalary,
    pensionableSalary: projectedSalary,
    basePension: projectedSalary * scenario.serviceYears * rules.accrualFraction,
    accrualSlices: [],
  };
}
