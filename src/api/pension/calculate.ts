import type { Request } from 'express';
import type { BenefitResult } from '../../data/scenario/types';
import { calculateBenefits } from '../../utils/calculate/pension';
import { debug } from '../../utils/logger';
import { getData } from '../../utils/net/request';
import { validateScenario } from '../../utils/validate/scenario';
import type { ScenarioInput } from '../../utils/validate/scenario';

export type CalculationResponse = {
  scenario: ScenarioInput;
  result: BenefitResult;
};

/**
 * Calculates benefits for the scenario in the request body
 * @param request - Express request object whose body is a scenario
 * @returns The validated scenario and its benefits
 */
export function calculatePension(request: Request): CalculationResponse {
  const { data, rules } = getData(request);
  const scenario = validateScenario(data);
  const result = calculateBenefits(scenario, rules);
  debug('Calculated benefits', {
    scheme: scenario.scheme,
    annualPension: result.annualPension,
    lumpSum: result.lumpSum,
  });
  return { scenario, result };
}
