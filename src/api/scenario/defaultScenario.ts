import type { Request } from 'express';
import { calculateBenefits } from '../../utils/calculate/pension';
import { getData } from '../../utils/net/request';
import { defaultScenario } from '../../utils/scenario/defaults';
import type { CalculationResponse } from '../pension/calculate';

/**
 * Starting scenario for a new session, with its benefits already calculated
 */
export function getDefaultScenario(request: Request): CalculationResponse {
  const { rules } = getData(request);
  const scenario = defaultScenario();
  return { scenario, result: calculateBenefits(scenario, rules) };
}
