import type { Request } from 'express';
import type { SchemeComparison } from '../../data/scenario/types';
import { compareSchemes } from '../../utils/calculate/pension';
import { getData } from '../../utils/net/request';
import { validateScenario } from '../../utils/validate/scenario';

/**
 * Compares the schemes named in `?schemes=` (all by default) for the scenario in the body
 */
export function comparePensionSchemes(request: Request): SchemeComparison[] {
  const { data, rules, schemes } = getData(request);
  return compareSchemes(validateScenario(data), rules, schemes);
}
