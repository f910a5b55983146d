import type { Request } from 'express';
import type { SchemeRulesData } from '../../data/scheme/types';
import { getData } from '../../utils/net/request';

export type SchemeSummary = SchemeRulesData & {
  accrualFraction: number;
};

export type SchemesResponse = {
  commutationFactor: number;
  maxCommutationProportion: number;
  schemes: SchemeSummary[];
};

/**
 * Lists the scheme rules the calculator applies
 *
 * Honours the optional `schemes` query parameter (comma separated) to restrict the list.
 *
 * @param request - Express request object
 * @returns Shared commutation terms and the rules of each selected scheme
 */
export function getSchemes(request: Request): SchemesResponse {
  const { rules, schemes } = getData(request);
  return {
    commutationFactor: rules.commutationFactor,
    maxCommutationProportion: rules.maxCommutationProportion,
    schemes: schemes.map((id) => ({
      ...rules.schemes[id].serialize(),
      accrualFraction: rules.schemes[id].accrualFraction,
    })),
  };
}
