import type { SchemeId, SchemeKind } from '../scheme/types';

/**
 * One year of career average accrual
 */
export type AccrualSlice = {
  /** Age at which the year of service ends */
  endAge: number;
  /** Pensionable pay for the year */
  salary: number;
  /** Share of the year that counts as service (the oldest slice may be partial) */
  weight: number;
  /** Pension earned in the year before revaluation */
  accrued: number;
  /** Compound revaluation from the end of the year to retirement */
  revaluationFactor: number;
  /** Pension earned in the year after revaluation */
  revalued: number;
};

/**
 * Output of a scheme's accrual formula, before early/late adjustment and commutation
 */
export type AccrualOutcome = {
  projectedSalary: number;
  pensionableSalary: number;
  basePension: number;
  accrualSlices: AccrualSlice[];
};

export type DiscountedBenefits = {
  annualPension: number;
  lumpSum: number;
};

export type BenefitResult = {
  scheme: SchemeId;
  kind: SchemeKind;
  accrualFraction: number;
  normalPensionAge: number;
  yearsToRetirement: number;
  projectedSalary: number;
  pensionableSalary: number;
  basePension: number;
  // Negative when retiring early
  yearsFromNormalPensionAge: number;
  adjustmentFactor: number;
  adjustedPension: number;
  commutedPension: number;
  commutationFactor: number;
  annualPension: number;
  monthlyPension: number;
  automaticLumpSum: number;
  commutationLumpSum: number;
  lumpSum: number;
  realTerms: DiscountedBenefits & { inflationFactor: number };
  presentValue: DiscountedBenefits & { discountFactor: number };
  accrualSlices: AccrualSlice[];
};

/**
 * One scheme's column in a comparison. A scenario that only this scheme rejects
 * (e.g. commutation above its cap) carries the error instead of a result.
 */
export type SchemeComparison = {
  scheme: SchemeId;
  name: string;
  result: BenefitResult | null;
  error: { field: string; message: string } | null;
};
