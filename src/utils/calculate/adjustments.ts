import type { SchemeRulesBook } from '../../data/scheme/scheme';
import { formatCurrency, formatPercentage } from '../format/format';
import { ValidationError } from '../validate/errors';
import type { Commutation } from '../validate/scenario';

// Tolerance when comparing an amount-based commutation against the cap
const EPSILON = 1e-9;

/**
 * Early/late retirement factor relative to the normal pension age
 * @param yearsFromNormalPensionAge - Retirement age minus normal pension age (negative when early)
 * @param earlyReductionPerYear - Compound reduction per year early
 * @param lateIncreasePerYear - Compound increase per year late
 * @returns Multiplier applied to the base pension (1 at normal pension age)
 */
export function retirementAdjustmentFactor(
  yearsFromNormalPensionAge: number,
  earlyReductionPerYear: number,
  lateIncreasePerYear: number,
): number {
  if (yearsFromNormalPensionAge < 0) {
    return (1 - earlyReductionPerYear) ** -yearsFromNormalPensionAge;
  }
  if (yearsFromNormalPensionAge > 0) {
    return (1 + lateIncreasePerYear) ** yearsFromNormalPensionAge;
  }
  return 1;
}

export type CommutationOutcome = {
  factor: number;
  commutedPension: number;
  commutationLumpSum: number;
};

/**
 * Trades annual pension for a lump sum at the commutation factor
 * @param adjustedPension - Annual pension after early/late adjustment
 * @param commutation - Requested commutation, if any
 * @param book - Scheme rules holding the default factor and the cap
 * @throws ValidationError when more than the allowed share of pension would be given up
 */
export function commutePension(
  adjustedPension: number,
  commutation: Commutation | undefined,
  book: SchemeRulesBook,
): CommutationOutcome {
  const factor = commutation?.factor ?? book.commutationFactor;
  if (!commutation) {
    return { factor, commutedPension: 0, commutationLumpSum: 0 };
  }

  const cap = formatPercentage(book.maxCommutationProportion);
  let commutedPension: number;
  if (commutation.type === 'proportion') {
    if (commutation.proportion > book.maxCommutationProportion) {
      throw new ValidationError('commutation.proportion', `At most ${cap} of the pension can be commuted`);
    }
    commutedPension = adjustedPension * commutation.proportion;
  } else {
    commutedPension = commutation.amount / factor;
    if (commutedPension - adjustedPension * book.maxCommutationProportion > EPSILON) {
      throw new ValidationError(
        'commutation.amount',
        `A lump sum of ${formatCurrency(commutation.amount)} would give up more than ${cap} of the pension`,
      );
    }
  }

  return {
    factor,
    commutedPension,
    commutationLumpSum: commutedPension * factor,
  };
}
