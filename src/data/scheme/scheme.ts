import type { SchemeId, SchemeKind, SchemeRulesData } from './types';
import { ValidationError } from '../../utils/validate/errors';

/**
 * Fixed rules of one NHS pension section. Not user-editable; loaded from the scheme rules file.
 */
export class SchemeRules {
  /** Scheme identifier */
  id: SchemeId;
  /** Display name */
  name: string;
  /** One-line summary of the benefit design */
  description: string;
  /** Formula family used to build the pension */
  kind: SchemeKind;
  /** Denominator of the accrual fraction (80 means 1/80th per year) */
  accrualDenominator: number;
  /** Age at which unreduced benefits are payable */
  normalPensionAge: number;
  /** Automatic lump sum as a multiple of annual pension */
  automaticLumpSumMultiple: number;
  /** Compound reduction per year of retirement before the normal pension age */
  earlyReductionPerYear: number;
  /** Compound enhancement per year of retirement after the normal pension age */
  lateIncreasePerYear: number;

  /**
   * @param data - Scheme rule data as stored in the rules file
   */
  constructor(data: SchemeRulesData) {
    this.id = data.id;
    this.name = data.name;
    this.description = data.description;
    this.kind = data.kind;
    this.accrualDenominator = data.accrualDenominator;
    this.normalPensionAge = data.normalPensionAge;
    this.automaticLumpSumMultiple = data.automaticLumpSumMultiple;
    this.earlyReductionPerYear = data.earlyReductionPerYear;
    this.lateIncreasePerYear = data.lateIncreasePerYear;
  }

  /**
   * Proportion of pensionable pay earned as annual pension per year of service
   */
  get accrualFraction(): number {
    return 1 / this.accrualDenominator;
  }

  /**
   * Serializes the scheme rules to a plain object
   * @returns Serialized rule data for storage or transmission
   */
  serialize(): SchemeRulesData {
    return {
      id: this.id,
      name: this.name,
      description: this.description,
      kind: this.kind,
      accrualDenominator: this.accrualDenominator,
      normalPensionAge: this.normalPensionAge,
      automaticLumpSumMultiple: this.automaticLumpSumMultiple,
      earlyReductionPerYear: this.earlyReductionPerYear,
      lateIncreasePerYear: this.lateIncreasePerYear,
    };
  }
}

/**
 * All scheme rules plus the commutation terms shared between schemes
 */
export type SchemeRulesBook = {
  commutationFactor: number;
  maxCommutationProportion: number;
  schemes: Record<SchemeId, SchemeRules>;
};

export const SCHEME_IDS = ['1995', '2008', '2015'] as const satisfies readonly SchemeId[];

/**
 * Looks up the rules of a scheme
 * @param book - Loaded scheme rules
 * @param id - Scheme identifier
 * @returns The scheme's rules
 * @throws ValidationError on `scheme` when the identifier is unknown
 */
export function getScheme(book: SchemeRulesBook, id: string): SchemeRules {
  const rules = isSchemeId(id) ? book.schemes[id] : undefined;
  if (!rules) {
    throw new ValidationError('scheme', `Unknown pension scheme: ${id}`);
  }
  return rules;
}

export function isSchemeId(value: string): value is SchemeId {
  return SCHEME_IDS.some((id) => id === value);
}
