import { formatCurrency, formatPercentage } from '../format/format';
import type { Commutation, ScenarioField } from '../validate/scenario';
import { commutationSchema } from '../validate/scenario';
import type { FieldChange } from './types';

export const FIELD_LABELS: Record<ScenarioField, string> = {
  scheme: 'Pension scheme',
  currentAge: 'Current age',
  currentSalary: 'Current salary',
  serviceYears: 'Years of service',
  retirementAge: 'Retirement age',
  salaryGrowthRate: 'Salary growth',
  investmentGrowthRate: 'Investment growth',
  inflationRate: 'Inflation rate',
  normalPensionAge: 'Normal pension age',
  earlyReductionPerYear: 'Early reduction per year',
  lateIncreasePerYear: 'Late increase per year',
  revaluationRate: 'CARE revaluation rate',
  commutation: 'Commutation',
};

const PERCENTAGE_FIELDS: ScenarioField[] = [
  'salaryGrowthRate',
  'investmentGrowthRate',
  'inflationRate',
  'earlyReductionPerYear',
  'lateIncreasePerYear',
  'revaluationRate',
];

function describeCommutation(commutation: Commutation): string {
  const factor = commutation.factor === undefined ? '' : ` at ${commutation.factor}:1`;
  if (commutation.type === 'proportion') {
    return `${formatPercentage(commutation.proportion)} of pension${factor}`;
  }
  return `${formatCurrency(commutation.amount)} lump sum${factor}`;
}

/**
 * Renders one field value for display
 */
export function describeValue(field: ScenarioField, value: unknown): string {
  if (value === undefined || value === null) {
    return 'none';
  }
  if (typeof value === 'number') {
    if (field === 'currentSalary') {
      return formatCurrency(value);
    }
    if (PERCENTAGE_FIELDS.includes(field)) {
      return formatPercentage(value);
    }
  }
  if (field === 'commutation') {
    const commutation = commutationSchema.safeParse(value);
    if (commutation.success) {
      return describeCommutation(commutation.data);
    }
  }
  return String(value);
}

/**
 * Renders a change as `Label: previous → next`
 */
export function describeChange(change: FieldChange): string {
  return `${FIELD_LABELS[change.field]}: ${describeValue(change.field, change.previous)} → ${describeValue(
    change.field,
    change.next,
  )}`;
}
