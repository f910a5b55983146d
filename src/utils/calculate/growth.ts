/**
 * Compound growth multiplier over a number of years (years may be negative to back-project)
 */
export function compoundFactor(rate: number, years: number): number {
  return (1 + rate) ** years;
}

/**
 * Salary after growing at `growthRate` for `years`
 */
export function projectSalary(salary: number, growthRate: number, years: number): number {
  return salary * compoundFactor(growthRate, years);
}
