import { describe, it, expect } from 'vitest';
import { finalSalaryPension } from './finalSalary';
import { projectSalary, compoundFactor } from './growth';
import { createMockScenario, createTestRulesBook } from '../test/mockData';

describe('growth helpers', () => {
  it('should compound growth over whole years', () => {
    expect(compoundFactor(0.025, 10)).toBeCloseTo(1.2800845442, 9);
  });

  it('should back-project salary for negative years', () => {
    expect(projectSalary(10404, 0.02, -2)).toBeCloseTo(10000, 9);
  });
});

describe('finalSalaryPension', () => {
  const book = createTestRulesBook();

  it('should value service on the current salary when there is no growth', () => {
    const outcome = finalSalaryPension(createMockScenario(), book.schemes['1995']);

    expect(outcome).toEqual({
      projectedSalary: 50000,
      pensionableSalary: 50000,
      basePension: 15625,
      accrualSlices: [],
    });
  });

  it('should project salary to retirement at the growth rate', () => {
    const scenario = createMockScenario({
      scheme: '2008',
      currentAge: 45,
      retirementAge: 65,
      currentSalary: 30000,
      serviceYears: 20,
      salaryGrowthRate: 0.02,
    });

    const outcome = finalSalaryPension(scenario, book.schemes['2008']);

    expect(outcome.projectedSalary).toBeCloseTo(44578.42, 2);
    expect(outcome.pensionableSalary).toBe(outcome.projectedSalary);
    expect(outcome.basePension).toBeCloseTo(14859.47, 2);
  });

  it('should earn nothing without service', () => {
    const outcome = finalSalaryPension(createMockScenario({ serviceYears: 0 }), book.schemes['1995']);

    expect(outcome.basePension).toBe(0);
  });
});
