import { describe, it, expect } from 'vitest';
import { describeChange, describeValue } from './describe';

describe('describeChange', () => {
  it('should format salaries as currency', () => {
    expect(describeChange({ field: 'currentSalary', previous: 40000, next: 50000 })).toBe(
      'Current salary: £40,000 → £50,000',
    );
  });

  it('should format rates as percentages', () => {
    expect(describeChange({ field: 'inflationRate', previous: 0.025, next: 0.03 })).toBe('Inflation rate: 2.5% → 3%');
  });

  it('should show plain values as they are', () => {
    expect(describeChange({ field: 'scheme', previous: '1995', next: '2015' })).toBe('Pension scheme: 1995 → 2015');
    expect(describeChange({ field: 'serviceYears', previous: 20, next: 20.5 })).toBe('Years of service: 20 → 20.5');
  });

  it('should describe a field being set for the first time', () => {
    expect(
      describeChange({ field: 'commutation', previous: undefined, next: { type: 'proportion', proportion: 0.15 } }),
    ).toBe('Commutation: none → 15% of pension');
  });
});

describe('describeValue', () => {
  it('should describe a lump sum commutation with its factor', () => {
    expect(describeValue('commutation', { type: 'lumpSum', amount: 20000, factor: 15 })).toBe(
      '£20,000 lump sum at 15:1',
    );
  });

  it('should describe a missing value as none', () => {
    expect(describeValue('revaluationRate', null)).toBe('none');
  });

  it('should format a rate override as a percentage', () => {
    expect(describeValue('earlyReductionPerYear', 0.04)).toBe('4%');
  });
});
