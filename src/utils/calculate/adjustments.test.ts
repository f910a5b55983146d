import { describe, it, expect } from 'vitest';
import { commutePension, retirementAdjustmentFactor } from './adjustments';
import { ValidationError } from '../validate/errors';
import { createTestRulesBook } from '../test/mockData';

describe('retirementAdjustmentFactor', () => {
  it('should return 1 at normal pension age', () => {
    expect(retirementAdjustmentFactor(0, 0.04, 0.03)).toBe(1);
  });

  it('should compound the early reduction for each year early', () => {
    expect(retirementAdjustmentFactor(-3, 0.04, 0.03)).toBeCloseTo(0.884736, 10);
  });

  it('should compound the late increase for each year late', () => {
    expect(retirementAdjustmentFactor(3, 0.04, 0.03)).toBeCloseTo(1.092727, 10);
  });

  it('should return 1 when the early reduction is zero', () => {
    expect(retirementAdjustmentFactor(-5, 0, 0.03)).toBe(1);
  });
});

describe('commutePension', () => {
  const book = createTestRulesBook();

  it('should give up nothing without a commutation request', () => {
    expect(commutePension(10000, undefined, book)).toEqual({
      factor: 12,
      commutedPension: 0,
      commutationLumpSum: 0,
    });
  });

  it('should commute a proportion of the pension at the book factor', () => {
    const outcome = commutePension(10000, { type: 'proportion', proportion: 0.15 }, book);

    expect(outcome.factor).toBe(12);
    expect(outcome.commutedPension).toBeCloseTo(1500, 10);
    expect(outcome.commutationLumpSum).toBeCloseTo(18000, 10);
  });

  it('should use a factor supplied with the request', () => {
    const outcome = commutePension(10000, { type: 'proportion', proportion: 0.1, factor: 15 }, book);

    expect(outcome.factor).toBe(15);
    expect(outcome.commutationLumpSum).toBeCloseTo(15000, 10);
  });

  it('should derive the pension given up from a requested lump sum', () => {
    const outcome = commutePension(10000, { type: 'lumpSum', amount: 24000 }, book);

    expect(outcome.commutedPension).toBe(2000);
    expect(outcome.commutationLumpSum).toBe(24000);
  });

  it('should allow a lump sum exactly at the cap', () => {
    const outcome = commutePension(10000, { type: 'lumpSum', amount: 36000 }, book);

    expect(outcome.commutedPension).toBe(3000);
  });

  it('should reject a proportion above the cap', () => {
    expect(() => commutePension(10000, { type: 'proportion', proportion: 0.35 }, book)).toThrow(
      new ValidationError('commutation.proportion', 'At most 30% of the pension can be commuted'),
    );
  });

  it('should reject a lump sum that gives up more than the cap', () => {
    try {
      commutePension(10000, { type: 'lumpSum', amount: 40000 }, book);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect((error as ValidationError).field).toBe('commutation.amount');
      expect((error as ValidationError).message).toBe(
        'A lump sum of £40,000 would give up more than 30% of the pension',
      );
    }
  });

  it('should reject any lump sum when there is no pension', () => {
    expect(() => commutePension(0, { type: 'lumpSum', amount: 1 }, book)).toThrow(ValidationError);
  });
});
