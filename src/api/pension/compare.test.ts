import { describe, it, expect, vi, beforeEach } from 'vitest';
import { comparePensionSchemes } from './compare';
import { getData } from '../../utils/net/request';
import { createMockRequest, createMockScenario, createTestRulesBook } from '../../utils/test/mockData';

// Mock dependencies
vi.mock('../../utils/net/request');

describe('comparePensionSchemes', () => {
  const rules = createTestRulesBook();

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should compare the schemes selected in the query', () => {
    const scenario = createMockScenario();
    vi.mocked(getData).mockReturnValue({ schemes: ['1995', '2015'], data: scenario, rules });

    const comparison = comparePensionSchemes(createMockRequest({ body: scenario, query: { schemes: '1995,2015' } }));

    expect(comparison.map((entry) => entry.scheme)).toEqual(['1995', '2015']);
    expect(comparison[0].result?.annualPension).toBe(15625);
    expect(comparison[1].result?.kind).toBe('careerAverage');
  });
});
