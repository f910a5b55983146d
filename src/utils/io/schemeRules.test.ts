import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createSchemeRulesBook, loadSchemeRules, resetSchemeRulesCache, SCHEME_RULES_FILE } from './schemeRules';
import { load } from './io';
import { log } from '../logger';
import { TEST_SCHEMES } from '../test/mockData';

vi.mock('./io');
vi.mock('../logger');

const rulesData = {
  commutationFactor: 12,
  maxCommutationProportion: 0.3,
  schemes: TEST_SCHEMES,
};

describe('createSchemeRulesBook', () => {
  it('should index schemes by identifier', () => {
    const book = createSchemeRulesBook(rulesData);

    expect(Object.keys(book.schemes)).toEqual(['1995', '2008', '2015']);
    expect(book.schemes['2008'].accrualFraction).toBe(1 / 60);
    expect(book.commutationFactor).toBe(12);
    expect(book.maxCommutationProportion).toBe(0.3);
  });

  it('should require every scheme', () => {
    expect(() => createSchemeRulesBook({ ...rulesData, schemes: TEST_SCHEMES.slice(0, 2) })).toThrow(
      'Invalid scheme rules at schemes: Expected exactly one entry for scheme 2015, found 0',
    );
  });

  it('should reject duplicate schemes', () => {
    expect(() => createSchemeRulesBook({ ...rulesData, schemes: [...TEST_SCHEMES, TEST_SCHEMES[0]] })).toThrow(
      'Invalid scheme rules at schemes: Expected exactly one entry for scheme 1995, found 2',
    );
  });

  it('should name the offending rule', () => {
    const schemes = [{ ...TEST_SCHEMES[0], accrualDenominator: 0 }, TEST_SCHEMES[1], TEST_SCHEMES[2]];

    expect(() => createSchemeRulesBook({ ...rulesData, schemes })).toThrow(
      /^Invalid scheme rules at schemes\.0\.accrualDenominator: /,
    );
  });
});

describe('loadSchemeRules', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    resetSchemeRulesCache();
    vi.mocked(load).mockReturnValue(rulesData);
  });

  it('should load and log the rules file', () => {
    const book = loadSchemeRules();

    expect(load).toHaveBeenCalledWith(SCHEME_RULES_FILE);
    expect(book.schemes['1995'].automaticLumpSumMultiple).toBe(3);
    expect(log).toHaveBeenCalledWith('Loaded scheme rules', { schemes: '1995,2008,2015', commutationFactor: 12 });
  });

  it('should read the file once', () => {
    const first = loadSchemeRules();
    const second = loadSchemeRules();

    expect(second).toBe(first);
    expect(load).toHaveBeenCalledTimes(1);
  });

  it('should read the file again after a reset', () => {
    loadSchemeRules();
    resetSchemeRulesCache();
    loadSchemeRules();

    expect(load).toHaveBeenCalledTimes(2);
  });

  it('should accept the shipped rules file', async () => {
    const io = await vi.importActual<typeof import('./io')>('./io');
    vi.mocked(load).mockImplementation(io.load);

    const book = loadSchemeRules();

    expect(book.schemes['1995'].accrualDenominator).toBe(80);
    expect(book.schemes['2008'].normalPensionAge).toBe(65);
    expect(book.schemes['2015'].accrualFraction).toBe(1 / 54);
  });
});
