export type SchemeId = '1995' | '2008' | '2015';

export type SchemeKind = 'finalSalary' | 'careerAverage';

export type SchemeRulesData = {
  id: SchemeId;
  name: string;
  description: string;
  kind: SchemeKind;
  accrualDenominator: number;
  normalPensionAge: number;
  automaticLumpSumMultiple: number;
  earlyReductionPerYear: number;
  lateIncreasePerYear: number;
};

export type SchemeRulesBookData = {
  commutationFactor: number;
  maxCommutationProportion: number;
  schemes: SchemeRulesData[];
};
