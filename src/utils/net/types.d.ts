import type { SchemeRulesBook } from '../../data/scheme/scheme';
import type { SchemeId } from '../../data/scheme/types';

export type DefaultData = {
  defaultSchemes: SchemeId[];
};

export type RequestData = {
  schemes: SchemeId[];
  // Request body, still untrusted
  data: unknown;
  rules: SchemeRulesBook;
};
