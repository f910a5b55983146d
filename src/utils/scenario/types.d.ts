import type { ScenarioField } from '../validate/scenario';

/**
 * A request to set one scenario field, from a form edit or an assistant tool call
 */
export type FieldUpdate = {
  field: string;
  value: unknown;
};

export type FieldChange = {
  field: ScenarioField;
  previous: unknown;
  next: unknown;
};
