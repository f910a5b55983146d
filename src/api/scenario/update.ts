import type { Request } from 'express';
import { z } from 'zod';
import type { BenefitResult } from '../../data/scenario/types';
import { calculateBenefits } from '../../utils/calculate/pension';
import { getData, parseBody } from '../../utils/net/request';
import { describeChange } from '../../utils/scenario/describe';
import type { FieldChange } from '../../utils/scenario/types';
import { applyFieldUpdates } from '../../utils/scenario/update';
import type { ScenarioInput } from '../../utils/validate/scenario';
import { validateScenario } from '../../utils/validate/scenario';

const fieldUpdateBodySchema = z.object({
  scenario: z.unknown(),
  field: z.string().min(1),
  value: z.unknown(),
});

export type ScenarioUpdateResponse = {
  scenario: ScenarioInput;
  changes: FieldChange[];
  messages: string[];
  result: BenefitResult;
};

/**
 * Applies a single field edit from the form and recalculates
 *
 * Body: `{ scenario, field, value }`. The edit goes through the same validation as
 * assistant tool calls.
 *
 * @param request - Express request object
 * @returns The updated scenario, what changed and the new benefits
 */
export function updateScenarioField(request: Request): ScenarioUpdateResponse {
  const { data, rules } = getData(request);
  const body = parseBody(fieldUpdateBodySchema, data);
  const { scenario, changes } = applyFieldUpdates(validateScenario(body.scenario), [
    { field: body.field, value: body.value },
  ]);
  return {
    scenario,
    changes,
    messages: changes.map(describeChange),
    result: calculateBenefits(scenario, rules),
  };
}
