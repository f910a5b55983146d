import type { Request } from 'express';
import { z } from 'zod';
import type { BenefitResult } from '../../data/scenario/types';
import { applyToolCall } from '../../utils/assistant/tool';
import type { ToolCallOutcome } from '../../utils/assistant/tool';
import { calculateBenefits } from '../../utils/calculate/pension';
import { log } from '../../utils/logger';
import { getData, parseBody } from '../../utils/net/request';
import { validateScenario } from '../../utils/validate/scenario';

const toolCallBodySchema = z.object({
  scenario: z.unknown(),
  name: z.string().optional(),
  arguments: z.unknown(),
});

export type AssistantUpdateResponse = ToolCallOutcome & {
  result: BenefitResult;
};

/**
 * Applies the arguments of an `update_calculator` tool call to a scenario
 *
 * Body: `{ scenario, name?, arguments }`, where `arguments` is the model's JSON string
 * (or object). Model output is untrusted and is validated field by field before anything
 * changes. The `summary` in the response is meant to be returned to the model as the
 * tool result.
 *
 * @param request - Express request object
 * @returns The updated scenario, the changes, a summary and the new benefits
 */
export function applyAssistantUpdate(request: Request): AssistantUpdateResponse {
  const { data, rules } = getData(request);
  const body = parseBody(toolCallBodySchema, data);
  const outcome = applyToolCall(validateScenario(body.scenario), body.arguments, body.name);
  if (outcome.changes.length > 0) {
    log('Assistant updated scenario', { fields: outcome.changes.map((change) => change.field).join(',') });
  }
  return {
    ...outcome,
    result: calculateBenefits(outcome.scenario, rules),
  };
}
