import { z } from 'zod';
import { ValidationError } from '../validate/errors';
import { scenarioFieldsSchema } from '../validate/scenario';
import type { ScenarioInput } from '../validate/scenario';
import { applyFieldUpdates } from '../scenario/update';
import { describeChange } from '../scenario/describe';
import type { FieldChange, FieldUpdate } from '../scenario/types';

export const ASSISTANT_TOOL_NAME = 'update_calculator';

const TOOL_DESCRIPTION =
  'Update the pension calculator with new values. Use this when the user asks to change calculator settings, ' +
  'run scenarios, or explore different options. Only include the fields the user asked to change; ' +
  'rates are fractions (0.025 means 2.5%).';

export type CalculatorTool = {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: z.core.JSONSchema.BaseSchema;
  };
};

export type ToolCallOutcome = {
  scenario: ScenarioInput;
  changes: FieldChange[];
  // Text returned to the model as the tool result
  summary: string;
};

/**
 * Function-calling definition handed to the language model. Its parameters are generated
 * from the scenario field schema, with every field optional.
 */
export function getCalculatorTool(): CalculatorTool {
  return {
    type: 'function',
    function: {
      name: ASSISTANT_TOOL_NAME,
      description: TOOL_DESCRIPTION,
      parameters: z.toJSONSchema(scenarioFieldsSchema.partial()),
    },
  };
}

/**
 * Turns the model's tool-call arguments into field updates
 * @param args - The raw `arguments` JSON string, or an already parsed object
 * @throws ValidationError on `arguments` when the payload is not a JSON object
 */
export function parseToolArguments(args: unknown): FieldUpdate[] {
  let parsed = args;
  if (typeof args === 'string') {
    try {
      parsed = JSON.parse(args);
    } catch (error) {
      throw new ValidationError(
        'arguments',
        `Tool arguments are not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ValidationError('arguments', 'Tool arguments must be a JSON object');
  }
  return Object.entries(parsed).map(([field, value]) => ({ field, value }));
}

export function summarizeChanges(changes: FieldChange[]): string {
  if (changes.length === 0) {
    return 'No changes made to the calculator.';
  }
  return ['Calculator updated:', ...changes.map((change) => `• ${describeChange(change)}`)].join('\n');
}

/**
 * Applies an assistant tool call to a scenario through the same validation as form edits
 * @param scenario - Scenario the user is looking at
 * @param args - Tool-call arguments from the model
 * @param name - Tool name from the model, when known
 * @throws ValidationError when the call or any of its values is rejected
 */
export function applyToolCall(scenario: ScenarioInput, args: unknown, name: string = ASSISTANT_TOOL_NAME): ToolCallOutcome {
  if (name !== ASSISTANT_TOOL_NAME) {
    throw new ValidationError('name', `Unknown tool: ${name}`);
  }
  const { scenario: updated, changes } = applyFieldUpdates(scenario, parseToolArguments(args));
  return {
    scenario: updated,
    changes,
    summary: summarizeChanges(changes),
  };
}
