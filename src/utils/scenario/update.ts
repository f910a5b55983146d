import { isDeepStrictEqual } from 'util';
import { toScenarioField, validateField, validateScenario } from '../validate/scenario';
import type { ScenarioInput } from '../validate/scenario';
import type { FieldChange, FieldUpdate } from './types';

export type ScenarioUpdate = {
  scenario: ScenarioInput;
  changes: FieldChange[];
};

/**
 * Applies field updates to a scenario without mutating it.
 *
 * Every value is validated on its own, then the merged scenario is validated as a whole,
 * so form edits and assistant tool calls are held to the same rules.
 * Null or undefined values are skipped, as are values equal to the current one.
 *
 * @param scenario - Current scenario
 * @param updates - Requested field values
 * @returns The new scenario and the fields that actually changed
 * @throws ValidationError on the first rejected field
 */
export function applyFieldUpdates(scenario: ScenarioInput, updates: FieldUpdate[]): ScenarioUpdate {
  const current = validateScenario(scenario);
  const merged: Record<string, unknown> = { ...current };
  const changes: FieldChange[] = [];

  for (const { field, value } of updates) {
    if (value === null || value === undefined) {
      continue;
    }
    const name = toScenarioField(field);
    const next = validateField(name, value);
    const previous = merged[name];
    if (isDeepStrictEqual(previous, next)) {
      continue;
    }
    merged[name] = next;
    changes.push({ field: name, previous, next });
  }

  return {
    scenario: changes.length > 0 ? validateScenario(merged) : current,
    changes,
  };
}
