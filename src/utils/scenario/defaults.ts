import { load } from '../io/io';
import { validateScenario } from '../validate/scenario';
import type { ScenarioInput } from '../validate/scenario';

export const DEFAULT_SCENARIO_FILE = 'default_scenario.json';

/**
 * Starting inputs offered to a new user, read from the data directory
 * @throws ValidationError if the stored defaults are not a valid scenario
 */
export function defaultScenario(): ScenarioInput {
  return validateScenario(load(DEFAULT_SCENARIO_FILE));
}
