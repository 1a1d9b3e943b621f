import { ConfigurationError } from '../../errors.js';
import type { Rule } from '../../types.js';
import { collectionRules } from './collections.js';
import { exceptionRules } from './exceptions.js';
import { intentRules } from './intents.js';
import { lifecycleRules } from './lifecycle.js';
import { networkingRules } from './networking.js';
import { nullSafetyRules } from './null-safety.js';
import { resourceRules } from './resources.js';
import { sqlRules } from './sql.js';
import { stateMachineRules } from './state-machine.js';
import { threadingRules } from './threading.js';
import { typeSafetyRules } from './type-safety.js';

export const allRules: Rule[] = [
  ...nullSafetyRules,
  ...exceptionRules,
  ...collectionRules,
  ...lifecycleRules,
  ...stateMachineRules,
  ...sqlRules,
  ...resourceRules,
  ...threadingRules,
  ...typeSafetyRules,
  ...intentRules,
  ...networkingRules,
];

export interface RuleSelection {
  /** Rule names to run; empty or absent means every rule */
  enable?: readonly string[];
  disable?: readonly string[];
}

/**
 * Resolve enable/disable lists against the catalogue, keeping catalogue
 * order. Unknown names are configuration errors.
 */
export function selectRules(selection: RuleSelection = {}, catalogue: readonly Rule[] = allRules): Rule[] {
  const known = new Set(catalogue.map((rule) => rule.name));
  const normalize = (names: readonly string[] = []) => names.map((name) => name.trim().toUpperCase()).filter(Boolean);
  const enable = normalize(selection.enable);
  const disable = normalize(selection.disable);

  const unknown = [...enable, ...disable].filter((name) => !known.has(name));
  if (unknown.length > 0) {
    throw new ConfigurationError(`Unknown rule name(s): ${unknown.join(', ')}. Run "crashscan rules" to list them.`);
  }

  return catalogue.filter(
    (rule) => (enable.length === 0 || enable.includes(rule.name)) && !disable.includes(rule.name),
  );
}

export {
  collectionRules,
  exceptionRules,
  intentRules,
  lifecycleRules,
  networkingRules,
  nullSafetyRules,
  resourceRules,
  sqlRules,
  stateMachineRules,
  threadingRules,
  typeSafetyRules,
};
