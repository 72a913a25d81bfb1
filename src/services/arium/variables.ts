/**
 * `<variable_name>` placeholders in prompts and inputs: extraction,
 * validation before a run starts, and substitution.
 */

import { NodeInput, Variables } from '../../types/messageTypes';
import { VariableResolutionError } from '../../middleware/errors';

const PLACEHOLDER = /<(\w+)>/g;

export const INPUTS_OWNER = 'inputs';

function hasVariable(variables: Variables, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(variables, name);
}

export function extractVariables(text: string | undefined | null): Set<string> {
  if (!text) return new Set();
  return new Set(Array.from(text.matchAll(PLACEHOLDER), (match) => match[1]));
}

export function extractVariablesFromInputs(inputs: readonly NodeInput[]): Set<string> {
  const names = new Set<string>();
  for (const input of inputs) {
    const text =
      typeof input === 'string'
        ? input
        : input.content.type === 'text'
          ? input.content.text
          : undefined;
    extractVariables(text).forEach((name) => names.add(name));
  }
  return names;
}

/**
 * Check every owner's placeholders against the supplied values. All gaps are
 * reported together, grouped by owner, in one error.
 */
export function validateVariables(
  required: ReadonlyMap<string, ReadonlySet<string>>,
  provided: Variables,
): void {
  const missingByNode: Record<string, string[]> = {};
  for (const [owner, names] of required) {
    const missing = [...names].filter((name) => !hasVariable(provided, name)).sort();
    if (missing.length) {
      missingByNode[owner] = missing;
    }
  }
  if (Object.keys(missingByNode).length) {
    throw new VariableResolutionError(missingByNode, Object.keys(provided).sort());
  }
}

/**
 * Substitute placeholders. Any placeholder without a value is an error;
 * text without placeholders comes back unchanged.
 */
export function resolveVariables(text: string, variables: Variables, owner = 'text'): string {
  const missing = [...extractVariables(text)].filter((name) => !hasVariable(variables, name));
  if (missing.length) {
    throw new VariableResolutionError({ [owner]: missing.sort() }, Object.keys(variables).sort());
  }
  return text.replace(PLACEHOLDER, (_match, name: string) => variables[name]);
}
