/**
 * JSON Parser
 *
 * Response bodies may be any JSON value. Objects and arrays are what get
 * case-checked; scalar bodies (`null`, `5`, `"ok"`) parse too and walk as no-ops.
 */

import { InputRole } from '../core/types';

const JSON_SCALAR = /^(?:null|true|false|-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?|"(?:[^"\\]|\\.)*")$/;

function isJsonContainer(input: string): boolean {
  return (
    (input.startsWith('{') && input.endsWith('}')) ||
    (input.startsWith('[') && input.endsWith(']'))
  );
}

/**
 * Whether the input is a JSON object, array or scalar literal.
 */
export function isJson(input: string): boolean {
  const trimmed = input.trim();
  return isJsonContainer(trimmed) || JSON_SCALAR.test(trimmed);
}

/**
 * Parse JSON, naming the input's role when it fails. Objects and arrays
 * written with trailing commas are accepted.
 */
export function parseJson(input: string, role: InputRole = 'input'): unknown {
  const trimmed = input.trim();

  try {
    return JSON.parse(trimmed);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    if (!isJsonContainer(trimmed)) {
      throw new Error(`Failed to parse ${role} as JSON: ${reason}`);
    }
    try {
      return JSON.parse(trimmed.replace(/,\s*([\]}])/g, '$1'));
    } catch {
      throw new Error(`Failed to parse ${role} as JSON: ${reason}`);
    }
  }
}
