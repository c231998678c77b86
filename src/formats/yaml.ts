/**
 * YAML Parser
 *
 * OpenAPI documents are commonly written in YAML.
 */

import { parse } from 'yaml';
import { InputRole } from '../core/types';

export function parseYaml(input: string, role: InputRole = 'input'): unknown {
  try {
    return parse(input);
  } catch (error) {
    throw new Error(
      `Failed to parse ${role} as YAML: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}
