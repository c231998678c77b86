/**
 * Format Parsers — Barrel export
 */

export { parseJson, isJson } from './json';
export { parseXml, isXml, xmlMarkupKeys, XML_ATTRIBUTE_PREFIX, XML_TEXT_KEY } from './xml';
export { parseYaml } from './yaml';

import { InputFormat, InputRole } from '../core/types';
import { isJson, parseJson } from './json';
import { isXml, parseXml } from './xml';
import { parseYaml } from './yaml';

/**
 * Guess the format of an input: JSON (any value), then XML, else YAML.
 */
export function detectFormat(input: string): InputFormat {
  if (isJson(input)) return 'json';
  if (isXml(input)) return 'xml';
  return 'yaml';
}

/**
 * Parse a response body or schema document in whichever format it is in.
 * A YAML input that reads as a bare string is treated as unrecognised.
 */
export function autoParse(input: string, role: InputRole = 'input'): unknown {
  const trimmed = input.trim();

  switch (detectFormat(trimmed)) {
    case 'json':
      return parseJson(trimmed, role);
    case 'xml':
      return parseXml(trimmed, role);
    case 'yaml': {
      const parsed = parseYaml(trimmed, role);
      if (typeof parsed !== 'string') return parsed;
      throw new Error(
        `Unable to auto-detect the format of the ${role}. Supported formats: JSON, XML, YAML. ` +
          'Please provide data in a supported format.'
      );
    }
  }
}
