/**
 * XML Parser
 *
 * Turns XML response bodies into plain objects so their element names can be
 * case-checked like JSON keys. Attributes become `@_`-prefixed keys and mixed
 * content a `#text` key; neither is a name the API chose, so xmlMarkupKeys
 * lists them for the caller to ignore.
 */

import { XMLParser } from 'fast-xml-parser';
import { InputRole } from '../core/types';
import { isMapping, isSequence } from '../core/openapi';

export const XML_ATTRIBUTE_PREFIX = '@_';
export const XML_TEXT_KEY = '#text';

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: XML_ATTRIBUTE_PREFIX,
  textNodeName: XML_TEXT_KEY,
  ignoreDeclaration: true,
  parseAttributeValue: true,
  parseTagValue: true,
  trimValues: true,
});

export function parseXml(input: string, role: InputRole = 'input'): unknown {
  try {
    return xmlParser.parse(input);
  } catch (error) {
    throw new Error(
      `Failed to parse ${role} as XML: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

export function isXml(input: string): boolean {
  const trimmed = input.trim();
  return trimmed.startsWith('<') && trimmed.endsWith('>');
}

/**
 * Attribute and text-node keys found anywhere in parsed XML, in first-seen order.
 */
export function xmlMarkupKeys(data: unknown): string[] {
  const keys = new Set<string>();

  const visit = (node: unknown): void => {
    if (isSequence(node)) {
      node.forEach(visit);
    } else if (isMapping(node)) {
      for (const [key, value] of Object.entries(node)) {
        if (key === XML_TEXT_KEY || key.startsWith(XML_ATTRIBUTE_PREFIX)) keys.add(key);
        visit(value);
      }
    }
  };

  visit(data);
  return [...keys];
}
