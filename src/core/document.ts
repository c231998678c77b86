/**
 * Document Helpers
 *
 * Locate response schemas inside a whole OpenAPI document. Supports
 * Swagger 2 (`responses.<status>.schema`) and OpenAPI 3
 * (`responses.<status>.content.<media type>.schema`). `$ref` nodes are not
 * resolved.
 */

import { escapePointer } from './walker';
import { hasKey, indexSchema, isMapping } from './openapi';
import { LoggerProvider, ResponseSchemaEntry } from './types';
import { defaultLogger } from '../logger/console-logger';

const HTTP_METHODS = ['get', 'put', 'post', 'delete', 'options', 'head', 'patch', 'trace'];

function pointerTo(...segments: string[]): string {
  return ['#', ...segments.map(escapePointer)].join('/');
}

function listKeys(node: unknown): string {
  return isMapping(node) ? Object.keys(node).join(', ') : '';
}

// ─── Enumerate ──────────────────────────────────────────────────────────────

/**
 * Every response schema in a document, in path → method → status order.
 * Responses without a schema are skipped.
 */
export function listResponseSchemas(document: unknown): ResponseSchemaEntry[] {
  const entries: ResponseSchemaEntry[] = [];
  if (!isMapping(document) || !isMapping(document.paths)) return entries;

  for (const [route, pathItem] of Object.entries(document.paths)) {
    if (!isMapping(pathItem)) continue;

    for (const [method, operation] of Object.entries(pathItem)) {
      if (!HTTP_METHODS.includes(method) || !isMapping(operation)) continue;
      if (!isMapping(operation.responses)) continue;

      for (const [status, response] of Object.entries(operation.responses)) {
        if (!isMapping(response)) continue;
        const base = ['paths', route, method, 'responses', status];

        if (hasKey(response, 'schema')) {
          entries.push({
            route,
            method,
            status,
            pointer: pointerTo(...base, 'schema'),
            schema: response.schema,
          });
        }

        if (isMapping(response.content)) {
          for (const [mediaType, media] of Object.entries(response.content)) {
            if (!isMapping(media) || !hasKey(media, 'schema')) continue;
            entries.push({
              route,
              method,
              status,
              mediaType,
              pointer: pointerTo(...base, 'content', mediaType, 'schema'),
              schema: media.schema,
            });
          }
        }
      }
    }
  }

  return entries;
}

// ─── Lookup ─────────────────────────────────────────────────────────────────

/**
 * Look up the response schema for one route, method and status.
 *
 * Swagger 2 documents carry the schema directly on the response; OpenAPI 3
 * documents are read through `content['application/json']`.
 */
export function responseSchema(
  document: unknown,
  route: string,
  method: string,
  status: number | string,
  logger: LoggerProvider = defaultLogger
): unknown {
  const paths = indexSchema(document, 'paths', '', logger);
  const pathItem = indexSchema(
    paths,
    route,
    `\n\nFor debugging purposes, other valid routes include: ${listKeys(paths)}`,
    logger
  );
  const operation = indexSchema(
    pathItem,
    method.toLowerCase(),
    `\n\nAvailable methods include: ${listKeys(pathItem)}`,
    logger
  );
  const responses = indexSchema(operation, 'responses', '', logger);
  const response = indexSchema(
    responses,
    String(status),
    `\n\nUndocumented status code: ${status}.\n\nDocumented responses include: ${listKeys(responses)}`,
    logger
  );

  if (isMapping(response) && hasKey(response, 'schema')) {
    return response.schema;
  }

  const content = indexSchema(
    response,
    'content',
    `\n\nNo schema or content is documented for ${method.toUpperCase()} ${route} ${status}.`,
    logger
  );
  const media = indexSchema(
    content,
    'application/json',
    `\n\nDocumented media types include: ${listKeys(content)}`,
    logger
  );
  return indexSchema(media, 'schema', '', logger);
}
