/**
 * Shared test helpers
 */

import * as fs from 'fs';
import * as path from 'path';
import { parseYaml } from '../src/formats/yaml';
import { LoggerProvider } from '../src/core/types';

export class RecordingLogger implements LoggerProvider {
  readonly messages: string[] = [];

  debug(message: string): void {
    this.messages.push(message);
  }

  info(message: string): void {
    this.messages.push(message);
  }

  warn(message: string): void {
    this.messages.push(message);
  }

  error(message: string): void {
    this.messages.push(message);
  }
}

export function loadFixture(name: string): unknown {
  return parseYaml(fs.readFileSync(path.join(__dirname, 'fixtures', name), 'utf-8'));
}

/**
 * Run a function that must throw and return what it threw.
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}
