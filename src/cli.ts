#!/usr/bin/env node

/**
 * openapi-case-tester CLI
 *
 * Commands:
 *   response  - Check the keys of a response body
 *   schema    - Check the property names of a single OpenAPI schema
 *   document  - Check every response schema of an OpenAPI document
 */

import { Command } from 'commander';
import * as fs from 'fs';
import { CaseTester } from './tester';
import { CASE_CONVENTIONS, isCaseConvention } from './core/checks';
import { CaseReport, DocumentReport, InputFormat, InputRole, ReportFormat, Settings } from './core/types';
import { loadSettingsFile, resolveSettings } from './config';
import { autoParse, detectFormat, xmlMarkupKeys } from './formats';

const REPORT_FORMATS: readonly ReportFormat[] = ['console', 'json', 'markdown'];

interface CommonOptions {
  data: string;
  case?: string;
  ignore?: string[];
  config?: string;
  format: string;
  output?: string;
}

interface DocumentOptions extends CommonOptions {
  route?: string;
  method?: string;
  status?: string;
}

const program = new Command();

program
  .name('openapi-case-tester')
  .description('Check that API response keys and OpenAPI schema properties follow one case convention.')
  .version('1.0.0');

// ─── Common Options ─────────────────────────────────────────────────────────

function withCommonOptions(command: Command): Command {
  return command
    .requiredOption('-d, --data <data>', 'Input (file path or inline JSON/YAML/XML)')
    .option('-c, --case <convention>', `Case convention: ${CASE_CONVENTIONS.join(', ')}`)
    .option('-i, --ignore <keys...>', 'Keys to skip (XML attribute and #text keys are skipped already)')
    .option('--config <file>', 'Settings file (JSON or YAML)')
    .option('-f, --format <format>', `Report format: ${REPORT_FORMATS.join(', ')}`, 'console')
    .option('-o, --output <file>', 'Write report to file instead of stdout');
}

interface ParsedInput {
  data: unknown;
  format: InputFormat;
}

function readInput(fileOrData: string, role: InputRole): ParsedInput {
  const raw = fs.existsSync(fileOrData) ? fs.readFileSync(fileOrData, 'utf-8') : fileOrData;
  return { data: autoParse(raw, role), format: detectFormat(raw.trim()) };
}

function buildSettings(opts: CommonOptions): Settings {
  const base = opts.config ? loadSettingsFile(opts.config) : resolveSettings();
  if (opts.case === undefined) return base;
  if (!isCaseConvention(opts.case)) {
    throw new Error(`Unknown case convention "${opts.case}". Use one of: ${CASE_CONVENTIONS.join(', ')}`);
  }
  return { ...base, case: opts.case };
}

function parseFormat(format: string): ReportFormat {
  const match = REPORT_FORMATS.find((f) => f === format);
  if (!match) {
    throw new Error(`Unknown report format "${format}". Use one of: ${REPORT_FORMATS.join(', ')}`);
  }
  return match;
}

function emit(tester: CaseTester, report: CaseReport | DocumentReport, opts: CommonOptions): void {
  const formatted = tester.format(report, parseFormat(opts.format));

  if (opts.output) {
    fs.writeFileSync(opts.output, formatted, 'utf-8');
    console.log(`📄 Report written to ${opts.output}`);
  } else {
    console.log(formatted);
  }

  const failed = 'results' in report ? report.summary.failed > 0 : !report.passed;
  if (failed) process.exitCode = 1;
}

function fail(error: unknown): void {
  console.error(`❌ Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
}

// ─── response Command ───────────────────────────────────────────────────────

withCommonOptions(
  program.command('response').description('Check every object key of a response body')
).action((opts: CommonOptions) => {
  try {
    const tester = new CaseTester(buildSettings(opts));
    const { data, format } = readInput(opts.data, 'response body');
    const markup = format === 'xml' ? xmlMarkupKeys(data) : [];
    const report = tester.checkResponse(data, [...(opts.ignore ?? []), ...markup]);
    emit(tester, report, opts);
  } catch (error) {
    fail(error);
  }
});

// ─── schema Command ─────────────────────────────────────────────────────────

withCommonOptions(
  program.command('schema').description('Check the property names of a single OpenAPI schema')
).action((opts: CommonOptions) => {
  try {
    const tester = new CaseTester(buildSettings(opts));
    const report = tester.checkSchema(readInput(opts.data, 'schema document').data, opts.ignore ?? []);
    emit(tester, report, opts);
  } catch (error) {
    fail(error);
  }
});

// ─── document Command ───────────────────────────────────────────────────────

withCommonOptions(
  program
    .command('document')
    .description('Check response schemas of an OpenAPI document (all, or one endpoint)')
)
  .option('-r, --route <route>', 'Route to check, e.g. "/users/{id}"')
  .option('-m, --method <method>', 'HTTP method of the route', 'get')
  .option('-s, --status <status>', 'Response status code', '200')
  .action((opts: DocumentOptions) => {
    try {
      const tester = new CaseTester(buildSettings(opts));
      const document = readInput(opts.data, 'OpenAPI document').data;
      const ignore = opts.ignore ?? [];

      if (opts.route) {
        const method = opts.method ?? 'get';
        const status = opts.status ?? '200';
        const target = `${method.toUpperCase()} ${opts.route} ${status}`;
        const schema = tester.responseSchema(document, opts.route, method, status);
        emit(tester, tester.checkSchema(schema, ignore, target), opts);
      } else {
        emit(tester, tester.checkDocument(document, ignore), opts);
      }
    } catch (error) {
      fail(error);
    }
  });

// ─── Run ────────────────────────────────────────────────────────────────────

program.parse();
