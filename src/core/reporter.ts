/**
 * Report Generator
 *
 * Renders case-check outcomes as console text (coloured), JSON or Markdown.
 */

import chalk from 'chalk';
import { CaseReport, DocumentReport, ReportFormat } from './types';
import { CASE_LABEL } from './errors';

type AnyReport = CaseReport | DocumentReport;

function isDocumentReport(report: AnyReport): report is DocumentReport {
  return 'results' in report;
}

function resultsOf(report: AnyReport): CaseReport[] {
  return isDocumentReport(report) ? report.results : [report];
}

/**
 * Format a single or document report in the specified format.
 */
export function formatReport(report: AnyReport, format: ReportFormat): string {
  switch (format) {
    case 'console':
      return formatConsole(report);
    case 'json':
      return formatJson(report);
    case 'markdown':
      return formatMarkdown(report);
    default:
      return formatConsole(report);
  }
}

// ─── Console Format ─────────────────────────────────────────────────────────

function formatConsole(report: AnyReport): string {
  const lines: string[] = [];
  const bar = '━'.repeat(50);

  lines.push('');
  lines.push(chalk.bold(`🔍 Key Case Report (${CASE_LABEL[report.convention]})`));
  lines.push(chalk.gray(bar));

  for (const result of resultsOf(report)) {
    if (result.passed) {
      lines.push(`✅ ${chalk.green('PASS')} ${result.target}`);
      continue;
    }
    lines.push(`❌ ${chalk.red('FAIL')} ${result.target}`);
    for (const line of (result.failure?.message ?? '').split('\n')) {
      if (line.trim() !== '') lines.push(`     ${line}`);
    }
  }

  lines.push(chalk.gray(bar));

  if (isDocumentReport(report)) {
    const { checked, passed, failed } = report.summary;
    lines.push(
      `Summary: ${checked} checked | ${chalk.green(`${passed} passed`)} | ${chalk.red(`${failed} failed`)}`
    );
  }
  lines.push('');

  return lines.join('\n');
}

// ─── JSON Format ────────────────────────────────────────────────────────────

function formatJson(report: AnyReport): string {
  return JSON.stringify(report, null, 2);
}

// ─── Markdown Format ────────────────────────────────────────────────────────

function formatMarkdown(report: AnyReport): string {
  const lines: string[] = [];
  const results = resultsOf(report);
  const failures = results.filter((r) => !r.passed);

  lines.push(`# 🔍 Key Case Report`);
  lines.push('');
  lines.push(`**Convention:** ${report.convention}`);
  lines.push('');

  if (failures.length === 0) {
    lines.push('✅ **All keys are properly cased**');
    return lines.join('\n');
  }

  lines.push('## ❌ Failures');
  lines.push('');
  for (const r of failures) {
    const failure = r.failure;
    if (failure?.kind === 'case') {
      lines.push(`- **${r.target}**: \`${failure.key ?? ''}\` at \`${failure.path ?? ''}\``);
    } else {
      lines.push(`- **${r.target}**: ${(failure?.message ?? '').split('\n')[0]}`);
    }
  }
  lines.push('');

  if (isDocumentReport(report)) {
    lines.push('---');
    lines.push('');
    lines.push(
      `**Summary:** ${report.summary.checked} checked | ${report.summary.passed} passed | ${report.summary.failed} failed`
    );
  }

  return lines.join('\n');
}
