/**
 * Console Reporter
 * Formats findings grouped by flow for terminal display
 */

import chalk from 'chalk';
import { summarizeFindings } from '../finding-aggregator.js';
import type { Finding, FindingSummary } from '../types.js';
import { sanitizeDisplayText } from './sanitize.js';

export interface ConsoleReportOptions {
  noColor?: boolean;
  /** Only show Error findings */
  quiet?: boolean;
}

const PAGE_COLUMN_WIDTH = 28;
const SEVERITY_COLUMN_WIDTH = 9;

function colorSeverity(finding: Finding, text: string): string {
  switch (finding.severity) {
    case 'Error':
      return chalk.red(text);
    case 'Warning':
      return chalk.yellow(text);
    default:
      return chalk.blue(text);
  }
}

/**
 * Format a single finding for display
 */
function formatFinding(finding: Finding, useColor: boolean): string {
  const page = sanitizeDisplayText(finding.page).padEnd(PAGE_COLUMN_WIDTH);
  const severityText = finding.severity.padEnd(SEVERITY_COLUMN_WIDTH);
  const severity = useColor ? colorSeverity(finding, severityText) : severityText;
  const message = sanitizeDisplayText(finding.message);
  const category = useColor ? chalk.gray(finding.category) : finding.category;

  return `  ${page} ${severity}${message}  ${category}`;
}

/**
 * Group findings by flow, keeping first-appearance order
 */
function groupByFlow(findings: ReadonlyArray<Finding>): Map<string, Finding[]> {
  const groups = new Map<string, Finding[]>();
  for (const finding of findings) {
    const group = groups.get(finding.flow);
    if (group) {
      group.push(finding);
    } else {
      groups.set(finding.flow, [finding]);
    }
  }
  return groups;
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

/**
 * Format the summary line
 */
export function formatSummaryLine(summary: FindingSummary, useColor: boolean): string {
  if (summary.total === 0) {
    return useColor ? chalk.green('No problems found') : 'No problems found';
  }

  const symbol = useColor ? chalk.red('✖') : '✖';
  const problems = summary.total === 1 ? 'problem' : 'problems';
  return `${symbol} ${summary.total} ${problems} (${plural(summary.errors, 'error')}, ${plural(summary.warnings, 'warning')}, ${plural(summary.infos, 'info')})`;
}

/**
 * Format findings for console output
 */
export function formatConsoleOutput(
  findings: ReadonlyArray<Finding>,
  options: ConsoleReportOptions = {}
): string {
  const useColor = !options.noColor && process.stdout.isTTY !== false;

  // In quiet mode, only show errors
  const visible = options.quiet ? findings.filter(f => f.severity === 'Error') : findings;
  if (options.quiet && visible.length === 0) {
    return '';
  }

  const lines: string[] = [];
  for (const [flow, flowFindings] of groupByFlow(visible)) {
    const header = sanitizeDisplayText(flow);
    lines.push(useColor ? chalk.underline(header) : header);
    for (const finding of flowFindings) {
      lines.push(formatFinding(finding, useColor));
    }
    lines.push('');
  }

  lines.push(formatSummaryLine(summarizeFindings(visible), useColor));
  return lines.join('\n');
}

/**
 * Line printed when only the warning limit fails the run
 */
export function formatWarningLimitLine(warnings: number, maxWarnings: number, useColor: boolean): string {
  const text = `Warning threshold exceeded: ${warnings} warnings (max: ${maxWarnings})`;
  return useColor ? chalk.yellow(text) : text;
}

/**
 * Format a compact single line per finding
 */
export function formatCompactOutput(findings: ReadonlyArray<Finding>): string {
  return findings
    .map(
      f =>
        `${sanitizeDisplayText(f.flow)}/${sanitizeDisplayText(f.page)}: ${f.severity} - ${sanitizeDisplayText(f.message)} (${f.category})`
    )
    .join('\n');
}

/**
 * Print findings to console
 */
export function printResults(findings: ReadonlyArray<Finding>, options: ConsoleReportOptions = {}): void {
  const output = formatConsoleOutput(findings, options);
  if (output) {
    console.log(output);
  }
}
