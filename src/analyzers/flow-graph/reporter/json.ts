/**
 * JSON Reporter
 * Formats findings as machine-readable JSON
 */

import type { Finding, FlowAnalysisResult } from '../types.js';
import { sanitizeDisplayText } from './sanitize.js';

interface JsonFinding {
  flow: string;
  page: string;
  category: string;
  severity: string;
  message: string;
}

interface JsonReport {
  agentDir: string;
  summary: {
    flows: number;
    pages: number;
    routeGroups: number;
    total: number;
    errors: number;
    warnings: number;
    infos: number;
  };
  findings: JsonFinding[];
}

function findingToJson(finding: Finding): JsonFinding {
  return {
    flow: sanitizeDisplayText(finding.flow),
    page: sanitizeDisplayText(finding.page),
    category: finding.category,
    severity: finding.severity,
    message: sanitizeDisplayText(finding.message),
  };
}

function buildReport(result: FlowAnalysisResult): JsonReport {
  return {
    agentDir: result.agentDir,
    summary: {
      flows: result.flowCount,
      pages: result.pageCount,
      routeGroups: result.routeGroupCount,
      total: result.summary.total,
      errors: result.summary.errors,
      warnings: result.summary.warnings,
      infos: result.summary.infos,
    },
    findings: result.findings.map(findingToJson),
  };
}

/**
 * Format an analysis result as JSON
 */
export function formatJsonOutput(result: FlowAnalysisResult, compact: boolean = false): string {
  return JSON.stringify(buildReport(result), null, compact ? undefined : 2);
}

/**
 * Print JSON results to console
 */
export function printJsonResults(result: FlowAnalysisResult, compact: boolean = false): void {
  console.log(formatJsonOutput(result, compact));
}
