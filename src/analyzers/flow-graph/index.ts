/**
 * Flow Graph Lint - Main Entry Point
 * Static analysis of exported conversational flow definitions
 */

import { FlowGraphAnalyzer } from './flow-graph-analyzer.js';
import { PASSES } from './passes/index.js';
import { printResults, formatWarningLimitLine } from './reporter/console.js';
import { printJsonResults } from './reporter/json.js';
import { isAnalysisError } from '../errors.js';
import type { FlowAnalysisOptions, FlowAnalysisResult } from './types.js';

export type OutputFormat = 'stylish' | 'json';

/**
 * Options for a check run that prints its report
 */
export interface FlowLintRunOptions extends FlowAnalysisOptions {
  format: OutputFormat;
  quiet: boolean;
  /** -1 disables the warning limit */
  maxWarnings: number;
  noColor: boolean;
}

const DEFAULT_RUN_OPTIONS: FlowLintRunOptions = {
  format: 'stylish',
  quiet: false,
  maxWarnings: -1,
  noColor: false,
};

/** Exit codes of a check run */
export const EXIT_OK = 0;
export const EXIT_FINDINGS = 1;
export const EXIT_FAILURE = 2;

/**
 * Analyze an agent directory
 */
export async function runFlowLint(
  agentDir: string,
  options: FlowAnalysisOptions = {}
): Promise<FlowAnalysisResult> {
  return new FlowGraphAnalyzer().analyzeAgent(agentDir, options);
}

/**
 * Exit code for a finished analysis
 */
export function getExitCode(result: FlowAnalysisResult, maxWarnings: number = -1): number {
  if (result.summary.errors > 0) {
    return EXIT_FINDINGS;
  }

  if (maxWarnings >= 0 && result.summary.warnings > maxWarnings) {
    return EXIT_FINDINGS;
  }

  return EXIT_OK;
}

/**
 * Analyze an agent directory, print the report and return the exit code.
 * Load and configuration failures are printed (as `{ "error": ... }` in
 * JSON mode) and yield EXIT_FAILURE; anything else propagates.
 */
export async function runFlowLintWithOutput(
  agentDir: string,
  options: Partial<FlowLintRunOptions> = {}
): Promise<number> {
  const opts: FlowLintRunOptions = { ...DEFAULT_RUN_OPTIONS, ...options };

  let result: FlowAnalysisResult;
  try {
    result = await runFlowLint(agentDir, opts);
  } catch (error) {
    if (!isAnalysisError(error)) {
      throw error;
    }
    if (opts.format === 'json') {
      console.log(JSON.stringify({ error: error.message }));
    } else {
      console.error(`Error running flow lint: ${error.message}`);
    }
    return EXIT_FAILURE;
  }

  if (opts.format === 'json') {
    printJsonResults(result);
    return getExitCode(result, opts.maxWarnings);
  }

  printResults(result.findings, {
    noColor: opts.noColor,
    quiet: opts.quiet,
  });

  const { errors, warnings } = result.summary;
  if (errors === 0 && opts.maxWarnings >= 0 && warnings > opts.maxWarnings) {
    const useColor = !opts.noColor && process.stdout.isTTY !== false;
    console.log(`\n${formatWarningLimitLine(warnings, opts.maxWarnings, useColor)}`);
  }

  return getExitCode(result, opts.maxWarnings);
}

/**
 * Get available pass IDs with their descriptions
 */
export function getAvailablePasses(): Array<{ id: string; description: string }> {
  return PASSES.map(({ id, description }) => ({ id, description }));
}

export { FlowGraphAnalyzer } from './flow-graph-analyzer.js';
export { FlowGraph, isInputPage, collectEventNames, type EdgeOptions } from './flow-graph.js';
export { ResourceStore, FLOWS_DIR, PAGES_DIR, ROUTE_GROUPS_DIR } from './resource-store.js';
export { ReferenceResolver, lastSegment } from './reference-resolver.js';
export { BasePass } from './base-pass.js';
export { FindingAggregator, filterByFlows, summarizeFindings } from './finding-aggregator.js';
export {
  loadConfig,
  mergeConfigs,
  withThreshold,
  discoverConfigPath,
  DEFAULT_CONFIG,
  CONFIG_DIR_NAME,
  type FlowLintConfigFile,
} from './config.js';
export {
  PASSES,
  createPasses,
  getPass,
  type PassDefinition,
  ReachabilityPass,
  HandlerCompletenessPass,
  StuckStatePass,
  RouteGroupUsagePass,
  LoopDetectionPass,
  DEFAULT_LOOP_SETTINGS,
} from './passes/index.js';
export {
  formatConsoleOutput,
  formatCompactOutput,
  formatJsonOutput,
  sanitizeDisplayText,
  type ConsoleReportOptions,
} from './reporter/index.js';
export { AnalysisError, LoadError, ConfigurationError, isAnalysisError } from '../errors.js';
export type { AnalysisErrorCode } from '../errors.js';

export type {
  Flow,
  Page,
  RouteGroup,
  TransitionRoute,
  EventHandler,
  FormParameter,
  RouteTarget,
  PageAddress,
  Finding,
  FindingSeverity,
  FindingCategory,
  FindingSummary,
  PassId,
  PassSetting,
  LoopDetectionSettings,
  FlowLintConfig,
  AnalysisPass,
  FlowAnalysisResult,
  FlowAnalysisOptions,
} from './types.js';
export { START_PAGE_ID, NO_PAGE, PASS_ORDER } from './types.js';
