/**
 * Flow Graph Analyzer
 *
 * Main orchestrator: load the agent once, run the enabled passes over the
 * same read-only graph, aggregate the findings.
 */

import { FlowGraph } from './flow-graph.js';
import { FindingAggregator, filterByFlows, summarizeFindings } from './finding-aggregator.js';
import { createPasses } from './passes/index.js';
import { loadConfig, withThreshold } from './config.js';
import { logger } from '../../utils/logger.js';
import type { Finding, FlowAnalysisOptions, FlowAnalysisResult, FlowLintConfig } from './types.js';

export class FlowGraphAnalyzer {
  /**
   * Analyze an exported agent directory
   */
  async analyzeAgent(agentDir: string, options: FlowAnalysisOptions = {}): Promise<FlowAnalysisResult> {
    const timestamp = new Date();
    const startTime = Date.now();

    const baseConfig = options.config ?? (await loadConfig(options.configPath));
    const config = withThreshold(baseConfig, options.threshold);

    const graph = await FlowGraph.load(agentDir);
    const findings = filterByFlows(this.analyzeGraph(graph, config), options.flows);

    const result: FlowAnalysisResult = {
      agentDir: graph.rootDir,
      flowCount: graph.getFlows().length,
      pageCount: graph.getPageCount(),
      routeGroupCount: graph.getRouteGroupCount(),
      findings: Object.freeze(findings),
      summary: summarizeFindings(findings),
      timestamp,
      durationMs: Date.now() - startTime,
    };

    logger.debug('Analysis completed', {
      agentDir: result.agentDir,
      findings: result.summary.total,
      durationMs: result.durationMs,
    });

    return Object.freeze(result);
  }

  /**
   * Run the enabled passes over an already loaded graph
   */
  analyzeGraph(graph: FlowGraph, config: FlowLintConfig): Finding[] {
    return new FindingAggregator(createPasses(graph, config)).aggregate();
  }
}
