/**
 * Base Analysis Pass
 *
 * Abstract base class for all flow graph passes
 */

import type { FlowGraph } from './flow-graph.js';
import type {
  AnalysisPass,
  Finding,
  FindingCategory,
  FindingSeverity,
  Flow,
  PassId,
} from './types.js';

export abstract class BasePass implements AnalysisPass {
  constructor(
    public readonly id: PassId,
    public readonly description: string,
    protected readonly graph: FlowGraph
  ) {}

  /**
   * Run the pass over every flow
   */
  run(): Finding[] {
    const findings: Finding[] = [];
    for (const flow of this.graph.getFlows()) {
      findings.push(...this.analyzeFlow(flow));
    }
    return findings;
  }

  /**
   * Findings for a single flow
   */
  protected abstract analyzeFlow(flow: Flow): Finding[];

  /**
   * Create a finding object
   */
  protected createFinding(
    flow: Flow,
    page: string,
    category: FindingCategory,
    message: string,
    severity: FindingSeverity
  ): Finding {
    return Object.freeze({
      flow: flow.displayName,
      page,
      category,
      message,
      severity,
    });
  }
}
