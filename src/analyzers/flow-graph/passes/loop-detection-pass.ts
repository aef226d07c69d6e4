/**
 * Loop Detection Pass
 *
 * Depth-first, cost-weighted walk from Start and from every input-accepting
 * page. A branch ends when it revisits a page on the current path (a cycle),
 * when its accumulated cost reaches the threshold (a chain that never hands
 * control back to the user), when it reaches an input-accepting page, or
 * when it leaves the flow.
 *
 * The walk keeps its own stack; its depth is bounded by the cost threshold.
 * Within one seed, an address is expanded again only when it is reached at a
 * strictly lower cost than before, so the work per seed is bounded by
 * pages x threshold rather than by the number of distinct paths.
 */

import { BasePass } from '../base-pass.js';
import { isInputPage, type FlowGraph } from '../flow-graph.js';
import {
  START_PAGE_ID,
  type Finding,
  type FindingCategory,
  type Flow,
  type LoopDetectionSettings,
  type PageAddress,
  type RouteTarget,
} from '../types.js';

export const DEFAULT_LOOP_SETTINGS: LoopDetectionSettings = Object.freeze({
  threshold: 25,
  plainPageCost: 1,
  entryActionCost: 2,
});

interface SearchFrame {
  /** Display names from the seed up to and including this frame's page */
  readonly path: ReadonlyArray<string>;
  readonly cost: number;
  readonly edges: ReadonlyArray<RouteTarget>;
  nextEdge: number;
}

export class LoopDetectionPass extends BasePass {
  private readonly settings: LoopDetectionSettings;

  constructor(graph: FlowGraph, settings: Partial<LoopDetectionSettings> = {}) {
    super('loop-detection', 'Detects cycles and long chains that never wait for user input', graph);
    this.settings = {
      threshold: settings.threshold ?? DEFAULT_LOOP_SETTINGS.threshold,
      plainPageCost: settings.plainPageCost ?? DEFAULT_LOOP_SETTINGS.plainPageCost,
      entryActionCost: settings.entryActionCost ?? DEFAULT_LOOP_SETTINGS.entryActionCost,
    };
  }

  /**
   * Start plus every input-accepting page, in load order
   */
  getSeeds(flowId: string): PageAddress[] {
    const seeds: PageAddress[] = [START_PAGE_ID];
    for (const page of this.graph.getPages(flowId)) {
      if (isInputPage(page)) {
        seeds.push(page.id);
      }
    }
    return seeds;
  }

  /**
   * Cost of moving into an address
   */
  edgeWeight(flowId: string, target: PageAddress): number {
    return this.graph.hasEntryAction(flowId, target)
      ? this.settings.entryActionCost
      : this.settings.plainPageCost;
  }

  protected analyzeFlow(flow: Flow): Finding[] {
    const findings: Finding[] = [];
    // Messages already reported for this flow, across all seeds
    const reported = new Set<string>();

    for (const seed of this.getSeeds(flow.id)) {
      this.searchFrom(flow, seed, reported, findings);
    }

    return findings;
  }

  private searchFrom(flow: Flow, seed: PageAddress, reported: Set<string>, findings: Finding[]): void {
    const seedName = this.graph.getDisplayName(flow.id, seed);
    const report = (category: FindingCategory, message: string): void => {
      if (reported.has(message)) return;
      reported.add(message);
      findings.push(this.createFinding(flow, seedName, category, message, 'Warning'));
    };

    // Lowest cost at which each address has been expanded from this seed
    const expandedAt = new Map<PageAddress, number>([[seed, 0]]);
    const stack: SearchFrame[] = [this.createFrame(flow.id, seed, [], 0)];

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (frame.nextEdge >= frame.edges.length) {
        stack.pop();
        continue;
      }

      const edge = frame.edges[frame.nextEdge];
      frame.nextEdge++;

      const target = this.graph.resolveTarget(flow.id, edge);
      if (target === undefined) continue;

      const targetName = this.graph.getDisplayName(flow.id, target);
      const cost = frame.cost + this.edgeWeight(flow.id, target);
      const repeatAt = frame.path.indexOf(targetName);

      if (repeatAt >= 0) {
        // The cycle alone, so every seed that reaches it reports the same message
        const cycle = [...frame.path.slice(repeatAt), targetName].join(' -> ');
        report('infinite-loop', `Infinite Loop Detected: ${cycle}`);
      } else if (cost >= this.settings.threshold) {
        const trail = [...frame.path, targetName].join(' -> ');
        report('possible-loop', `Possible Infinite Loop (Depth ${cost}): ${trail}`);
      } else if (!this.graph.isInputAccepting(flow.id, target)) {
        const previousCost = expandedAt.get(target);
        if (previousCost !== undefined && previousCost <= cost) continue;
        expandedAt.set(target, cost);
        stack.push(this.createFrame(flow.id, target, frame.path, cost));
      }
    }
  }

  private createFrame(
    flowId: string,
    address: PageAddress,
    parentPath: ReadonlyArray<string>,
    cost: number
  ): SearchFrame {
    return {
      path: [...parentPath, this.graph.getDisplayName(flowId, address)],
      cost,
      edges: this.graph.getOutgoingEdges(flowId, address, { includeReprompts: true }),
      nextEdge: 0,
    };
  }
}
