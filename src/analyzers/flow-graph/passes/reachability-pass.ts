/**
 * Reachability Pass
 *
 * Breadth-first search from each flow's Start address; pages never visited
 * are reported once each.
 */

import { BasePass } from '../base-pass.js';
import type { FlowGraph } from '../flow-graph.js';
import { START_PAGE_ID, type Finding, type Flow, type PageAddress } from '../types.js';

export const UNREACHABLE_PAGE_MESSAGE = 'Unreachable Page';

export class ReachabilityPass extends BasePass {
  constructor(graph: FlowGraph) {
    super('reachability', 'Detects pages that cannot be reached from the flow start', graph);
  }

  /**
   * Addresses reachable from Start, Start included
   */
  findReachable(flowId: string): Set<PageAddress> {
    const visited = new Set<PageAddress>([START_PAGE_ID]);
    const queue: PageAddress[] = [START_PAGE_ID];

    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;

      for (const edge of this.graph.getOutgoingEdges(flowId, current)) {
        const target = this.graph.resolveTarget(flowId, edge);
        if (target !== undefined && !visited.has(target)) {
          visited.add(target);
          queue.push(target);
        }
      }
    }

    return visited;
  }

  protected analyzeFlow(flow: Flow): Finding[] {
    const pages = this.graph.getPages(flow.id);
    if (pages.length === 0) return [];

    const reachable = this.findReachable(flow.id);
    return pages
      .filter(page => !reachable.has(page.id))
      .map(page =>
        this.createFinding(flow, page.displayName, 'unreachable-page', UNREACHABLE_PAGE_MESSAGE, 'Warning')
      );
  }
}
