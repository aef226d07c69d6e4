/**
 * Route Group Usage Pass
 *
 * Route groups defined in a flow that neither the flow nor any of its pages
 * references.
 */

import { BasePass } from '../base-pass.js';
import type { FlowGraph } from '../flow-graph.js';
import { NO_PAGE, type Finding, type Flow } from '../types.js';

export class RouteGroupUsagePass extends BasePass {
  constructor(graph: FlowGraph) {
    super('route-group-usage', 'Detects route groups no flow or page references', graph);
  }

  /**
   * Ids of the route groups referenced by a flow and its pages
   */
  findUsedRouteGroups(flow: Flow): Set<string> {
    const used = new Set<string>();
    for (const group of this.graph.resolveRouteGroups(flow.id, flow.routeGroupRefs)) {
      used.add(group.id);
    }
    for (const page of this.graph.getPages(flow.id)) {
      for (const group of this.graph.resolveRouteGroups(flow.id, page.routeGroupRefs)) {
        used.add(group.id);
      }
    }
    return used;
  }

  protected analyzeFlow(flow: Flow): Finding[] {
    const groups = this.graph.getRouteGroups(flow.id);
    if (groups.length === 0) return [];

    const used = this.findUsedRouteGroups(flow);
    return groups
      .filter(group => !used.has(group.id))
      .map(group =>
        this.createFinding(flow, NO_PAGE, 'unused-route-group', `Unused Route Group: ${group.displayName}`, 'Info')
      );
  }
}
