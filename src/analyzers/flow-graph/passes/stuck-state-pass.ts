/**
 * Stuck State Pass
 *
 * A page that never waits for input must leave through an unconditional
 * route, otherwise the conversation dead-ends there.
 */

import { BasePass } from '../base-pass.js';
import { isInputPage, type FlowGraph } from '../flow-graph.js';
import type { Finding, Flow, TransitionRoute } from '../types.js';

export const STUCK_PAGE_MESSAGE = 'Potential Stuck Page (No Input, No True Route)';

export function isUnconditional(route: TransitionRoute): boolean {
  return route.condition !== undefined && route.condition.toLowerCase() === 'true';
}

export class StuckStatePass extends BasePass {
  constructor(graph: FlowGraph) {
    super('stuck-state', 'Detects non-input pages without an unconditional exit route', graph);
  }

  protected analyzeFlow(flow: Flow): Finding[] {
    return this.graph
      .getPages(flow.id)
      .filter(page => !isInputPage(page) && !page.transitionRoutes.some(isUnconditional))
      .map(page => this.createFinding(flow, page.displayName, 'stuck-page', STUCK_PAGE_MESSAGE, 'Error'));
  }
}
