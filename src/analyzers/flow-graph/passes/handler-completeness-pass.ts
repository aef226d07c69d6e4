/**
 * Handler Completeness Pass
 *
 * Input-accepting pages need a no-input and a no-match handler, either on the
 * page or on the reprompt handlers of its form parameters.
 */

import { BasePass } from '../base-pass.js';
import { collectEventNames, isInputPage, type FlowGraph } from '../flow-graph.js';
import type { Finding, Flow } from '../types.js';

/**
 * Fallback event categories, in reporting order
 */
export const REQUIRED_EVENT_CATEGORIES = ['no-input', 'no-match'] as const;

export class HandlerCompletenessPass extends BasePass {
  constructor(graph: FlowGraph) {
    super('handler-completeness', 'Detects input pages without no-input or no-match handlers', graph);
  }

  protected analyzeFlow(flow: Flow): Finding[] {
    const findings: Finding[] = [];

    for (const page of this.graph.getPages(flow.id)) {
      if (!isInputPage(page)) continue;

      const events = collectEventNames(page);
      for (const category of REQUIRED_EVENT_CATEGORIES) {
        if (!events.some(event => event.includes(category))) {
          findings.push(
            this.createFinding(
              flow,
              page.displayName,
              'missing-event-handler',
              `Missing Event Handler: ${category}`,
              'Warning'
            )
          );
        }
      }
    }

    return findings;
  }
}
