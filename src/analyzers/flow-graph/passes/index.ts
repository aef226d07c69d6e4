/**
 * Pass Registry
 * Every available analysis pass, in execution order
 */

import type { FlowGraph } from '../flow-graph.js';
import type { AnalysisPass, FlowLintConfig, PassId } from '../types.js';
import { PASS_ORDER } from '../types.js';
import { ReachabilityPass } from './reachability-pass.js';
import { HandlerCompletenessPass } from './handler-completeness-pass.js';
import { StuckStatePass } from './stuck-state-pass.js';
import { RouteGroupUsagePass } from './route-group-usage-pass.js';
import { LoopDetectionPass } from './loop-detection-pass.js';

/**
 * Pass definition
 */
export interface PassDefinition {
  readonly id: PassId;
  readonly description: string;
  create(graph: FlowGraph, config: FlowLintConfig): AnalysisPass;
}

export const PASSES: ReadonlyArray<PassDefinition> = [
  {
    id: 'reachability',
    description: 'Pages that cannot be reached from the flow start',
    create: (graph) => new ReachabilityPass(graph),
  },
  {
    id: 'handler-completeness',
    description: 'Input pages missing a no-input or no-match event handler',
    create: (graph) => new HandlerCompletenessPass(graph),
  },
  {
    id: 'stuck-state',
    description: 'Pages that never wait for input and have no unconditional exit',
    create: (graph) => new StuckStatePass(graph),
  },
  {
    id: 'route-group-usage',
    description: 'Route groups that no flow or page references',
    create: (graph) => new RouteGroupUsagePass(graph),
  },
  {
    id: 'loop-detection',
    description: 'Cycles and long chains that never hand control back to the user',
    create: (graph, config) => new LoopDetectionPass(graph, config.loopDetection),
  },
];

/**
 * Get pass definition by ID
 */
export function getPass(passId: string): PassDefinition | undefined {
  return PASSES.find((p) => p.id === passId);
}

/**
 * Instantiate the enabled passes in execution order
 */
export function createPasses(graph: FlowGraph, config: FlowLintConfig): AnalysisPass[] {
  const passes: AnalysisPass[] = [];
  for (const id of PASS_ORDER) {
    const definition = getPass(id);
    if (!definition || config.passes[id] === 'off') continue;
    passes.push(definition.create(graph, config));
  }
  return passes;
}

export { ReachabilityPass, UNREACHABLE_PAGE_MESSAGE } from './reachability-pass.js';
export { HandlerCompletenessPass, REQUIRED_EVENT_CATEGORIES } from './handler-completeness-pass.js';
export { StuckStatePass, STUCK_PAGE_MESSAGE, isUnconditional } from './stuck-state-pass.js';
export { RouteGroupUsagePass } from './route-group-usage-pass.js';
export { LoopDetectionPass, DEFAULT_LOOP_SETTINGS } from './loop-detection-pass.js';
