/**
 * Flow Graph Types
 *
 * In-memory model of an exported conversational agent and the findings
 * produced by the analysis passes. All entities are immutable once loaded.
 */

/**
 * Address of the implicit entry state every flow has
 */
export const START_PAGE_ID = 'Start';

/**
 * Page name used in findings that are not tied to a page
 */
export const NO_PAGE = 'N/A';

/**
 * An edge-bearing element: a transition route, an event handler or a reprompt handler
 */
export interface RouteTarget {
  readonly targetPage?: string;
  readonly targetFlow?: string;
}

export interface TransitionRoute extends RouteTarget {
  readonly condition?: string;
  readonly intent?: string;
  readonly hasTriggerAction: boolean;
}

export interface EventHandler extends RouteTarget {
  readonly event: string;
  readonly hasTriggerAction: boolean;
}

export interface FormParameter {
  readonly displayName: string;
  readonly hasInitialPrompt: boolean;
  readonly repromptEventHandlers: ReadonlyArray<EventHandler>;
}

export interface Flow {
  readonly id: string;
  readonly displayName: string;
  /** Directory the flow was loaded from */
  readonly sourcePath: string;
  readonly transitionRoutes: ReadonlyArray<TransitionRoute>;
  readonly eventHandlers: ReadonlyArray<EventHandler>;
  readonly routeGroupRefs: ReadonlyArray<string>;
}

export interface Page {
  readonly id: string;
  readonly displayName: string;
  readonly flowId: string;
  readonly sourcePath: string;
  readonly hasEntryAction: boolean;
  readonly formParameters: ReadonlyArray<FormParameter>;
  readonly transitionRoutes: ReadonlyArray<TransitionRoute>;
  readonly eventHandlers: ReadonlyArray<EventHandler>;
  readonly routeGroupRefs: ReadonlyArray<string>;
}

export interface RouteGroup {
  readonly id: string;
  readonly displayName: string;
  readonly flowId: string;
  readonly sourcePath: string;
  readonly transitionRoutes: ReadonlyArray<TransitionRoute>;
}

/**
 * A page identifier or the Start address
 */
export type PageAddress = string;

/**
 * Finding severity
 */
export type FindingSeverity = 'Info' | 'Warning' | 'Error';

/**
 * Category tag of a finding
 */
export type FindingCategory =
  | 'unreachable-page'
  | 'missing-event-handler'
  | 'stuck-page'
  | 'unused-route-group'
  | 'infinite-loop'
  | 'possible-loop';

/**
 * A single structural defect reported by an analysis pass
 */
export interface Finding {
  /** Display name of the owning flow */
  readonly flow: string;
  /** Display name of the page, or "N/A" */
  readonly page: string;
  readonly category: FindingCategory;
  readonly message: string;
  readonly severity: FindingSeverity;
}

/**
 * Identifier of an analysis pass
 */
export type PassId =
  | 'reachability'
  | 'handler-completeness'
  | 'stuck-state'
  | 'route-group-usage'
  | 'loop-detection';

/**
 * Fixed execution order of the passes
 */
export const PASS_ORDER: ReadonlyArray<PassId> = [
  'reachability',
  'handler-completeness',
  'stuck-state',
  'route-group-usage',
  'loop-detection',
];

export type PassSetting = 'on' | 'off';

export interface LoopDetectionSettings {
  /** Accumulated cost at which a chain is reported */
  readonly threshold: number;
  /** Cost of entering a page without an entry action */
  readonly plainPageCost: number;
  /** Cost of entering a page with an entry action */
  readonly entryActionCost: number;
}

/**
 * Flow lint configuration
 */
export interface FlowLintConfig {
  readonly passes: Readonly<Record<PassId, PassSetting>>;
  readonly loopDetection: LoopDetectionSettings;
}

/**
 * An analysis pass over the loaded graph. Passes are total: given a loaded
 * graph they never throw.
 */
export interface AnalysisPass {
  readonly id: PassId;
  readonly description: string;
  run(): Finding[];
}

/**
 * Summary statistics for a report
 */
export interface FindingSummary {
  readonly total: number;
  readonly errors: number;
  readonly warnings: number;
  readonly infos: number;
  readonly flowsWithFindings: ReadonlyArray<string>;
}

/**
 * Complete result of analyzing one agent directory
 */
export interface FlowAnalysisResult {
  readonly agentDir: string;
  readonly flowCount: number;
  readonly pageCount: number;
  readonly routeGroupCount: number;
  readonly findings: ReadonlyArray<Finding>;
  readonly summary: FindingSummary;
  readonly timestamp: Date;
  readonly durationMs: number;
}

/**
 * Options for a single analysis run
 */
export interface FlowAnalysisOptions {
  /** Explicit configuration file */
  readonly configPath?: string;
  /** Already resolved configuration; skips config discovery */
  readonly config?: FlowLintConfig;
  /** Loop threshold override */
  readonly threshold?: number;
  /** Restrict the report to these flow display names */
  readonly flows?: ReadonlyArray<string>;
}
