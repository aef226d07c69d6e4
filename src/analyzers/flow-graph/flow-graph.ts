/**
 * Flow Graph
 *
 * Read-only view over a loaded agent shared by every analysis pass: entity
 * lookups, reference resolution and the outgoing edge set of each address.
 */

import { ReferenceResolver } from './reference-resolver.js';
import { ResourceStore } from './resource-store.js';
import { logger } from '../../utils/logger.js';
import {
  START_PAGE_ID,
  type Flow,
  type Page,
  type PageAddress,
  type RouteGroup,
  type RouteTarget,
} from './types.js';

export interface EdgeOptions {
  /** Also follow the reprompt event handlers of form parameters */
  readonly includeReprompts?: boolean;
}

/**
 * A page waits for the user when one of its own routes names an intent or
 * it declares at least one form parameter
 */
export function isInputPage(page: Page): boolean {
  return page.formParameters.length > 0 || page.transitionRoutes.some(route => route.intent !== undefined);
}

/**
 * Event names declared on a page and on the reprompt handlers of its form parameters
 */
export function collectEventNames(page: Page): string[] {
  const events = page.eventHandlers.map(handler => handler.event);
  for (const param of page.formParameters) {
    for (const handler of param.repromptEventHandlers) {
      events.push(handler.event);
    }
  }
  return events;
}

export class FlowGraph {
  constructor(
    private readonly store: ResourceStore,
    private readonly resolver: ReferenceResolver = new ReferenceResolver(store)
  ) {}

  /**
   * Load an agent directory and index it
   */
  static async load(rootDir: string): Promise<FlowGraph> {
    return new FlowGraph(await ResourceStore.load(rootDir));
  }

  get rootDir(): string {
    return this.store.rootDir;
  }

  getFlows(): Flow[] {
    return this.store.getFlows();
  }

  getPages(flowId: string): ReadonlyArray<Page> {
    return this.store.getPages(flowId);
  }

  getPage(flowId: string, pageId: string): Page | undefined {
    return this.store.getPage(flowId, pageId);
  }

  getRouteGroups(flowId: string): ReadonlyArray<RouteGroup> {
    return this.store.getRouteGroups(flowId);
  }

  getPageCount(): number {
    return this.store.getPageCount();
  }

  getRouteGroupCount(): number {
    return this.store.getRouteGroupCount();
  }

  /**
   * Resolve a page reference (see ReferenceResolver for precedence)
   */
  resolvePage(flowId: string, ref: string | undefined): PageAddress | undefined {
    return this.resolver.resolvePage(flowId, ref);
  }

  resolveRouteGroup(flowId: string, ref: string): RouteGroup | undefined {
    return this.resolver.resolveRouteGroup(flowId, ref);
  }

  /**
   * Resolve a list of route group references, dropping the ones that do not resolve
   */
  resolveRouteGroups(flowId: string, refs: ReadonlyArray<string>): RouteGroup[] {
    const groups: RouteGroup[] = [];
    for (const ref of refs) {
      const group = this.resolver.resolveRouteGroup(flowId, ref);
      if (group) {
        groups.push(group);
      } else {
        logger.debug('Dropping unresolved route group reference', { flowId, ref });
      }
    }
    return groups;
  }

  /**
   * Intra-flow target of an edge. Edges into another flow, and edges whose
   * page reference does not resolve, have none.
   */
  resolveTarget(flowId: string, edge: RouteTarget): PageAddress | undefined {
    if (edge.targetFlow !== undefined || edge.targetPage === undefined) {
      return undefined;
    }
    const target = this.resolver.resolvePage(flowId, edge.targetPage);
    if (target === undefined) {
      logger.debug('Dropping unresolved page reference', { flowId, ref: edge.targetPage });
    }
    return target;
  }

  /**
   * Outgoing edges of an address: own routes, routes of referenced route
   * groups, event handlers and, on request, form reprompt handlers. Start
   * takes its edges from the flow document.
   */
  getOutgoingEdges(flowId: string, address: PageAddress, options: EdgeOptions = {}): RouteTarget[] {
    const edges: RouteTarget[] = [];

    if (address === START_PAGE_ID) {
      const flow = this.store.getFlow(flowId);
      if (!flow) return edges;

      edges.push(...flow.transitionRoutes);
      for (const group of this.resolveRouteGroups(flowId, flow.routeGroupRefs)) {
        edges.push(...group.transitionRoutes);
      }
      edges.push(...flow.eventHandlers);
      return edges;
    }

    const page = this.store.getPage(flowId, address);
    if (!page) return edges;

    edges.push(...page.transitionRoutes);
    for (const group of this.resolveRouteGroups(flowId, page.routeGroupRefs)) {
      edges.push(...group.transitionRoutes);
    }
    edges.push(...page.eventHandlers);

    if (options.includeReprompts) {
      for (const param of page.formParameters) {
        edges.push(...param.repromptEventHandlers);
      }
    }

    return edges;
  }

  /**
   * Whether an address hands control back to the user. Start qualifies when
   * one of the flow's own routes names an intent.
   */
  isInputAccepting(flowId: string, address: PageAddress): boolean {
    if (address === START_PAGE_ID) {
      const flow = this.store.getFlow(flowId);
      return flow !== undefined && flow.transitionRoutes.some(route => route.intent !== undefined);
    }
    const page = this.store.getPage(flowId, address);
    return page !== undefined && isInputPage(page);
  }

  hasEntryAction(flowId: string, address: PageAddress): boolean {
    if (address === START_PAGE_ID) return false;
    return this.store.getPage(flowId, address)?.hasEntryAction ?? false;
  }

  getDisplayName(flowId: string, address: PageAddress): string {
    if (address === START_PAGE_ID) return START_PAGE_ID;
    return this.store.getPage(flowId, address)?.displayName ?? address;
  }
}
