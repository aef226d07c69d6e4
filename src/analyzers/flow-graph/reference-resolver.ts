/**
 * Reference Resolver
 *
 * Page and route group references appear as bare ids, full resource paths or
 * display names depending on where they are written. Lookup tables are built
 * once per flow; resolution order:
 *
 *   page:        exact id > exact display name > final path segment
 *                (matched against ids, display names, then final segments of ids)
 *   route group: exact id (no suffix matching)
 *
 * Unresolved references return undefined and are dropped by callers.
 */

import type { ResourceStore } from './resource-store.js';
import { START_PAGE_ID, type PageAddress, type RouteGroup } from './types.js';

/**
 * Final path segment of a resource reference written by the export for the start page
 */
const START_PAGE_SEGMENT = 'START_PAGE';

interface PageIndex {
  readonly byId: ReadonlyMap<string, string>;
  readonly byDisplayName: ReadonlyMap<string, string>;
  readonly bySegment: ReadonlyMap<string, string>;
}

/**
 * Final segment of a slash-separated reference
 */
export function lastSegment(ref: string): string {
  const trimmed = ref.endsWith('/') ? ref.slice(0, -1) : ref;
  const index = trimmed.lastIndexOf('/');
  return index === -1 ? trimmed : trimmed.slice(index + 1);
}

/**
 * Insert without overwriting, so the first entity in load order wins
 */
function putFirst<V>(map: Map<string, V>, key: string, value: V): void {
  if (!map.has(key)) {
    map.set(key, value);
  }
}

export class ReferenceResolver {
  private readonly pageIndexes = new Map<string, PageIndex>();
  private readonly routeGroupIndexes = new Map<string, ReadonlyMap<string, RouteGroup>>();

  constructor(store: ResourceStore) {
    for (const flow of store.getFlows()) {
      const byId = new Map<string, string>();
      const byDisplayName = new Map<string, string>();
      const bySegment = new Map<string, string>();
      for (const page of store.getPages(flow.id)) {
        putFirst(byId, page.id, page.id);
        putFirst(byDisplayName, page.displayName, page.id);
        putFirst(bySegment, lastSegment(page.id), page.id);
      }
      this.pageIndexes.set(flow.id, { byId, byDisplayName, bySegment });

      const groupsById = new Map<string, RouteGroup>();
      for (const group of store.getRouteGroups(flow.id)) {
        putFirst(groupsById, group.id, group);
      }
      this.routeGroupIndexes.set(flow.id, groupsById);
    }
  }

  /**
   * Resolve a page reference to a page id of the same flow, or to the Start address
   */
  resolvePage(flowId: string, ref: string | undefined): PageAddress | undefined {
    if (!ref) return undefined;

    if (ref === START_PAGE_ID || lastSegment(ref) === START_PAGE_SEGMENT) {
      return START_PAGE_ID;
    }

    const index = this.pageIndexes.get(flowId);
    if (!index) return undefined;

    const exact = index.byId.get(ref) ?? index.byDisplayName.get(ref);
    if (exact !== undefined) return exact;

    const segment = lastSegment(ref);
    return index.byId.get(segment) ?? index.byDisplayName.get(segment) ?? index.bySegment.get(segment);
  }

  /**
   * Resolve a route group reference within a flow
   */
  resolveRouteGroup(flowId: string, ref: string): RouteGroup | undefined {
    return this.routeGroupIndexes.get(flowId)?.get(ref);
  }
}
