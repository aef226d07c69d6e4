/**
 * Resource Store
 *
 * Loads an exported agent directory into immutable flow, page and route group
 * entities:
 *
 *   <root>/flows/<flow>/<flow>.json
 *   <root>/flows/<flow>/pages/*.json
 *   <root>/flows/<flow>/transitionRouteGroups/*.json
 *
 * Missing subdirectories mean zero resources of that kind. Unreadable or
 * malformed documents abort the load with a LoadError.
 */

import { existsSync, promises as fs } from 'fs';
import path from 'path';
import { glob } from 'glob';
import type { z } from 'zod';
import { LoadError } from '../errors.js';
import { parseJsonFile } from '../../utils/json-utils.js';
import { logger } from '../../utils/logger.js';
import {
  FlowDocumentSchema,
  PageDocumentSchema,
  RouteGroupDocumentSchema,
  type EventHandlerDocument,
  type FulfillmentDocument,
  type PageDocument,
  type TransitionRouteDocument,
} from './schemas.js';
import type {
  EventHandler,
  Flow,
  FormParameter,
  Page,
  RouteGroup,
  TransitionRoute,
} from './types.js';

export const FLOWS_DIR = 'flows';
export const PAGES_DIR = 'pages';
export const ROUTE_GROUPS_DIR = 'transitionRouteGroups';

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.length > 0 ? value : undefined;
}

function hasFulfillmentContent(fulfillment: FulfillmentDocument | undefined): boolean {
  if (!fulfillment) return false;
  return (fulfillment.messages?.length ?? 0) > 0 || Boolean(fulfillment.webhook);
}

function toTransitionRoute(doc: TransitionRouteDocument): TransitionRoute {
  return Object.freeze({
    condition: nonEmpty(doc.condition),
    intent: nonEmpty(doc.intent),
    targetPage: nonEmpty(doc.targetPage),
    targetFlow: nonEmpty(doc.targetFlow),
    hasTriggerAction: doc.triggerFulfillment !== undefined,
  });
}

function toEventHandler(doc: EventHandlerDocument): EventHandler {
  return Object.freeze({
    event: doc.event,
    targetPage: nonEmpty(doc.targetPage),
    targetFlow: nonEmpty(doc.targetFlow),
    hasTriggerAction: doc.triggerFulfillment !== undefined,
  });
}

function toFormParameters(doc: PageDocument): FormParameter[] {
  const parameters = doc.form?.parameters ?? [];
  return parameters.map((param, index) =>
    Object.freeze({
      displayName: param.displayName ?? `parameter-${index + 1}`,
      hasInitialPrompt: hasFulfillmentContent(param.fillBehavior?.initialPromptFulfillment),
      repromptEventHandlers: Object.freeze(
        (param.fillBehavior?.repromptEventHandlers ?? []).map(toEventHandler)
      ),
    })
  );
}

/**
 * Read one document, turning read, parse and shape failures into a LoadError
 */
async function readDocument<S extends z.ZodTypeAny>(
  filePath: string,
  schema: S
): Promise<z.output<S>> {
  const result = await parseJsonFile(filePath, schema);
  if (!result.success) {
    throw new LoadError(`Failed to load ${filePath}: ${result.error}`, filePath);
  }
  return result.data;
}

/**
 * List the JSON documents of a directory in a stable order
 */
async function listDocuments(directory: string): Promise<string[]> {
  if (!existsSync(directory)) {
    return [];
  }
  const files = await glob('*.json', { cwd: directory, absolute: true, nodir: true });
  return files.sort();
}

export class ResourceStore {
  private readonly flows: Map<string, Flow>;
  private readonly pages: Map<string, Page[]>;
  private readonly routeGroups: Map<string, RouteGroup[]>;
  private readonly pageLookup = new Map<string, Map<string, Page>>();

  private constructor(
    public readonly rootDir: string,
    flows: Map<string, Flow>,
    pages: Map<string, Page[]>,
    routeGroups: Map<string, RouteGroup[]>
  ) {
    this.flows = flows;
    this.pages = pages;
    this.routeGroups = routeGroups;

    for (const [flowId, flowPages] of pages) {
      this.pageLookup.set(flowId, new Map(flowPages.map(page => [page.id, page])));
    }
  }

  /**
   * Load every flow under <rootDir>/flows. Sequential and complete: the
   * returned store is never partially populated.
   */
  static async load(rootDir: string): Promise<ResourceStore> {
    const root = path.resolve(rootDir);

    const stats = await fs.stat(root).catch((error: unknown) => {
      throw new LoadError(`Agent directory cannot be read: ${root} (${describe(error)})`, root, undefined, {
        cause: error,
      });
    });
    if (!stats.isDirectory()) {
      throw new LoadError(`Agent path is not a directory: ${root}`, root);
    }

    const flows = new Map<string, Flow>();
    const pages = new Map<string, Page[]>();
    const routeGroups = new Map<string, RouteGroup[]>();

    const flowsDir = path.join(root, FLOWS_DIR);
    if (!existsSync(flowsDir)) {
      logger.debug('No flows directory found', { root });
      return new ResourceStore(root, flows, pages, routeGroups);
    }

    const entries = await fs.readdir(flowsDir, { withFileTypes: true }).catch((error: unknown) => {
      throw new LoadError(`Flows directory cannot be read: ${flowsDir} (${describe(error)})`, flowsDir, undefined, {
        cause: error,
      });
    });

    const flowDirNames = entries
      .filter(entry => entry.isDirectory())
      .map(entry => entry.name)
      .sort();

    for (const dirName of flowDirNames) {
      const flowPath = path.join(flowsDir, dirName);
      const flowFile = path.join(flowPath, `${dirName}.json`);
      if (!existsSync(flowFile)) {
        logger.debug('Skipping flow directory without flow document', { flowPath });
        continue;
      }

      const flow = await ResourceStore.loadFlow(flowFile, dirName, flowPath);
      if (flows.has(flow.id)) {
        logger.debug('Skipping duplicate flow id', { flowId: flow.id, flowPath });
        continue;
      }

      flows.set(flow.id, flow);
      pages.set(flow.id, await ResourceStore.loadPages(flow.id, path.join(flowPath, PAGES_DIR)));
      routeGroups.set(
        flow.id,
        await ResourceStore.loadRouteGroups(flow.id, path.join(flowPath, ROUTE_GROUPS_DIR))
      );
    }

    const store = new ResourceStore(root, flows, pages, routeGroups);
    logger.debug('Agent loaded', {
      root,
      flows: store.getFlowCount(),
      pages: store.getPageCount(),
      routeGroups: store.getRouteGroupCount(),
    });
    return store;
  }

  private static async loadFlow(flowFile: string, dirName: string, flowPath: string): Promise<Flow> {
    const doc = await readDocument(flowFile, FlowDocumentSchema);
    const id = nonEmpty(doc.name) ?? dirName;

    return Object.freeze({
      id,
      displayName: nonEmpty(doc.displayName) ?? dirName,
      sourcePath: flowPath,
      transitionRoutes: Object.freeze(doc.transitionRoutes.map(toTransitionRoute)),
      eventHandlers: Object.freeze(doc.eventHandlers.map(toEventHandler)),
      routeGroupRefs: Object.freeze([...doc.transitionRouteGroups]),
    });
  }

  private static async loadPages(flowId: string, pagesDir: string): Promise<Page[]> {
    const pages: Page[] = [];
    const seen = new Set<string>();

    for (const file of await listDocuments(pagesDir)) {
      const doc = await readDocument(file, PageDocumentSchema);
      const id = nonEmpty(doc.name) ?? path.basename(file, '.json');
      if (seen.has(id)) {
        logger.debug('Skipping duplicate page id', { flowId, pageId: id, file });
        continue;
      }
      seen.add(id);

      pages.push(
        Object.freeze({
          id,
          displayName: nonEmpty(doc.displayName) ?? id,
          flowId,
          sourcePath: file,
          hasEntryAction: hasFulfillmentContent(doc.entryFulfillment),
          formParameters: Object.freeze(toFormParameters(doc)),
          transitionRoutes: Object.freeze(doc.transitionRoutes.map(toTransitionRoute)),
          eventHandlers: Object.freeze(doc.eventHandlers.map(toEventHandler)),
          routeGroupRefs: Object.freeze([...doc.transitionRouteGroups]),
        })
      );
    }

    return pages;
  }

  private static async loadRouteGroups(flowId: string, groupsDir: string): Promise<RouteGroup[]> {
    const groups: RouteGroup[] = [];
    const seen = new Set<string>();

    for (const file of await listDocuments(groupsDir)) {
      const doc = await readDocument(file, RouteGroupDocumentSchema);
      const id = nonEmpty(doc.name) ?? path.basename(file, '.json');
      if (seen.has(id)) {
        logger.debug('Skipping duplicate route group id', { flowId, routeGroupId: id, file });
        continue;
      }
      seen.add(id);

      groups.push(
        Object.freeze({
          id,
          displayName: nonEmpty(doc.displayName) ?? id,
          flowId,
          sourcePath: file,
          transitionRoutes: Object.freeze(doc.transitionRoutes.map(toTransitionRoute)),
        })
      );
    }

    return groups;
  }

  /**
   * All flows in load order
   */
  getFlows(): Flow[] {
    return Array.from(this.flows.values());
  }

  getFlow(flowId: string): Flow | undefined {
    return this.flows.get(flowId);
  }

  /**
   * Pages of a flow in load order
   */
  getPages(flowId: string): ReadonlyArray<Page> {
    return this.pages.get(flowId) ?? [];
  }

  getPage(flowId: string, pageId: string): Page | undefined {
    return this.pageLookup.get(flowId)?.get(pageId);
  }

  /**
   * Route groups of a flow in load order
   */
  getRouteGroups(flowId: string): ReadonlyArray<RouteGroup> {
    return this.routeGroups.get(flowId) ?? [];
  }

  getFlowCount(): number {
    return this.flows.size;
  }

  getPageCount(): number {
    let total = 0;
    for (const pages of this.pages.values()) {
      total += pages.length;
    }
    return total;
  }

  getRouteGroupCount(): number {
    let total = 0;
    for (const groups of this.routeGroups.values()) {
      total += groups.length;
    }
    return total;
  }
}
