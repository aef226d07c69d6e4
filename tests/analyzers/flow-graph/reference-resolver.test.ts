/**
 * Tests for ReferenceResolver
 */
import { describe, it, expect, afterEach, beforeEach } from 'vitest';
import { ResourceStore } from '../../../src/analyzers/flow-graph/resource-store.js';
import { ReferenceResolver, lastSegment } from '../../../src/analyzers/flow-graph/reference-resolver.js';
import { writeAgent, cleanupAgents } from './helpers/agent-fixture.js';

const CONFIRM_ID = 'projects/demo/locations/global/agents/a1/flows/f1/pages/confirm-id';

describe('lastSegment', () => {
  it('returns the final path segment', () => {
    expect(lastSegment('flows/f1/pages/p1')).toBe('p1');
  });

  it('ignores a trailing slash', () => {
    expect(lastSegment('flows/f1/pages/')).toBe('pages');
  });

  it('returns a bare reference unchanged', () => {
    expect(lastSegment('Collect')).toBe('Collect');
  });
});

describe('ReferenceResolver', () => {
  let resolver: ReferenceResolver;

  beforeEach(async () => {
    const root = writeAgent([
      {
        dirName: 'Main',
        pages: {
          confirm: { name: CONFIRM_ID, displayName: 'Confirm Order' },
          collect: { displayName: 'Collect' },
          alpha: { displayName: 'beta' },
          beta: { displayName: 'Other' },
        },
        routeGroups: {
          shared: { name: 'group-1', displayName: 'Shared' },
        },
      },
      {
        dirName: 'Billing',
        pages: { invoice: {} },
      },
    ]);
    resolver = new ReferenceResolver(await ResourceStore.load(root));
  });

  afterEach(() => {
    cleanupAgents();
  });

  describe('resolvePage', () => {
    it('matches an exact id', () => {
      expect(resolver.resolvePage('Main', 'collect')).toBe('collect');
      expect(resolver.resolvePage('Main', CONFIRM_ID)).toBe(CONFIRM_ID);
    });

    it('matches an exact display name', () => {
      expect(resolver.resolvePage('Main', 'Confirm Order')).toBe(CONFIRM_ID);
    });

    it('prefers an id over a display name', () => {
      expect(resolver.resolvePage('Main', 'beta')).toBe('beta');
    });

    it('matches the final segment of a path against ids', () => {
      expect(resolver.resolvePage('Main', 'projects/x/flows/y/pages/collect')).toBe('collect');
    });

    it('matches the final segment of a path against display names', () => {
      expect(resolver.resolvePage('Main', 'pages/Other')).toBe('beta');
    });

    it('matches the final segment of a path against the final segment of ids', () => {
      expect(resolver.resolvePage('Main', 'flows/other-path/pages/confirm-id')).toBe(CONFIRM_ID);
    });

    it('resolves Start references', () => {
      expect(resolver.resolvePage('Main', 'Start')).toBe('Start');
      expect(resolver.resolvePage('Main', 'projects/demo/flows/f1/pages/START_PAGE')).toBe('Start');
    });

    it('returns undefined for unresolved references', () => {
      expect(resolver.resolvePage('Main', 'Nowhere')).toBeUndefined();
      expect(resolver.resolvePage('Main', undefined)).toBeUndefined();
      expect(resolver.resolvePage('Main', '')).toBeUndefined();
      expect(resolver.resolvePage('Unknown', 'collect')).toBeUndefined();
    });

    it('does not resolve pages of another flow', () => {
      expect(resolver.resolvePage('Main', 'invoice')).toBeUndefined();
      expect(resolver.resolvePage('Billing', 'invoice')).toBe('invoice');
    });
  });

  describe('resolveRouteGroup', () => {
    it('matches an exact id', () => {
      expect(resolver.resolveRouteGroup('Main', 'group-1')?.displayName).toBe('Shared');
    });

    it('does not match display names or path suffixes', () => {
      expect(resolver.resolveRouteGroup('Main', 'Shared')).toBeUndefined();
      expect(resolver.resolveRouteGroup('Main', 'flows/f1/transitionRouteGroups/group-1')).toBeUndefined();
    });

    it('does not cross flow boundaries', () => {
      expect(resolver.resolveRouteGroup('Billing', 'group-1')).toBeUndefined();
    });
  });
});
