/**
 * Integration tests for the flow graph analyzer
 */
import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { FlowGraphAnalyzer } from '../../../src/analyzers/flow-graph/flow-graph-analyzer.js';
import {
  runFlowLintWithOutput,
  getAvailablePasses,
  getExitCode,
} from '../../../src/analyzers/flow-graph/index.js';
import { DEFAULT_CONFIG } from '../../../src/analyzers/flow-graph/config.js';
import { STUCK_PAGE_MESSAGE } from '../../../src/analyzers/flow-graph/passes/stuck-state-pass.js';
import { LoadError } from '../../../src/analyzers/errors.js';
import type { Finding, FlowLintConfig } from '../../../src/analyzers/flow-graph/types.js';
import { writeAgent, makeTempDir, cleanupAgents, trueRoute, type FlowFixture } from './helpers/agent-fixture.js';

/**
 * A support flow with one defect of every kind
 */
const SUPPORT_AGENT: FlowFixture[] = [
  {
    dirName: 'Main',
    flow: {
      displayName: 'Main',
      transitionRoutes: [trueRoute('Greeting')],
      transitionRouteGroups: ['global'],
    },
    pages: {
      Greeting: {
        displayName: 'Greeting',
        entryFulfillment: { messages: [{ text: { text: ['Hello!'] } }] },
        transitionRoutes: [trueRoute('Ask Name')],
      },
      AskName: {
        displayName: 'Ask Name',
        form: {
          parameters: [
            {
              displayName: 'name',
              fillBehavior: {
                initialPromptFulfillment: { messages: [{ text: { text: ['Your name?'] } }] },
                repromptEventHandlers: [{ event: 'sys.no-match-default' }],
              },
            },
          ],
        },
        transitionRoutes: [
          { condition: '$page.params.status = "FINAL"', targetPage: 'Goodbye' },
          { condition: '$page.params.retry = true', targetPage: 'Retry' },
        ],
      },
      Goodbye: {
        displayName: 'Goodbye',
        transitionRoutes: [{ condition: '$session.params.done = true', targetFlow: 'End' }],
      },
      Legacy: { displayName: 'Legacy Menu', transitionRoutes: [trueRoute('Goodbye')] },
      Retry: { displayName: 'Retry', transitionRoutes: [trueRoute('Confirm')] },
      Confirm: { displayName: 'Confirm', transitionRoutes: [trueRoute('Retry')] },
    },
    routeGroups: {
      global: { displayName: 'Global' },
      unused: { displayName: 'Old Help' },
    },
  },
];

const EXPECTED_FINDINGS: Finding[] = [
  { flow: 'Main', page: 'Legacy Menu', category: 'unreachable-page', message: 'Unreachable Page', severity: 'Warning' },
  {
    flow: 'Main',
    page: 'Ask Name',
    category: 'missing-event-handler',
    message: 'Missing Event Handler: no-input',
    severity: 'Warning',
  },
  { flow: 'Main', page: 'Goodbye', category: 'stuck-page', message: STUCK_PAGE_MESSAGE, severity: 'Error' },
  {
    flow: 'Main',
    page: 'N/A',
    category: 'unused-route-group',
    message: 'Unused Route Group: Old Help',
    severity: 'Info',
  },
  {
    flow: 'Main',
    page: 'Ask Name',
    category: 'infinite-loop',
    message: 'Infinite Loop Detected: Retry -> Confirm -> Retry',
    severity: 'Warning',
  },
];

function withPasses(overrides: Partial<FlowLintConfig['passes']>): FlowLintConfig {
  return { ...DEFAULT_CONFIG, passes: { ...DEFAULT_CONFIG.passes, ...overrides } };
}

describe('FlowGraphAnalyzer', () => {
  let analyzer: FlowGraphAnalyzer;
  let agentDir: string;

  beforeEach(() => {
    analyzer = new FlowGraphAnalyzer();
    agentDir = writeAgent(SUPPORT_AGENT);
  });

  afterEach(() => {
    cleanupAgents();
  });

  it('runs every pass in order', async () => {
    const result = await analyzer.analyzeAgent(agentDir, { config: DEFAULT_CONFIG });

    expect(result.findings).toEqual(EXPECTED_FINDINGS);
    expect(result.summary).toEqual({
      total: 5,
      errors: 1,
      warnings: 3,
      infos: 1,
      flowsWithFindings: ['Main'],
    });
    expect(result.agentDir).toBe(path.resolve(agentDir));
    expect(result.flowCount).toBe(1);
    expect(result.pageCount).toBe(6);
    expect(result.routeGroupCount).toBe(2);
    expect(result.durationMs).toBeGreaterThanOrEqual(0);
  });

  it('returns the same findings on every run', async () => {
    const first = await analyzer.analyzeAgent(agentDir, { config: DEFAULT_CONFIG });
    const second = await analyzer.analyzeAgent(agentDir, { config: DEFAULT_CONFIG });

    expect(second.findings).toEqual(first.findings);
  });

  it('skips disabled passes', async () => {
    const result = await analyzer.analyzeAgent(agentDir, {
      config: withPasses({ 'loop-detection': 'off', reachability: 'off' }),
    });

    expect(result.findings.map(f => f.category)).toEqual([
      'missing-event-handler',
      'stuck-page',
      'unused-route-group',
    ]);
  });

  it('applies a threshold override', async () => {
    const result = await analyzer.analyzeAgent(agentDir, { config: DEFAULT_CONFIG, threshold: 2 });

    expect(result.findings.filter(f => f.category === 'possible-loop').map(f => [f.page, f.message])).toEqual([
      ['Start', 'Possible Infinite Loop (Depth 2): Start -> Greeting'],
      ['Ask Name', 'Possible Infinite Loop (Depth 2): Ask Name -> Retry -> Confirm'],
    ]);
  });

  it('restricts the report to the requested flows', async () => {
    const result = await analyzer.analyzeAgent(agentDir, { config: DEFAULT_CONFIG, flows: ['Billing'] });

    expect(result.findings).toEqual([]);
    expect(result.summary.total).toBe(0);
    expect(result.pageCount).toBe(6);
  });

  it('reads the configuration from an explicit path', async () => {
    const configDir = makeTempDir('flow-lint-config-');
    const configPath = path.join(configDir, 'flow-lint.json');
    fs.writeFileSync(configPath, JSON.stringify({ passes: { 'stuck-state': 'off' } }));

    const result = await analyzer.analyzeAgent(agentDir, { configPath });

    expect(result.summary.errors).toBe(0);
    expect(result.summary.total).toBe(4);
  });

  it('fails on a missing agent directory', async () => {
    await expect(
      analyzer.analyzeAgent(path.join(agentDir, 'missing'), { config: DEFAULT_CONFIG })
    ).rejects.toBeInstanceOf(LoadError);
  });
});

describe('runFlowLintWithOutput', () => {
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  /** One unreachable page and nothing else */
  const WARNING_ONLY_AGENT: FlowFixture[] = [
    {
      dirName: 'Main',
      flow: { transitionRoutes: [trueRoute('A')] },
      pages: {
        A: { transitionRoutes: [trueRoute('B')] },
        B: {
          form: { parameters: [{ displayName: 'email' }] },
          eventHandlers: [{ event: 'sys.no-input-default' }, { event: 'sys.no-match-default' }],
        },
        Z: { transitionRoutes: [trueRoute('A')] },
      },
    },
  ];

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    cleanupAgents();
  });

  it('returns 1 when an Error finding exists', async () => {
    const code = await runFlowLintWithOutput(writeAgent(SUPPORT_AGENT), { config: DEFAULT_CONFIG, noColor: true });

    expect(code).toBe(1);
    expect(logSpy).toHaveBeenCalledTimes(1);
  });

  it('returns 0 for warnings within the limit', async () => {
    const agentDir = writeAgent(WARNING_ONLY_AGENT);

    expect(await runFlowLintWithOutput(agentDir, { config: DEFAULT_CONFIG, noColor: true })).toBe(0);
    expect(await runFlowLintWithOutput(agentDir, { config: DEFAULT_CONFIG, noColor: true, maxWarnings: 1 })).toBe(0);
  });

  it('returns 1 when warnings exceed the limit', async () => {
    const agentDir = writeAgent(WARNING_ONLY_AGENT);

    expect(await runFlowLintWithOutput(agentDir, { config: DEFAULT_CONFIG, noColor: true, maxWarnings: 0 })).toBe(1);
    expect(logSpy).toHaveBeenCalledTimes(2);
    expect(logSpy).toHaveBeenLastCalledWith('\nWarning threshold exceeded: 1 warnings (max: 0)');
  });

  it('prints a JSON error when the agent cannot be loaded in JSON mode', async () => {
    const missing = path.join(makeTempDir(), 'missing');

    expect(await runFlowLintWithOutput(missing, { config: DEFAULT_CONFIG, format: 'json' })).toBe(2);
    expect(errorSpy).not.toHaveBeenCalled();
    const printed = JSON.parse(String(logSpy.mock.calls[0][0]));
    expect(printed.error.startsWith('Agent directory cannot be read: ')).toBe(true);
  });

  it('prints JSON when asked', async () => {
    await runFlowLintWithOutput(writeAgent(WARNING_ONLY_AGENT), { config: DEFAULT_CONFIG, format: 'json' });

    expect(logSpy).toHaveBeenCalledTimes(1);
    const printed = String(logSpy.mock.calls[0][0]);
    expect(JSON.parse(printed).findings).toEqual([
      { flow: 'Main', page: 'Z', category: 'unreachable-page', severity: 'Warning', message: 'Unreachable Page' },
    ]);
  });

  it('returns 2 when the agent cannot be loaded', async () => {
    const missing = path.join(makeTempDir(), 'missing');

    expect(await runFlowLintWithOutput(missing, { config: DEFAULT_CONFIG })).toBe(2);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });
});

describe('getExitCode', () => {
  it('ignores warnings without a limit', async () => {
    const agentDir = writeAgent([{ dirName: 'Main', pages: { orphan: { transitionRoutes: [trueRoute('orphan')] } } }]);
    const result = await new FlowGraphAnalyzer().analyzeAgent(agentDir, { config: DEFAULT_CONFIG });
    cleanupAgents();

    expect(result.summary.errors).toBe(0);
    expect(getExitCode(result)).toBe(0);
    expect(getExitCode(result, 0)).toBe(1);
  });
});

describe('getAvailablePasses', () => {
  it('lists passes in execution order', () => {
    expect(getAvailablePasses().map(p => p.id)).toEqual([
      'reachability',
      'handler-completeness',
      'stuck-state',
      'route-group-usage',
      'loop-detection',
    ]);
  });
});
