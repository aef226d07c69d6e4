/**
 * Tests for the JSON reporter
 */
import { describe, it, expect } from 'vitest';
import { formatJsonOutput } from '../../../../src/analyzers/flow-graph/reporter/json.js';
import { summarizeFindings } from '../../../../src/analyzers/flow-graph/finding-aggregator.js';
import type { Finding, FlowAnalysisResult } from '../../../../src/analyzers/flow-graph/types.js';

const findings: Finding[] = [
  {
    flow: 'Main',
    page: 'Ask\u001b[31m Name',
    category: 'missing-event-handler',
    message: 'Missing Event Handler: no-input',
    severity: 'Warning',
  },
];

const result: FlowAnalysisResult = {
  agentDir: '/agents/support',
  flowCount: 2,
  pageCount: 7,
  routeGroupCount: 1,
  findings,
  summary: summarizeFindings(findings),
  timestamp: new Date(0),
  durationMs: 3,
};

describe('formatJsonOutput', () => {
  it('writes the summary and sanitized findings', () => {
    expect(JSON.parse(formatJsonOutput(result))).toEqual({
      agentDir: '/agents/support',
      summary: { flows: 2, pages: 7, routeGroups: 1, total: 1, errors: 0, warnings: 1, infos: 0 },
      findings: [
        {
          flow: 'Main',
          page: 'Ask Name',
          category: 'missing-event-handler',
          severity: 'Warning',
          message: 'Missing Event Handler: no-input',
        },
      ],
    });
  });

  it('writes a single line in compact mode', () => {
    const output = formatJsonOutput(result, true);

    expect(output.includes('\n')).toBe(false);
    expect(JSON.parse(output)).toEqual(JSON.parse(formatJsonOutput(result)));
  });
});
