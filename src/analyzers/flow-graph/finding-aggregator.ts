/**
 * Finding Aggregator
 *
 * Runs passes in their fixed order and concatenates the results. No
 * deduplication happens across passes: a page may appear in several.
 */

import { logger } from '../../utils/logger.js';
import type { AnalysisPass, Finding, FindingSummary } from './types.js';

export class FindingAggregator {
  constructor(private readonly passes: ReadonlyArray<AnalysisPass>) {}

  aggregate(): Finding[] {
    const findings: Finding[] = [];

    for (const pass of this.passes) {
      const startTime = Date.now();
      const passFindings = pass.run();
      logger.debug('Pass completed', {
        pass: pass.id,
        findings: passFindings.length,
        durationMs: Date.now() - startTime,
      });
      findings.push(...passFindings);
    }

    return findings;
  }
}

/**
 * Keep only the findings of the given flows (by display name); an empty
 * filter keeps everything
 */
export function filterByFlows(
  findings: ReadonlyArray<Finding>,
  flows: ReadonlyArray<string> | undefined
): Finding[] {
  if (!flows || flows.length === 0) return [...findings];
  const wanted = new Set(flows);
  return findings.filter(finding => wanted.has(finding.flow));
}

/**
 * Calculate summary statistics
 */
export function summarizeFindings(findings: ReadonlyArray<Finding>): FindingSummary {
  let errors = 0;
  let warnings = 0;
  let infos = 0;
  const flows: string[] = [];

  for (const finding of findings) {
    if (finding.severity === 'Error') errors++;
    else if (finding.severity === 'Warning') warnings++;
    else infos++;

    if (!flows.includes(finding.flow)) {
      flows.push(finding.flow);
    }
  }

  return Object.freeze({
    total: findings.length,
    errors,
    warnings,
    infos,
    flowsWithFindings: Object.freeze(flows),
  });
}
