/**
 * Text reporter for pipeline reports
 */

import type { PipelineReport } from '@pubwatch/contracts';

export function renderText(report: PipelineReport): string {
  const { result } = report;
  const lines: string[] = [];

  lines.push('[pipeline] ' + (result.ok ? 'OK' : `FAILED${result.failedStage ? ` in ${result.failedStage}` : ''}`));
  lines.push('');

  // Build checks
  if (result.build) {
    for (const [id, check] of Object.entries(result.build.checks)) {
      if (!check) continue;
      const status = check.skipped ? 'skip' : check.ok ? 'pass' : 'fail';
      lines.push(`[${id}] ${status}`);
      if (check.hint && (!check.ok || check.skipped)) {
        lines.push(`  ${check.hint}`);
      }
    }
    lines.push('');
  }

  // Publish
  if (result.publish) {
    const { resolved, published, availability } = result.publish;
    lines.push(`[version] ${resolved.version} (${resolved.channel}, branch ${resolved.branch})`);
    lines.push(`[published] ${published ? 'yes' : 'no (dry-run)'}`);
    if (availability) {
      const status = availability.available ? 'available' : 'NOT available';
      lines.push(`[index] ${availability.version} ${status} after ${availability.attempts} attempt(s), waited ${formatTiming(availability.waitedMs)}`);
    }
    lines.push('');
  }

  // Errors
  if (result.errors && result.errors.length > 0) {
    lines.push('[errors]');
    for (const error of result.errors) {
      lines.push(`  ${error}`);
    }
    lines.push('');
  }

  lines.push(`[timing] ${formatTiming(result.timingMs)}`);

  return lines.join('\n');
}

export function formatTiming(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  return `${(ms / 60000).toFixed(1)}m`;
}
