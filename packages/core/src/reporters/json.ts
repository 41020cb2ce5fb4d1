/**
 * JSON reporter for pipeline reports
 */

import type { PipelineReport } from '@pubwatch/contracts';

export function renderJson(report: PipelineReport): string {
  return JSON.stringify(report, null, 2);
}
