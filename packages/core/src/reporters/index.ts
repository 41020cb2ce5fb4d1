export { renderText, formatTiming } from './text.js';
export { renderJson } from './json.js';

import type { PipelineContext, PipelineReport, PipelineResult, PipelineStage } from '@pubwatch/contracts';

export function createReport(
  context: PipelineContext,
  stages: PipelineStage[],
  result: PipelineResult,
  now: Date = new Date()
): PipelineReport {
  return {
    schemaVersion: '1.0',
    ts: now.toISOString(),
    context,
    stages,
    result,
  };
}
