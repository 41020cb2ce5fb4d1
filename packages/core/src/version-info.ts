/**
 * Build identification printed at the start of a run
 */

import type { PipelineConfig } from '@pubwatch/contracts';
import { readVersionFile } from './version-source.js';

export interface VersionInfo {
  buildNumber?: number;
  baseVersion: string;
  /** `<VERSION>.<buildNumber>`, or the bare VERSION outside CI */
  buildVersion: string;
  runId?: string;
}

export async function collectVersionInfo(config: PipelineConfig): Promise<VersionInfo> {
  const baseVersion = await readVersionFile(config.cwd, config.versionFile);
  const buildNumber = config.run.runNumber;
  return {
    buildNumber,
    baseVersion,
    buildVersion: buildNumber === undefined ? baseVersion : `${baseVersion}.${buildNumber}`,
    runId: config.run.runId,
  };
}

export function formatVersionInfo(info: VersionInfo): string {
  return [
    `Build Number: ${info.buildNumber ?? 'n/a'}`,
    `Version:      ${info.buildVersion}`,
    `Run ID:       ${info.runId ?? 'n/a'}`,
  ].join('\n');
}
