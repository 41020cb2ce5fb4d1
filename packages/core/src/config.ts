/**
 * Configuration loader for @pubwatch/core
 *
 * Layers, lowest first: schema defaults, pubwatch.config.json, environment, CLI overrides.
 * The result is built once at process entry and passed explicitly to every stage.
 */

import { readFile } from 'node:fs/promises';
import { isAbsolute, join } from 'node:path';
import type { ZodError } from 'zod';
import {
  ProjectConfigSchema,
  RunEnvSchema,
  RunSettingsSchema,
  type BuildSettings,
  type IndexSettings,
  type PipelineConfig,
  type PollSettings,
  type ProbeKind,
} from '@pubwatch/contracts';
import { ConfigError, errorMessage } from './errors.js';

export const DEFAULT_CONFIG_FILE = 'pubwatch.config.json';

export interface ConfigOverrides {
  packageName?: string;
  versionFile?: string;
  releaseBranches?: string[];
  allowVersionDrift?: boolean;
  probe?: ProbeKind;
  index?: Partial<IndexSettings>;
  poll?: Partial<PollSettings>;
  build?: Partial<BuildSettings>;
  branch?: string;
  runNumber?: number;
  runId?: string;
  dryRun?: boolean;
}

export interface LoadPipelineConfigOptions {
  cwd?: string;
  /** Explicit config file; must exist when given */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

export async function loadPipelineConfig(opts: LoadPipelineConfigOptions = {}): Promise<PipelineConfig> {
  const cwd = opts.cwd ?? process.cwd();
  const overrides = opts.overrides ?? {};
  const env = readRunEnv(opts.env ?? process.env);

  const fileConfig = await readConfigFile(cwd, opts.configPath);
  const { branch, runNumber, runId, dryRun, ...projectOverrides } = overrides;

  const project = ProjectConfigSchema.safeParse(mergeLayers(fileConfig, projectOverrides));
  if (!project.success) {
    throw new ConfigError('Invalid pipeline configuration', formatIssues(project.error));
  }

  const run = RunSettingsSchema.safeParse({
    branch: branch ?? env.GITHUB_REF,
    runNumber: runNumber ?? env.GITHUB_RUN_NUMBER,
    runId: runId ?? env.GITHUB_RUN_ID,
    dryRun,
  });
  if (!run.success) {
    throw new ConfigError('Invalid run settings', formatIssues(run.error));
  }

  return {
    ...project.data,
    cwd,
    run: run.data,
    publishToken: env.PYPI_PUBLISH_TOKEN ?? env.POETRY_PYPI_TOKEN_PYPI,
  };
}

export function readRunEnv(env: NodeJS.ProcessEnv) {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim().length > 0) {
      cleaned[key] = value.trim();
    }
  }

  const parsed = RunEnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError('Invalid environment', formatIssues(parsed.error));
  }
  return parsed.data;
}

async function readConfigFile(cwd: string, configPath?: string): Promise<Record<string, unknown>> {
  const path = configPath
    ? isAbsolute(configPath)
      ? configPath
      : join(cwd, configPath)
    : join(cwd, DEFAULT_CONFIG_FILE);

  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    if (!configPath && isNotFound(error)) {
      return {};
    }
    throw new ConfigError(`Cannot read config file ${path}: ${errorMessage(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config file ${path} is not valid JSON: ${errorMessage(error)}`);
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file ${path} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Deep-merge plain objects; undefined values in `layer` leave `base` untouched
 */
export function mergeLayers(base: Record<string, unknown>, layer: object): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(layer)) {
    if (value === undefined) {
      continue;
    }
    const current = result[key];
    result[key] = isPlainObject(current) && isPlainObject(value) ? mergeLayers(current, value) : value;
  }
  return result;
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
