/**
 * @module @pubwatch/contracts/schema/config
 * Zod schemas for pipeline configuration
 */

import { z } from 'zod';

// ============================================================================
// Settings blocks
// ============================================================================

export const ProbeKindSchema = z.enum(['json', 'pip']);

export type ProbeKind = z.infer<typeof ProbeKindSchema>;

export const PollSettingsSchema = z.object({
  maxAttempts: z.number().int().min(1).default(7),
  intervalMs: z.number().int().min(0).default(30_000),
});

export type PollSettings = z.infer<typeof PollSettingsSchema>;

export const IndexSettingsSchema = z.object({
  url: z.string().url().default('https://pypi.org'),
  repository: z
    .string()
    .regex(/^[A-Za-z0-9_-]+$/, 'repository must be a Poetry repository name')
    .default('pypi'),
});

export type IndexSettings = z.infer<typeof IndexSettingsSchema>;

const CommandSchema = z.array(z.string().min(1)).min(1);

export const BuildSettingsSchema = z.object({
  installCommand: CommandSchema.default(['poetry', 'install']),
  testCommand: CommandSchema.default(['poetry', 'run', 'pytest']),
  runTests: z.boolean().default(false),
  timeoutMs: z.number().int().positive().default(600_000),
});

export type BuildSettings = z.infer<typeof BuildSettingsSchema>;

// ============================================================================
// Project config (pubwatch.config.json)
// ============================================================================

export const ProjectConfigSchema = z.object({
  packageName: z.string().min(1).optional(),
  versionFile: z.string().min(1).default('VERSION'),
  releaseBranches: z.array(z.string().min(1)).min(1).default(['main']),
  allowVersionDrift: z.boolean().default(false),
  probe: ProbeKindSchema.default('json'),
  index: IndexSettingsSchema.default({}),
  poll: PollSettingsSchema.default({}),
  build: BuildSettingsSchema.default({}),
});

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type ProjectConfigInput = z.input<typeof ProjectConfigSchema>;

// ============================================================================
// Run settings (environment + CLI)
// ============================================================================

export const RunSettingsSchema = z.object({
  branch: z.string().min(1).optional(),
  runNumber: z.number().int().positive().optional(),
  runId: z.string().min(1).optional(),
  dryRun: z.boolean().default(false),
});

export type RunSettings = z.infer<typeof RunSettingsSchema>;

/**
 * Environment variables read once at process entry.
 * Empty strings are dropped before parsing.
 */
export const RunEnvSchema = z.object({
  GITHUB_RUN_NUMBER: z.coerce.number().int().positive().optional(),
  GITHUB_RUN_ID: z.string().optional(),
  GITHUB_REF: z.string().optional(),
  PYPI_PUBLISH_TOKEN: z.string().optional(),
  POETRY_PYPI_TOKEN_PYPI: z.string().optional(),
  PUBWATCH_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
});

export type RunEnv = z.infer<typeof RunEnvSchema>;

/**
 * Fully resolved configuration handed to every stage
 */
export interface PipelineConfig extends ProjectConfig {
  cwd: string;
  run: RunSettings;
  /** Upload credential; never logged or reported */
  publishToken?: string;
}
