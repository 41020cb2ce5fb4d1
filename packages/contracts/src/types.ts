/**
 * Core types for @pubwatch/contracts
 */

export type PipelineStage = 'build' | 'publish';

export type PipelineStep =
  | 'installing'
  | 'testing'
  | 'resolving'
  | 'publishing'
  | 'waiting';

export type ReleaseChannel = 'release' | 'dev';

export interface PipelineContext {
  cwd: string;
  branch: string;
  runNumber?: number;
  runId?: string;
  dryRun?: boolean;
}

/**
 * Minimal logger shape accepted by every core function.
 * Meta values are structured and may be rendered as JSON.
 */
export interface PipelineLogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export interface ShellExecOptions {
  cwd?: string;
  timeoutMs?: number;
  env?: Record<string, string>;
}

export interface ShellResult {
  ok: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
  timingMs: number;
}

export interface ShellApi {
  exec(command: string, args: string[], options?: ShellExecOptions): Promise<ShellResult>;
}

// CheckId is dynamic - adapters register under any string
export type CheckId = string;

export interface CheckResult {
  id: CheckId;
  ok: boolean;
  skipped?: boolean;
  details?: Record<string, unknown>;
  hint?: string;
  timingMs?: number;
}

export type ProbeOutcome =
  | { status: 'found'; message: string }
  | { status: 'not-found'; message: string }
  | { status: 'transient-error'; message: string };

export interface AvailabilityResult {
  available: boolean;
  packageName: string;
  version: string;
  attempts: number;
  waitedMs: number;
  lastOutcome: ProbeOutcome;
}

export interface ResolvedVersion {
  /** Version stamped into the manifest and uploaded */
  version: string;
  /** Normalized form the index serves the version under */
  indexVersion: string;
  baseVersion: string;
  channel: ReleaseChannel;
  branch: string;
}

export interface BuildStageResult {
  checks: Partial<Record<CheckId, CheckResult>>;
}

export interface PublishStageResult {
  resolved: ResolvedVersion;
  published: boolean;
  availability?: AvailabilityResult;
}

export interface PipelineResult {
  ok: boolean;
  failedStage?: PipelineStage;
  build?: BuildStageResult;
  publish?: PublishStageResult;
  errors?: string[];
  timingMs: number;
}

export interface PipelineReport {
  schemaVersion: '1.0';
  ts: string;
  context: PipelineContext;
  stages: PipelineStage[];
  result: PipelineResult;
}
