/**
 * Pipeline error taxonomy. Every failure that ends a run is one of these.
 */

import type { PipelineStage } from '@pubwatch/contracts';

export type PipelineErrorCode =
  | 'INVALID_CONFIG'
  | 'INVALID_VERSION'
  | 'INVALID_RUN_NUMBER'
  | 'VERSION_MISMATCH'
  | 'MISSING_PACKAGE_NAME'
  | 'MISSING_TOKEN'
  | 'INSTALL_FAILED'
  | 'TESTS_FAILED'
  | 'PUBLISH_FAILED'
  | 'NOT_AVAILABLE';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly stage?: PipelineStage;
  readonly hint?: string;

  constructor(
    code: PipelineErrorCode,
    message: string,
    options: { stage?: PipelineStage; hint?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'PipelineError';
    this.code = code;
    this.stage = options.stage;
    this.hint = options.hint;
  }
}

export class ConfigError extends PipelineError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('INVALID_CONFIG', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class VersionError extends PipelineError {
  constructor(
    code: 'INVALID_VERSION' | 'INVALID_RUN_NUMBER' | 'VERSION_MISMATCH',
    message: string,
    hint?: string
  ) {
    super(code, message, { stage: 'publish', hint });
    this.name = 'VersionError';
  }
}

export class InstallError extends PipelineError {
  constructor(code: 'INSTALL_FAILED' | 'TESTS_FAILED', message: string, hint?: string) {
    super(code, message, { stage: 'build', hint });
    this.name = 'InstallError';
  }
}

export class PublishError extends PipelineError {
  readonly output: string;

  constructor(message: string, output: string) {
    super('PUBLISH_FAILED', message, {
      stage: 'publish',
      hint: 'Check the token and that this version was not uploaded before',
    });
    this.name = 'PublishError';
    this.output = output;
  }
}

export class AvailabilityError extends PipelineError {
  readonly attempts: number;
  readonly lastMessage: string;

  constructor(version: string, attempts: number, lastMessage: string) {
    super(
      'NOT_AVAILABLE',
      `Version ${version} not found after ${attempts} attempt(s). Last message from the index was: ${lastMessage}`,
      { stage: 'publish' }
    );
    this.name = 'AvailabilityError';
    this.attempts = attempts;
    this.lastMessage = lastMessage;
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
