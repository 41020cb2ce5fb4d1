/**
 * CLI flag parsing: commander hands over untyped option values, zod turns them into CliOptions
 */

import { Command, Option } from 'commander';
import { z } from 'zod';
import { ProbeKindSchema } from '@pubwatch/contracts';
import { ConfigError, type ConfigOverrides } from '@pubwatch/core';

export const CliOptionsSchema = z.object({
  cwd: z.string().min(1).optional(),
  config: z.string().min(1).optional(),
  json: z.boolean().default(false),
  verbose: z.boolean().default(false),
  quiet: z.boolean().default(false),
  color: z.boolean().default(true),
  package: z.string().min(1).optional(),
  branch: z.string().min(1).optional(),
  runNumber: z.coerce.number().int().positive().optional(),
  runId: z.string().min(1).optional(),
  dryRun: z.boolean().optional(),
  probe: ProbeKindSchema.optional(),
  maxAttempts: z.coerce.number().int().min(1).optional(),
  interval: z.coerce.number().int().min(0).optional(),
  indexUrl: z.string().url().optional(),
  repository: z.string().min(1).optional(),
  withTests: z.boolean().optional(),
  allowVersionDrift: z.boolean().optional(),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export function addGlobalOptions(program: Command): Command {
  return program
    .option('--cwd <dir>', 'Project directory (default: current directory)')
    .option('-c, --config <path>', 'Path to pubwatch.config.json')
    .option('--json', 'Output results as JSON')
    .option('--verbose', 'Verbose output')
    .option('--quiet', 'Only print warnings and errors')
    .option('--no-color', 'Disable colored output');
}

export function addStageOptions(command: Command): Command {
  return command
    .option('--package <name>', 'Package name on the index')
    .option('--branch <ref>', 'Branch or ref (default: GITHUB_REF, then git)')
    .option('--run-number <n>', 'CI run number (default: GITHUB_RUN_NUMBER)')
    .option('--run-id <id>', 'CI run id (default: GITHUB_RUN_ID)')
    .option('--dry-run', 'Build without uploading or stamping the manifest; skips the availability check')
    .addOption(new Option('--probe <kind>', 'How to check the index').choices(['json', 'pip']))
    .option('--max-attempts <n>', 'Availability check attempts')
    .option('--interval <ms>', 'Wait between availability checks, in milliseconds')
    .option('--index-url <url>', 'Package index base URL')
    .option('--repository <name>', 'Poetry repository to publish to')
    .option('--with-tests', 'Run the test suite during build')
    .option('--allow-version-drift', 'Publish from VERSION even if the manifest disagrees');
}

export function parseCliOptions(raw: Record<string, unknown>): CliOptions {
  const parsed = CliOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid command-line options',
      parsed.error.issues.map((issue) => `--${toFlag(issue.path.join('.'))}: ${issue.message}`)
    );
  }
  return parsed.data;
}

export function toConfigOverrides(options: CliOptions): ConfigOverrides {
  return {
    packageName: options.package,
    allowVersionDrift: options.allowVersionDrift,
    probe: options.probe,
    index: { url: options.indexUrl, repository: options.repository },
    poll: { maxAttempts: options.maxAttempts, intervalMs: options.interval },
    build: { runTests: options.withTests },
    branch: options.branch,
    runNumber: options.runNumber,
    runId: options.runId,
    dryRun: options.dryRun,
  };
}

function toFlag(key: string): string {
  return key.replace(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`);
}
