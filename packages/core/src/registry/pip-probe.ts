/**
 * Resolution check through pip itself: a dry-run install of the exact version.
 * The outcome comes from the exit code; the output is kept for diagnosis only.
 */

import type { ProbeOutcome, ShellApi } from '@pubwatch/contracts';
import { commandOutput, createExecaShellAdapter } from '../shell-adapter.js';
import { found, notFound, type RegistryProbe } from './probe.js';

export interface PipProbeOptions {
  shell?: ShellApi;
  cwd?: string;
  indexUrl?: string;
  pipCommand?: string[];
  timeoutMs?: number;
}

export class PipProbe implements RegistryProbe {
  readonly id = 'pip';
  private readonly shell: ShellApi;
  private readonly cwd?: string;
  private readonly simpleIndexUrl: string;
  private readonly pipCommand: string[];
  private readonly timeoutMs: number;

  constructor(options: PipProbeOptions = {}) {
    this.shell = options.shell ?? createExecaShellAdapter();
    this.cwd = options.cwd;
    this.simpleIndexUrl = `${(options.indexUrl ?? 'https://pypi.org').replace(/\/+$/, '')}/simple`;
    this.pipCommand = options.pipCommand ?? ['python3', '-m', 'pip'];
    this.timeoutMs = options.timeoutMs ?? 120_000;
  }

  installArgs(packageName: string, version: string): string[] {
    return [
      'install',
      '--dry-run',
      '--no-deps',
      '--no-cache-dir',
      '--index-url',
      this.simpleIndexUrl,
      `${packageName}==${version}`,
    ];
  }

  async check(packageName: string, version: string): Promise<ProbeOutcome> {
    const [command, ...prefix] = this.pipCommand;
    if (!command) {
      throw new Error('pipCommand must name an executable');
    }

    const result = await this.shell.exec(command, [...prefix, ...this.installArgs(packageName, version)], {
      cwd: this.cwd,
      timeoutMs: this.timeoutMs,
    });
    const output = commandOutput(result);

    if (result.ok) {
      return found(output || `${packageName}==${version} resolved`);
    }
    return notFound(output || `pip exited with code ${result.exitCode}`);
  }
}
