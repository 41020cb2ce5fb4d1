import type { ShellApi, ShellExecOptions, ShellResult } from '@pubwatch/contracts';

export interface RecordedCall {
  command: string;
  args: string[];
  options?: ShellExecOptions;
}

export type FakeReply = Partial<Omit<ShellResult, 'ok'>> & { ok?: boolean };

export function createFakeShell(
  respond: (command: string, args: string[]) => FakeReply = () => ({})
): ShellApi & { calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  return {
    calls,
    async exec(command, args, options) {
      calls.push({ command, args, options });
      const reply = respond(command, args);
      const exitCode = reply.exitCode ?? 0;
      return {
        ok: reply.ok ?? exitCode === 0,
        exitCode,
        stdout: reply.stdout ?? '',
        stderr: reply.stderr ?? '',
        timingMs: reply.timingMs ?? 1,
      };
    },
  };
}

export function recordingSleep(): { sleep: (ms: number) => Promise<void>; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}
