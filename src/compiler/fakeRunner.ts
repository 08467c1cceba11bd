import type { ProcessResult, ProcessRunner } from './compilerTypes.js';

export type RecordedCall = { argv: string[]; cwd?: string };

/** In-process stand-in for spawning; answers from `respond` and records every call. */
export function fakeRunner(
  respond: (argv: readonly string[]) => Partial<ProcessResult> = () => ({}),
): { runner: ProcessRunner; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const runner: ProcessRunner = {
    run(argv, opts) {
      calls.push({ argv: [...argv], cwd: opts?.cwd });
      return { exitCode: 0, stdout: '', stderr: '', ...respond(argv) };
    },
  };
  return { runner, calls };
}

export const SDK_LISTING = [
  '6.0.400 [/usr/share/dotnet/sdk]',
  '7.0.100 [/usr/share/dotnet/sdk]',
  '',
].join('\n');

export const RUNTIME_LISTING = [
  'Microsoft.AspNetCore.App 6.0.12 [/usr/share/dotnet/shared/Microsoft.AspNetCore.App]',
  'Microsoft.NETCore.App 6.0.5 [/usr/share/dotnet/shared/Microsoft.NETCore.App]',
  'Microsoft.NETCore.App 6.0.12 [/usr/share/dotnet/shared/Microsoft.NETCore.App]',
  'Microsoft.NETCore.App 7.0.0 [/usr/share/dotnet/shared/Microsoft.NETCore.App]',
  '',
].join('\n');

/** Answers `dotnet --list-sdks` / `--list-runtimes` like a host with SDKs 6.0.400 and 7.0.100. */
export function dotnetHost(): { runner: ProcessRunner; calls: RecordedCall[] } {
  return fakeRunner((argv) => {
    const flag = argv[argv.length - 1];
    if (flag === '--list-sdks') return { stdout: SDK_LISTING };
    if (flag === '--list-runtimes') return { stdout: RUNTIME_LISTING };
    return {};
  });
}
