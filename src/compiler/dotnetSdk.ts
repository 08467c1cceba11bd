import { join } from 'node:path';

import type { ProcessRunner } from './compilerTypes.js';
import { ToolchainUnusableError } from './errors.js';

export type DotnetSdk = {
  version: string;
  sdkRoot: string;
  /** Roslyn `csc.dll` shipped inside the SDK. */
  compilerPath: string;
  packsDirectory: string;
  runtimeVersion: string;
  /** Target framework moniker, e.g. `net6.0`. */
  frameworkMoniker: string;
};

export type SdkListing = { version: string; root: string };
export type RuntimeListing = { name: string; version: string; root: string };

const RUNTIME_NAME = 'Microsoft.NETCore.App';

function nonEmptyLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter(Boolean);
}

/** Parses `dotnet --list-sdks`: `6.0.400 [/usr/share/dotnet/sdk]`. */
export function parseSdkListing(output: string): SdkListing[] {
  const out: SdkListing[] = [];
  for (const line of nonEmptyLines(output)) {
    const m = line.match(/^(\S+)\s+\[(.+)\]$/);
    if (!m) continue;
    out.push({ version: m[1], root: m[2] });
  }
  return out;
}

/** Parses `dotnet --list-runtimes`: `Microsoft.NETCore.App 6.0.5 [/usr/share/dotnet/shared/Microsoft.NETCore.App]`. */
export function parseRuntimeListing(output: string): RuntimeListing[] {
  const out: RuntimeListing[] = [];
  for (const line of nonEmptyLines(output)) {
    const m = line.match(/^(\S+)\s+(\S+)\s+\[(.+)\]$/);
    if (!m) continue;
    out.push({ name: m[1], version: m[2], root: m[3] });
  }
  return out;
}

export function majorMinor(version: string): [number, number] | null {
  const m = version.match(/^(\d+)\.(\d+)/);
  if (!m) return null;
  return [Number(m[1]), Number(m[2])];
}

function numericParts(version: string): number[] {
  return version
    .split('-')[0]
    .split('.')
    .map((p) => Number(p) || 0);
}

/** Orders release versions above their own prereleases. */
export function compareVersions(a: string, b: string): number {
  const pa = numericParts(a);
  const pb = numericParts(b);
  for (let i = 0; i < Math.max(pa.length, pb.length); i++) {
    const d = (pa[i] ?? 0) - (pb[i] ?? 0);
    if (d !== 0) return d;
  }
  const preA = a.includes('-');
  const preB = b.includes('-');
  if (preA !== preB) return preA ? -1 : 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

function listOrFail(
  runner: ProcessRunner,
  invocation: readonly string[],
  flag: string,
): string {
  const res = runner.run([...invocation, flag]);
  if (res.exitCode !== 0) {
    throw new ToolchainUnusableError(
      `${invocation.join(' ')} ${flag} exited with code ${res.exitCode}`,
      'discovery',
      res,
    );
  }
  return res.stdout;
}

/**
 * Locates the installed SDK whose version equals `version` and the matching
 * shared runtime. Never substitutes a different SDK.
 */
export function discoverDotnetSdk(
  runner: ProcessRunner,
  invocation: readonly string[],
  version: string,
): DotnetSdk {
  const sdks = parseSdkListing(listOrFail(runner, invocation, '--list-sdks'));
  const sdk = sdks.find((s) => s.version === version);
  if (!sdk) {
    const found = sdks.map((s) => s.version).join(', ') || 'none';
    throw new ToolchainUnusableError(
      `.NET SDK ${version} is not installed (found: ${found})`,
      'discovery',
    );
  }

  const mm = majorMinor(version);
  if (!mm) {
    throw new ToolchainUnusableError(
      `Cannot derive a target framework from SDK version ${version}`,
      'discovery',
    );
  }
  const [major, minor] = mm;

  const runtimes = parseRuntimeListing(
    listOrFail(runner, invocation, '--list-runtimes'),
  )
    .filter((r) => r.name === RUNTIME_NAME)
    .filter((r) => {
      const rmm = majorMinor(r.version);
      return rmm !== null && rmm[0] === major && rmm[1] === minor;
    })
    .sort((a, b) => compareVersions(b.version, a.version));

  const runtime = runtimes[0];
  if (!runtime) {
    throw new ToolchainUnusableError(
      `No ${RUNTIME_NAME} ${major}.${minor} runtime found for SDK ${version}`,
      'discovery',
    );
  }

  return {
    version,
    sdkRoot: sdk.root,
    compilerPath: join(sdk.root, version, 'Roslyn', 'bincore', 'csc.dll'),
    packsDirectory: join(sdk.root, '..', 'packs'),
    runtimeVersion: runtime.version,
    frameworkMoniker: `net${major}.${minor}`,
  };
}
