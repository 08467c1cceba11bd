import { basename } from 'node:path';

import { logWarn } from '../dx/logger.js';
import { which } from '../utils/which.js';
import type { WhichEnv } from '../utils/which.js';
import type { CompilerInfo, CompilerKind, ProcessRunner } from './compilerTypes.js';
import { ToolchainUnusableError } from './errors.js';
import { spawnRunner } from './process.js';

export type DetectOptions = {
  runner?: ProcessRunner;
  env?: WhichEnv;
  /** Names or paths tried in order. Defaults to `$CSC`, csc, mcs, dotnet. */
  candidates?: Array<string | undefined>;
  resolve?: (name: string) => string | null;
};

export function identifyCompiler(
  path: string,
  versionOutput: string,
): { kind: CompilerKind; version: string } | null {
  const lines = versionOutput.split(/\r?\n/).map((l) => l.trim());

  const mono = lines.find((l) => l.includes('Mono C# compiler'));
  if (mono) {
    const tokens = mono.split(/\s+/);
    return { kind: 'mono', version: tokens[tokens.length - 1] };
  }

  const csc = versionOutput.match(/Visual C# Compiler version (\S+)/);
  if (csc) return { kind: 'csc', version: csc[1] };

  const exe = basename(path).replace(/\.exe$/i, '');
  const first = lines.find(Boolean) ?? '';
  if (exe === 'dotnet' && /^\d+\.\d+\.\d+\S*$/.test(first)) {
    return { kind: 'dotnet', version: first };
  }

  return null;
}

export function detectCsCompiler(opts: DetectOptions = {}): CompilerInfo {
  const env = opts.env ?? process.env;
  const runner = opts.runner ?? spawnRunner;
  const resolveName = opts.resolve ?? ((name: string) => which(name, env));
  const candidates = opts.candidates ?? [env.CSC, 'csc', 'mcs', 'dotnet'];

  const tried: string[] = [];
  for (const name of candidates) {
    if (!name) continue;
    const resolved = /[\\/]/.test(name) ? name : resolveName(name);
    if (!resolved) continue;
    tried.push(resolved);

    const res = runner.run([resolved, '--version']);
    const found = identifyCompiler(resolved, `${res.stdout}\n${res.stderr}`);
    if (found) return { ...found, path: resolved };
    logWarn('not a recognized C# compiler, skipping', { path: resolved, exitCode: res.exitCode });
  }

  throw new ToolchainUnusableError(
    tried.length
      ? `No usable C# compiler among: ${tried.join(', ')}`
      : 'No C# compiler found (csc/mcs/dotnet)',
    'discovery',
  );
}
