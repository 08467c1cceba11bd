import type { CompileRequest, TargetKind } from './compiler/compileTypes.js';
import { isBuildType, isOptimizationLevel } from './compiler/flagTables.js';
import type { ToolchainConfig } from './dx/config.js';

export function getFlagValue(argv: string[], name: string): string | undefined {
  const idx = argv.indexOf(name);
  if (idx === -1) return undefined;
  return argv[idx + 1];
}

export function getFlagValues(argv: string[], name: string): string[] {
  const out: string[] = [];
  argv.forEach((a, i) => {
    const next = argv[i + 1];
    if (a === name && next !== undefined) out.push(next);
  });
  return out;
}

export function hasFlag(argv: string[], name: string): boolean {
  return argv.includes(name);
}

const VALUE_FLAGS = new Set(['--out', '--buildtype', '--optimization', '--ref', '--target', '--build-dir']);
const TARGETS: readonly TargetKind[] = ['exe', 'winexe', 'library', 'module'];

/** Positional arguments after the subcommand, skipping flags and their values. */
export function positionals(argv: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (VALUE_FLAGS.has(a)) {
      i++;
      continue;
    }
    if (a.startsWith('--')) continue;
    out.push(a);
  }
  return out;
}

/** Builds the compile request for `args`, or returns an error message. */
export function parseArgsCommand(
  argv: string[],
  config: ToolchainConfig | null,
): CompileRequest | string {
  const sources = positionals(argv);
  if (!sources.length) return 'Missing source files';

  const buildType = getFlagValue(argv, '--buildtype') ?? config?.buildType;
  if (buildType !== undefined && !isBuildType(buildType)) {
    return `Invalid --buildtype: ${buildType}`;
  }
  const optimization = getFlagValue(argv, '--optimization') ?? config?.optimization;
  if (optimization !== undefined && !isOptimizationLevel(optimization)) {
    return `Invalid --optimization: ${optimization}`;
  }
  const targetRaw = getFlagValue(argv, '--target') ?? 'exe';
  const target = TARGETS.find((t) => t === targetRaw);
  if (!target) return `Invalid --target: ${targetRaw}`;

  const ext = target === 'library' ? 'dll' : target === 'module' ? 'netmodule' : 'exe';
  const out = getFlagValue(argv, '--out') ?? `${sources[0].replace(/\.cs$/i, '')}.${ext}`;

  return {
    sources,
    outputPath: out,
    target,
    buildType,
    optimization,
    debug: hasFlag(argv, '--debug') ? true : undefined,
    werror: hasFlag(argv, '--werror') || (config?.werror ?? false),
    references: getFlagValues(argv, '--ref'),
    buildDir: getFlagValue(argv, '--build-dir'),
  };
}
