import { join, resolve } from 'node:path';

import type {
  BuildType,
  CompilerKind,
  MachineChoice,
  MachineInfo,
  OptimizationLevel,
  ProcessRunner,
  RspFileSyntax,
} from './compilerTypes.js';
import type { DotnetSdk } from './dotnetSdk.js';
import { discoverDotnetSdk } from './dotnetSdk.js';
import { buildTypeArgs, optimizationArgs } from './flagTables.js';
import { spawnRunner } from './process.js';
import { loadReferencePack } from './referencePack.js';
import { sanityCheck } from './sanityCheck.js';

/**
 * One C# compiler as seen by the build orchestrator.
 *
 * Every operation except `sanityCheck` only renders arguments.
 */
export interface ToolchainAdapter {
  readonly kind: CompilerKind;
  /** Executable plus fixed prefix arguments. Never empty. */
  readonly invocation: readonly string[];
  readonly version: string;
  readonly forMachine: MachineChoice;
  readonly machine: MachineInfo;
  /** Launcher for produced executables, when the host loader can't run them. */
  readonly runner?: string;
  /** Whether the sanity check also runs the compiled program. */
  readonly executesSanityProgram: boolean;
  /** Only set for the SDK-discovered variant. */
  readonly sdk?: DotnetSdk;

  nameString(): string;
  alwaysArgs(): string[];
  linkerAlwaysArgs(): string[];
  outputArgs(path: string): string[];
  linkArgs(libraryFile: string): string[];
  werrorArgs(): string[];
  picArgs(): string[];
  debugArgs(enabled: boolean): string[];
  optimizationArgs(level: OptimizationLevel): string[];
  buildTypeArgs(buildType: BuildType): string[];
  needsStaticLinker(): boolean;
  pchUseArgs(pchDir: string, header: string): string[];
  pchName(header: string): string;
  normalizeSearchPathArgs(args: readonly string[], buildDir: string): string[];
  rspFileSyntax(): RspFileSyntax;
  sanityCheck(workDir: string, runner?: ProcessRunner): void;
}

export type VariantState =
  | { kind: 'mono' }
  | { kind: 'csc' }
  | { kind: 'dotnet'; sdk: DotnetSdk };

/** The handful of operations where variants differ from the shared rendering. */
type VariantBehavior = {
  runner?: string;
  executesSanityProgram: boolean;
  rspFileSyntax: RspFileSyntax;
  alwaysArgs?: () => string[];
  outputArgs?: (path: string) => string[];
  buildTypeArgs?: (args: string[], machine: MachineInfo) => string[];
};

const NOLOGO = '/nologo';

const monoBehavior: VariantBehavior = {
  runner: 'mono',
  executesSanityProgram: true,
  rspFileSyntax: 'gcc',
};

const cscBehavior: VariantBehavior = {
  executesSanityProgram: true,
  rspFileSyntax: 'msvc',
  // The bare -debug flag emits Windows-only PDBs.
  buildTypeArgs: (args, machine) =>
    machine.isWindowsLike()
      ? args
      : args.map((flag) => (flag === '-debug' ? '-debug:portable' : flag)),
};

function dotnetBehavior(sdk: DotnetSdk): VariantBehavior {
  const pack = loadReferencePack();
  const refDir = join(
    sdk.packsDirectory,
    pack.framework,
    sdk.runtimeVersion,
    'ref',
    sdk.frameworkMoniker,
  );
  const references = pack.assemblies.map((a) => `/reference:${join(refDir, a)}`);

  return {
    runner: 'dotnet',
    executesSanityProgram: false,
    rspFileSyntax: 'msvc',
    alwaysArgs: () => [NOLOGO, ...references],
    outputArgs: (path) => [`-out:${path}`, '/nullable:enable'],
  };
}

function behaviorFor(state: VariantState): VariantBehavior {
  switch (state.kind) {
    case 'mono':
      return monoBehavior;
    case 'csc':
      return cscBehavior;
    case 'dotnet':
      return dotnetBehavior(state.sdk);
  }
}

const SEARCH_PATH_PREFIXES = ['-L', '-lib:'] as const;

/** Returns a copy with `-L<dir>` and `-lib:<dir>` entries resolved against `buildDir`. */
export function normalizeSearchPathArgs(
  args: readonly string[],
  buildDir: string,
): string[] {
  return args.map((arg) => {
    const prefix = SEARCH_PATH_PREFIXES.find((p) => arg.startsWith(p));
    if (!prefix) return arg;
    return prefix + resolve(buildDir, arg.slice(prefix.length));
  });
}

export type AdapterOptions = {
  invocation: readonly string[];
  version: string;
  forMachine: MachineChoice;
  machine: MachineInfo;
};

export function createAdapter(
  state: VariantState,
  opts: AdapterOptions,
): ToolchainAdapter {
  if (opts.invocation.length === 0) {
    throw new Error('A toolchain invocation needs at least the executable');
  }
  const invocation = Object.freeze([...opts.invocation]);
  const variant = behaviorFor(state);
  const alwaysArgs = variant.alwaysArgs ?? (() => [NOLOGO]);

  const adapter: ToolchainAdapter = {
    kind: state.kind,
    invocation,
    version: opts.version,
    forMachine: opts.forMachine,
    machine: opts.machine,
    runner: variant.runner,
    executesSanityProgram: variant.executesSanityProgram,
    sdk: state.kind === 'dotnet' ? state.sdk : undefined,

    nameString: () => invocation.join(' '),
    alwaysArgs,
    // Compiling and linking are the same executable.
    linkerAlwaysArgs: alwaysArgs,
    outputArgs: variant.outputArgs ?? ((path) => [`-out:${path}`]),
    linkArgs: (libraryFile) => [`-r:${libraryFile}`],
    werrorArgs: () => ['-warnaserror'],
    picArgs: () => [],
    debugArgs: (enabled) => (enabled ? ['-debug'] : []),
    optimizationArgs: (level) => optimizationArgs(level),
    buildTypeArgs: (buildType) => {
      const args = buildTypeArgs(buildType);
      return variant.buildTypeArgs ? variant.buildTypeArgs(args, opts.machine) : args;
    },
    needsStaticLinker: () => false,
    pchUseArgs: () => [],
    pchName: () => '',
    normalizeSearchPathArgs,
    rspFileSyntax: () => variant.rspFileSyntax,
    sanityCheck: (workDir, runner = spawnRunner) => sanityCheck(adapter, workDir, runner),
  };
  return adapter;
}

/** Mono `mcs`; produced assemblies are launched through `mono`. */
export function createMonoAdapter(opts: AdapterOptions): ToolchainAdapter {
  return createAdapter({ kind: 'mono' }, opts);
}

/** Roslyn `csc` as shipped with Visual Studio. */
export function createCscAdapter(opts: AdapterOptions): ToolchainAdapter {
  return createAdapter({ kind: 'csc' }, opts);
}

/**
 * `dotnet` host driving the SDK's own `csc.dll`.
 *
 * `opts.version` is the SDK version to locate; construction fails with
 * ToolchainUnusableError when that exact SDK isn't installed.
 */
export function createDotnetAdapter(
  opts: AdapterOptions & { processRunner?: ProcessRunner },
): ToolchainAdapter {
  const sdk = discoverDotnetSdk(
    opts.processRunner ?? spawnRunner,
    opts.invocation,
    opts.version,
  );
  return createAdapter(
    { kind: 'dotnet', sdk },
    { ...opts, invocation: [...opts.invocation, sdk.compilerPath] },
  );
}
