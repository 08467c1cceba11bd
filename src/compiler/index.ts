import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { logDebug } from '../dx/logger.js';
import { traceInfo, traceWarn } from '../dx/trace.js';
import type { AdapterOptions, ToolchainAdapter } from './adapter.js';
import { createCscAdapter, createDotnetAdapter, createMonoAdapter } from './adapter.js';
import type { CompilerInfo, MachineChoice, MachineInfo, ProcessRunner } from './compilerTypes.js';
import type { DetectOptions } from './detectCsCompiler.js';
import { detectCsCompiler } from './detectCsCompiler.js';
import { detectMachine } from './detectPlatform.js';
import { spawnRunner } from './process.js';

export type ToolchainOptions = {
  runner?: ProcessRunner;
  machine?: MachineInfo;
  forMachine?: MachineChoice;
  /** SDK to use instead of the `dotnet` host's default. */
  sdkVersion?: string;
};

/** Picks the variant for a detected compiler. */
export function createToolchainAdapter(
  info: CompilerInfo,
  opts: ToolchainOptions = {},
): ToolchainAdapter {
  const common: AdapterOptions = {
    invocation: [info.path],
    version: info.version,
    forMachine: opts.forMachine ?? 'host',
    machine: opts.machine ?? detectMachine(),
  };

  switch (info.kind) {
    case 'mono':
      return createMonoAdapter(common);
    case 'csc':
      return createCscAdapter(common);
    case 'dotnet':
      return createDotnetAdapter({
        ...common,
        version: opts.sdkVersion ?? info.version,
        processRunner: opts.runner ?? spawnRunner,
      });
  }
}

export type DetectToolchainOptions = ToolchainOptions &
  Omit<DetectOptions, 'runner'> & {
    /** Directory for the sanity check; a fresh temp dir when omitted. */
    workDir?: string;
  };

/** Detect, construct and sanity-check the C# toolchain. */
export function detectToolchain(opts: DetectToolchainOptions = {}): ToolchainAdapter {
  const runner = opts.runner ?? spawnRunner;

  const info = detectCsCompiler({ ...opts, runner });
  logDebug('detected C# compiler', info);

  const adapter = createToolchainAdapter(info, { ...opts, runner });
  traceInfo('toolchain.created', { kind: adapter.kind, invocation: adapter.invocation });

  const workDir = opts.workDir ?? mkdtempSync(join(tmpdir(), 'cs-toolchain-'));
  try {
    adapter.sanityCheck(workDir, runner);
  } catch (err) {
    traceWarn('toolchain.sanity_failed', {
      workDir,
      error: err instanceof Error ? err.message : String(err),
    });
    throw err;
  }
  logDebug('sanity check passed', { workDir });
  return adapter;
}

export {
  createAdapter,
  createCscAdapter,
  createDotnetAdapter,
  createMonoAdapter,
  normalizeSearchPathArgs,
} from './adapter.js';
export type { AdapterOptions, ToolchainAdapter, VariantState } from './adapter.js';
export { buildCompileCommand } from './buildCommand.js';
export type { CompileCommand, CompileRequest, TargetKind } from './compileTypes.js';
export type * from './compilerTypes.js';
export { detectCsCompiler } from './detectCsCompiler.js';
export { detectMachine } from './detectPlatform.js';
export type { DotnetSdk } from './dotnetSdk.js';
export { ToolchainUnusableError, UnknownFlagKeyError } from './errors.js';
export { buildTypeArgs, optimizationArgs } from './flagTables.js';
export { spawnRunner } from './process.js';
