export type CompilerKind = 'mono' | 'csc' | 'dotnet';

export type MachineChoice = 'build' | 'host';

export type OptimizationLevel = '0' | 'g' | '1' | '2' | '3' | 's';

export type BuildType =
  | 'plain'
  | 'debug'
  | 'debugoptimized'
  | 'release'
  | 'minsize'
  | 'custom';

export type RspFileSyntax = 'gcc' | 'msvc';

/** Platform predicates for the machine the produced artifact runs on. */
export interface MachineInfo {
  system: NodeJS.Platform;
  isWindowsLike(): boolean;
}

export type CompilerInfo = {
  kind: CompilerKind;
  path: string;
  version: string;
};

export type ProcessResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export interface ProcessRunner {
  run(argv: readonly string[], opts?: { cwd?: string }): ProcessResult;
}
