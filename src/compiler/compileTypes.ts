import type { BuildType, OptimizationLevel, RspFileSyntax } from './compilerTypes.js';

export type TargetKind = 'exe' | 'winexe' | 'library' | 'module';

export type CompileRequest = {
  sources: string[];
  outputPath: string;
  /** Defaults to `exe`. */
  target?: TargetKind;
  buildType?: BuildType;
  /** Applied on top of the build type's own flags. */
  optimization?: OptimizationLevel;
  debug?: boolean;
  werror?: boolean;
  /** Assemblies to reference, one `-r:` flag each. */
  references?: string[];
  /** Raw flags; `-L`/`-lib:` entries are resolved against `buildDir`. */
  extraArgs?: string[];
  buildDir?: string;
};

export type CompileCommand = {
  argv: string[];
  outputPath: string;
  rspFileSyntax: RspFileSyntax;
};
