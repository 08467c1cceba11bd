import type { BuildType, OptimizationLevel } from './compilerTypes.js';
import { UnknownFlagKeyError } from './errors.js';

const optimizationTable: Record<OptimizationLevel, readonly string[]> = {
  '0': [],
  g: [],
  '1': ['-optimize+'],
  '2': ['-optimize+'],
  '3': ['-optimize+'],
  s: ['-optimize+'],
};

const buildTypeTable: Record<BuildType, readonly string[]> = {
  plain: [],
  debug: ['-debug'],
  debugoptimized: ['-debug', '-optimize+'],
  release: ['-optimize+'],
  minsize: [],
  custom: [],
};

export const OPTIMIZATION_LEVELS = ['0', 'g', '1', '2', '3', 's'] as const satisfies readonly OptimizationLevel[];
export const BUILD_TYPES = [
  'plain',
  'debug',
  'debugoptimized',
  'release',
  'minsize',
  'custom',
] as const satisfies readonly BuildType[];

function hasKey<K extends string>(
  table: Record<K, readonly string[]>,
  key: string,
): key is K {
  return Object.prototype.hasOwnProperty.call(table, key);
}

function lookup<K extends string>(
  table: Record<K, readonly string[]>,
  name: string,
  key: string,
): string[] {
  if (!hasKey(table, key)) throw new UnknownFlagKeyError(name, key);
  return [...table[key]];
}

export function optimizationArgs(level: OptimizationLevel): string[] {
  return lookup(optimizationTable, 'optimization level', level);
}

export function buildTypeArgs(buildType: BuildType): string[] {
  return lookup(buildTypeTable, 'build type', buildType);
}

export function isOptimizationLevel(v: string): v is OptimizationLevel {
  return hasKey(optimizationTable, v);
}

export function isBuildType(v: string): v is BuildType {
  return hasKey(buildTypeTable, v);
}
