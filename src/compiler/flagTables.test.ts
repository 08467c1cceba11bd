import { describe, it, expect } from 'vitest';

import type { OptimizationLevel } from './compilerTypes.js';
import { UnknownFlagKeyError } from './errors.js';
import {
  BUILD_TYPES,
  buildTypeArgs,
  isBuildType,
  isOptimizationLevel,
  optimizationArgs,
} from './flagTables.js';

describe('flag tables', () => {
  it('leaves 0 and g unoptimized', () => {
    expect(optimizationArgs('0')).toEqual([]);
    expect(optimizationArgs('g')).toEqual([]);
  });

  it('maps 1, 2, 3 and s to the same single flag', () => {
    const levels: OptimizationLevel[] = ['1', '2', '3', 's'];
    for (const level of levels) {
      expect(optimizationArgs(level)).toEqual(['-optimize+']);
    }
  });

  it('renders build types', () => {
    expect(buildTypeArgs('plain')).toEqual([]);
    expect(buildTypeArgs('debug')).toEqual(['-debug']);
    expect(buildTypeArgs('debugoptimized')).toEqual(['-debug', '-optimize+']);
    expect(buildTypeArgs('release')).toEqual(['-optimize+']);
    expect(buildTypeArgs('minsize')).toEqual([]);
    expect(buildTypeArgs('custom')).toEqual([]);
  });

  it('returns a fresh array each call', () => {
    const a = buildTypeArgs('debug');
    a.push('-mutated');
    expect(buildTypeArgs('debug')).toEqual(['-debug']);
  });

  it('throws on unknown keys', () => {
    // Untyped input, as it would arrive from a JS caller.
    const raw = JSON.parse('{"level": "4", "buildType": "fastest"}');
    expect(() => optimizationArgs(raw.level)).toThrow(UnknownFlagKeyError);
    expect(() => buildTypeArgs(raw.buildType)).toThrow('Unknown build type key: "fastest"');
  });

  it('rejects inherited object keys', () => {
    expect(isBuildType('toString')).toBe(false);
    expect(isOptimizationLevel('constructor')).toBe(false);
    expect(BUILD_TYPES.every(isBuildType)).toBe(true);
  });
});
