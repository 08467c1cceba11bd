import { describe, it, expect } from 'vitest';

import { getFlagValues, parseArgsCommand, positionals } from './cliArgs.js';

describe('cli args', () => {
  it('separates sources from flags', () => {
    expect(positionals(['A.cs', '--out', 'x.exe', '--debug', 'B.cs', '--ref', 'L.dll'])).toEqual(['A.cs', 'B.cs']);
    expect(getFlagValues(['--ref', 'a.dll', '--ref', 'b.dll', '--ref'], '--ref')).toEqual(['a.dll', 'b.dll']);
  });

  it('builds a compile request', () => {
    const req = parseArgsCommand(
      ['Main.cs', '--out', 'bin/app.exe', '--buildtype', 'release', '--ref', 'A.dll', '--ref', 'B.dll', '--werror'],
      null,
    );
    expect(req).toEqual({
      sources: ['Main.cs'],
      outputPath: 'bin/app.exe',
      target: 'exe',
      buildType: 'release',
      optimization: undefined,
      debug: undefined,
      werror: true,
      references: ['A.dll', 'B.dll'],
      buildDir: undefined,
    });
  });

  it('derives the output name from the first source and target', () => {
    const req = parseArgsCommand(['Lib.cs', '--target', 'library'], null);
    expect(typeof req === 'string' ? req : req.outputPath).toBe('Lib.dll');
  });

  it('falls back to config values', () => {
    const req = parseArgsCommand(['a.cs', '--debug'], { buildType: 'minsize', werror: true, debug: false });
    expect(req).toMatchObject({ buildType: 'minsize', werror: true, debug: true, outputPath: 'a.exe' });
  });

  it('reports invalid input', () => {
    expect(parseArgsCommand([], null)).toBe('Missing source files');
    expect(parseArgsCommand(['a.cs', '--optimization', '4'], null)).toBe('Invalid --optimization: 4');
    expect(parseArgsCommand(['a.cs', '--buildtype', 'fast'], null)).toBe('Invalid --buildtype: fast');
    expect(parseArgsCommand(['a.cs', '--target', 'dll'], null)).toBe('Invalid --target: dll');
  });
});
