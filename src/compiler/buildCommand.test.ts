import { describe, it, expect } from 'vitest';

import { createCscAdapter, createMonoAdapter } from './adapter.js';
import { buildCompileCommand } from './buildCommand.js';
import { detectMachine } from './detectPlatform.js';

const linux = detectMachine('linux');

describe('buildCompileCommand', () => {
  it('renders a full csc command line', () => {
    const adapter = createCscAdapter({
      invocation: ['/usr/bin/csc'],
      version: '4.8',
      forMachine: 'host',
      machine: linux,
    });

    const cmd = buildCompileCommand(adapter, {
      sources: ['Main.cs', 'Util.cs'],
      outputPath: 'out/app.exe',
      buildType: 'debugoptimized',
      werror: true,
      references: ['Lib.dll'],
      extraArgs: ['-Llibs', '/unsafe'],
      buildDir: '/b',
    });

    expect(cmd).toEqual({
      argv: [
        '/usr/bin/csc',
        '/nologo',
        '-debug:portable',
        '-optimize+',
        '-warnaserror',
        '-out:out/app.exe',
        '-target:exe',
        '-r:Lib.dll',
        '-L/b/libs',
        '/unsafe',
        'Main.cs',
        'Util.cs',
      ],
      outputPath: 'out/app.exe',
      rspFileSyntax: 'msvc',
    });
  });

  it('renders a mono library build', () => {
    const adapter = createMonoAdapter({
      invocation: ['/usr/bin/mcs'],
      version: '6.12',
      forMachine: 'host',
      machine: linux,
    });

    const cmd = buildCompileCommand(adapter, {
      sources: ['a.cs'],
      outputPath: 'a.dll',
      target: 'library',
      optimization: '2',
      debug: false,
      extraArgs: ['-Lrel'],
    });

    // Without a build dir extra args pass through untouched.
    expect(cmd.argv).toEqual(['/usr/bin/mcs', '/nologo', '-optimize+', '-out:a.dll', '-target:library', '-Lrel', 'a.cs']);
    expect(cmd.rspFileSyntax).toBe('gcc');
  });

  it('requires at least one source', () => {
    const adapter = createMonoAdapter({ invocation: ['mcs'], version: '6', forMachine: 'host', machine: linux });
    expect(() => buildCompileCommand(adapter, { sources: [], outputPath: 'x.exe' })).toThrow(
      'No sources given for x.exe',
    );
  });
});
