import { describe, it, expect } from 'vitest';
import { chmodSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { which } from './which.js';

function binDir(file: string, mode = 0o755): string {
  const dir = mkdtempSync(join(tmpdir(), 'cs-toolchain-which-'));
  writeFileSync(join(dir, file), '');
  chmodSync(join(dir, file), mode);
  return dir;
}

describe('which', () => {
  it('finds an executable on PATH', () => {
    const dir = binDir('mcs');
    expect(which('mcs', { PATH: `/nonexistent:${dir}` }, 'linux')).toBe(join(dir, 'mcs'));
  });

  it('returns null when missing', () => {
    expect(which('mcs', { PATH: binDir('csc') }, 'linux')).toBeNull();
    expect(which('mcs', {}, 'linux')).toBeNull();
  });

  it('tries PATHEXT on Windows', () => {
    const dir = binDir('csc.EXE', 0o644);
    expect(which('csc', { PATH: dir, PATHEXT: '.COM;.EXE' }, 'win32')).toBe(join(dir, 'csc.EXE'));
  });
});
