import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { __resetConfigCacheForTests, CONFIG_FILE, ConfigError, loadOptionalConfig } from './config.js';

function projectWith(contents?: string): string {
  const dir = mkdtempSync(join(tmpdir(), 'cs-toolchain-cfg-'));
  if (contents !== undefined) writeFileSync(join(dir, CONFIG_FILE), contents, 'utf8');
  return dir;
}

describe('config loader', () => {
  afterEach(() => {
    __resetConfigCacheForTests();
  });

  it('returns null when config file is missing', async () => {
    const cfg = await loadOptionalConfig(projectWith());
    expect(cfg).toBe(null);
  });

  it('loads and fills defaults', async () => {
    const cfg = await loadOptionalConfig(
      projectWith(JSON.stringify({ sdkVersion: '6.0.400', buildType: 'release', optimization: 's' })),
    );
    expect(cfg).toEqual({
      sdkVersion: '6.0.400',
      buildType: 'release',
      optimization: 's',
      werror: false,
      debug: false,
    });
  });

  it('reads at most once per process', async () => {
    const first = await loadOptionalConfig(projectWith(JSON.stringify({ werror: true })));
    const second = await loadOptionalConfig(projectWith());
    expect(second).toBe(first);
    expect(second?.werror).toBe(true);
  });

  it('rejects an unknown build type', async () => {
    await expect(loadOptionalConfig(projectWith('{"buildType": "fastest"}'))).rejects.toThrow(ConfigError);
  });

  it('rejects unknown keys', async () => {
    await expect(loadOptionalConfig(projectWith('{"compilr": "csc"}'))).rejects.toThrow(/compilr/);
  });

  it('rejects malformed JSON', async () => {
    await expect(loadOptionalConfig(projectWith('{ nope'))).rejects.toBeInstanceOf(ConfigError);
  });
});
