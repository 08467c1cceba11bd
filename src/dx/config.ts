import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';

import { BUILD_TYPES, OPTIMIZATION_LEVELS } from '../compiler/flagTables.js';
import { logDebug, setDebugEnabled } from './logger.js';

export const CONFIG_FILE = 'cs-toolchain.config.json';

export const ToolchainConfigSchema = z
  .object({
    /** Compiler path or name, tried before PATH detection. */
    compiler: z.string().min(1).optional(),
    /** Exact .NET SDK version for the `dotnet` variant. */
    sdkVersion: z.string().min(1).optional(),
    buildType: z.enum(BUILD_TYPES).default('debug'),
    optimization: z.enum(OPTIMIZATION_LEVELS).optional(),
    werror: z.boolean().default(false),
    /** Directory used by `doctor` for the sanity check. */
    workDir: z.string().min(1).optional(),
    /** Enable debug logs without env var */
    debug: z.boolean().default(false),
  })
  .strict();
export type ToolchainConfig = z.infer<typeof ToolchainConfigSchema>;

export class ConfigError extends Error {
  override readonly name = 'ConfigError';
}

let cached:
  | { loaded: true; config: ToolchainConfig | null }
  | { loaded: false } = { loaded: false };

/**
 * Loads optional `cs-toolchain.config.json` from the project root.
 *
 * - Optional: if missing, returns null
 * - Cached: reads at most once per process
 */
export async function loadOptionalConfig(
  projectRoot: string = process.cwd(),
): Promise<ToolchainConfig | null> {
  if (cached.loaded) return cached.config;

  const p = join(projectRoot, CONFIG_FILE);
  if (!existsSync(p)) {
    cached = { loaded: true, config: null };
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(p, 'utf8'));
  } catch (err) {
    throw new ConfigError(`${p}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = ToolchainConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`)
      .join('; ');
    throw new ConfigError(`${p}: ${issues}`);
  }

  if (parsed.data.debug) setDebugEnabled(true);
  cached = { loaded: true, config: parsed.data };
  logDebug('loaded config', { path: p });
  return cached.config;
}

/** For tests only. */
export function __resetConfigCacheForTests() {
  cached = { loaded: false };
}
