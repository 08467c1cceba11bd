import { accessSync, constants } from 'node:fs';
import { join } from 'node:path';

export type WhichEnv = Record<string, string | undefined>;

/** Resolve `cmd` on PATH. On Windows each PATHEXT extension is tried too. */
export function which(
  cmd: string,
  env: WhichEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): string | null {
  const delimiter = platform === 'win32' ? ';' : ':';
  const dirs = (env.PATH ?? env.Path ?? '').split(delimiter).filter(Boolean);
  const exts =
    platform === 'win32'
      ? ['', ...(env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';').filter(Boolean)]
      : [''];

  for (const dir of dirs) {
    for (const ext of exts) {
      const full = join(dir, cmd + ext);
      try {
        accessSync(full, platform === 'win32' ? constants.F_OK : constants.X_OK);
        return full;
      } catch {
        continue;
      }
    }
  }
  return null;
}
