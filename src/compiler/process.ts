import { spawnSync } from 'node:child_process';

import type { ProcessRunner } from './compilerTypes.js';

/**
 * Blocking spawn without a shell. A process that could not be started at all
 * reports exit code 127 with the OS error in `stderr`.
 */
export const spawnRunner: ProcessRunner = {
  run(argv, opts) {
    const [exe, ...args] = argv;
    if (!exe) throw new Error('Cannot run an empty command line');

    const res = spawnSync(exe, args, {
      cwd: opts?.cwd,
      encoding: 'utf8',
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    });

    if (res.error) {
      return { exitCode: 127, stdout: res.stdout ?? '', stderr: res.error.message };
    }
    return {
      // Killed by a signal.
      exitCode: res.status ?? 1,
      stdout: res.stdout,
      stderr: res.stderr,
    };
  },
};

