import { writeFileSync } from 'node:fs';
import { join } from 'node:path';

import type { ToolchainAdapter } from './adapter.js';
import type { ProcessRunner } from './compilerTypes.js';
import { ToolchainUnusableError } from './errors.js';

export const SANITY_SOURCE = 'sanity.cs';
export const SANITY_OUTPUT = 'sanity.exe';

const program = `public class Sanity {
    static public void Main () {
    }
}
`;

/**
 * Compiles a trivial program inside `workDir` and, unless the variant opts
 * out, runs it. The source file is left behind.
 *
 * Not safe to run twice concurrently in the same `workDir`.
 */
export function sanityCheck(
  adapter: ToolchainAdapter,
  workDir: string,
  runner: ProcessRunner,
): void {
  writeFileSync(join(workDir, SANITY_SOURCE), program, 'utf8');

  const compiled = runner.run(
    [...adapter.invocation, ...adapter.alwaysArgs(), SANITY_SOURCE],
    { cwd: workDir },
  );
  if (compiled.exitCode !== 0) {
    throw new ToolchainUnusableError(
      `C# compiler ${adapter.nameString()} cannot compile programs`,
      'compile',
      compiled,
    );
  }

  if (!adapter.executesSanityProgram) return;

  const argv = adapter.runner
    ? [adapter.runner, SANITY_OUTPUT]
    : [join(workDir, SANITY_OUTPUT)];
  const executed = runner.run(argv, { cwd: workDir });
  if (executed.exitCode !== 0) {
    throw new ToolchainUnusableError(
      `Executables created by C# compiler ${adapter.nameString()} are not runnable`,
      'execute',
      executed,
    );
  }
}
