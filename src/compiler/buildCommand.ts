import type { ToolchainAdapter } from './adapter.js';
import type { CompileCommand, CompileRequest } from './compileTypes.js';

export function buildCompileCommand(
  adapter: ToolchainAdapter,
  request: CompileRequest,
): CompileCommand {
  if (request.sources.length === 0) {
    throw new Error(`No sources given for ${request.outputPath}`);
  }

  const flags: string[] = [...adapter.alwaysArgs()];
  if (request.buildType) flags.push(...adapter.buildTypeArgs(request.buildType));
  if (request.optimization) flags.push(...adapter.optimizationArgs(request.optimization));
  if (request.debug !== undefined) flags.push(...adapter.debugArgs(request.debug));
  if (request.werror) flags.push(...adapter.werrorArgs());

  flags.push(...adapter.outputArgs(request.outputPath));
  flags.push(`-target:${request.target ?? 'exe'}`);
  for (const ref of request.references ?? []) flags.push(...adapter.linkArgs(ref));

  const extra = request.extraArgs ?? [];
  flags.push(
    ...(request.buildDir ? adapter.normalizeSearchPathArgs(extra, request.buildDir) : extra),
  );

  return {
    argv: [...adapter.invocation, ...flags, ...request.sources],
    outputPath: request.outputPath,
    rspFileSyntax: adapter.rspFileSyntax(),
  };
}
