export type UnusableReason = 'compile' | 'execute' | 'discovery';

export class ToolchainUnusableError extends Error {
  override readonly name = 'ToolchainUnusableError';
  readonly reason: UnusableReason;
  readonly stdout?: string;
  readonly stderr?: string;

  constructor(
    message: string,
    reason: UnusableReason,
    output?: { stdout?: string; stderr?: string },
  ) {
    super(message);
    this.reason = reason;
    this.stdout = output?.stdout;
    this.stderr = output?.stderr;
  }
}

/** Unknown optimization level or build type: a caller bug, never recovered. */
export class UnknownFlagKeyError extends Error {
  override readonly name = 'UnknownFlagKeyError';

  constructor(table: string, key: string) {
    super(`Unknown ${table} key: ${JSON.stringify(key)}`);
  }
}
