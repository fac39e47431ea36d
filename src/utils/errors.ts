/** Unrecoverable configuration problem. The only error class that is allowed to stop the process. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** A strategy's lookback window cannot be covered by the available history. */
export class InsufficientHistoryError extends Error {
  constructor(
    readonly strategyId: string,
    readonly required: number,
    readonly available: number,
  ) {
    super(`Strategy ${strategyId} needs ${required} samples, only ${available} available`);
    this.name = 'InsufficientHistoryError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
