export type LkErrorKind = 'configuration' | 'wrapper-io' | 'spawn';

export abstract class LkError extends Error {
  abstract readonly kind: LkErrorKind;

  constructor(
    message: string,
    /** What was being attempted when the error occurred */
    public readonly operation: string,
    public readonly path?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A configured root is missing or not a directory, or the config file is invalid */
export class ConfigurationError extends LkError {
  readonly kind = 'configuration' as const;
}

/** The wrapper script could not be written or made executable */
export class WrapperIOError extends LkError {
  readonly kind = 'wrapper-io' as const;
}

/** The interpreter could not be started */
export class SpawnError extends LkError {
  readonly kind = 'spawn' as const;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
