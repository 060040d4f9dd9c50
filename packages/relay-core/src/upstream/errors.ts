export class UpstreamNotConfiguredError extends Error {
  readonly kind = 'NotConfigured' as const;

  constructor(message = 'Upstream address is not configured') {
    super(message);
    this.name = 'UpstreamNotConfiguredError';
  }
}

export class UpstreamUnreachableError extends Error {
  readonly kind = 'Unreachable' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UpstreamUnreachableError';
  }
}

export class UpstreamTimeoutError extends Error {
  readonly kind = 'Timeout' as const;

  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Upstream did not respond within ${timeoutMs}ms`);
    this.name = 'UpstreamTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class UpstreamResponseError extends Error {
  readonly kind = 'UpstreamError' as const;

  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'UpstreamResponseError';
    this.status = status;
  }
}

export type RelayError =
  | UpstreamNotConfiguredError
  | UpstreamUnreachableError
  | UpstreamTimeoutError
  | UpstreamResponseError;

export type RelayErrorKind = RelayError['kind'];

export function isRelayError(error: unknown): error is RelayError {
  return (
    error instanceof UpstreamNotConfiguredError ||
    error instanceof UpstreamUnreachableError ||
    error instanceof UpstreamTimeoutError ||
    error instanceof UpstreamResponseError
  );
}
