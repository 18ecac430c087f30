export class BackendError extends Error {
  readonly transient: boolean;
  readonly status?: number;

  constructor(message: string, options: { transient: boolean; status?: number; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = "BackendError";
    this.transient = options.transient;
    if (options.status !== undefined) {
      this.status = options.status;
    }
  }
}

export class BackendTimeoutError extends BackendError {
  constructor(readonly timeoutMs: number) {
    super(`Backend request timed out after ${timeoutMs}ms`, { transient: true });
    this.name = "BackendTimeoutError";
  }
}

export class BackendUnavailableError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    super(`Backend unavailable after ${attempts} attempt(s): ${describeError(lastError)}`, {
      cause: lastError,
    });
    this.name = "BackendUnavailableError";
  }
}

export class GatewayAbortedError extends Error {
  constructor() {
    super("Backend request aborted");
    this.name = "GatewayAbortedError";
  }
}

export class GatewayBusyError extends Error {
  constructor() {
    super("A backend request is already in flight");
    this.name = "GatewayBusyError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
