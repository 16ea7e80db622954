export class RedfishError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Login was refused, or the service never handed out a session token. */
export class RedfishAuthError extends RedfishError {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.status = status;
  }
}

/** No HTTP response at all, after every retry. */
export class RedfishTransportError extends RedfishError {
  readonly attempts: number;

  constructor(message: string, attempts: number, cause?: unknown) {
    super(message, { cause });
    this.attempts = attempts;
  }
}

export class ConfigError extends RedfishError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
