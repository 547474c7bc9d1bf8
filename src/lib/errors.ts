/**
 * Error types surfaced to the process boundary.
 */

/** Thrown when an HTTP collaborator answers with anything but success. */
export class HttpResponseError extends Error {
  readonly status: number;
  readonly statusText: string;
  readonly bodyText: string;

  constructor(target: string, status: number, statusText: string, bodyText: string) {
    super(`${target} failed (${status}): ${bodyText}`);
    this.name = 'HttpResponseError';
    this.status = status;
    this.statusText = statusText;
    this.bodyText = bodyText;
  }
}

/** Missing secrets or a config file that does not validate. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
