import type { ZodIssue } from "zod";

function describe(issues: readonly ZodIssue[]): string {
  return issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ");
}

/** Non-2xx response, after retries where the status allowed them. */
export class ApiRequestError extends Error {
  constructor(
    readonly method: string,
    readonly url: string,
    readonly status: number,
    readonly body?: string,
  ) {
    super(`${method} ${url} -> ${status}`);
    this.name = "ApiRequestError";
  }

  get retryable(): boolean {
    return this.status === 429 || this.status >= 500;
  }
}

/** Query parameters an endpoint accessor refused to send. */
export class ParameterError extends Error {
  constructor(
    readonly resource: string,
    readonly issues: readonly ZodIssue[],
  ) {
    super(`${resource}: ${describe(issues)}`);
    this.name = "ParameterError";
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: readonly ZodIssue[]) {
    super(`Invalid environment: ${describe(issues)}`);
    this.name = "ConfigError";
  }
}
