/**
 * Fatal configuration problems, raised before any network activity.
 * Everything recoverable (DNS misses, timeouts, bad payloads) is turned into
 * sentinel data by the probes instead.
 */
export class ConfigurationError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = "ConfigurationError";
    this.field = field;
  }
}

/** Raised inside a per-asset pipeline when the scan has been cancelled. */
export class AuditAbortedError extends Error {
  constructor(message = "audit aborted") {
    super(message);
    this.name = "AuditAbortedError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
