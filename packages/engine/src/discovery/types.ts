/**
 * Shared types for subdomain sources.
 */

import type { ScanConfiguration, SubdomainSourceId } from "../schemas.js";
import type { HttpClient } from "../net/session.js";

/** Context handed to every source. */
export interface SourceContext {
  domain: string;
  config: ScanConfiguration;
  http: HttpClient;
  /** Waits `perRequestDelayMs` before a network call; no-op when zero. */
  pace(signal?: AbortSignal): Promise<void>;
  signal?: AbortSignal;
}

/** Interface that every subdomain source must implement. */
export interface SubdomainSource {
  id: SubdomainSourceId;
  /** Produce candidate hostnames. Must not throw for recoverable failures. */
  collect(ctx: SourceContext): Promise<string[]>;
}
