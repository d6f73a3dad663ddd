/**
 * Shared types for per-asset network probes.
 */

import type { ScanConfiguration } from "../schemas.js";
import type { HttpClient } from "../net/session.js";
import type { HostLimiter } from "../net/host-limiter.js";
import type { HostResolver } from "./dns.js";
import type { GeoProvider } from "./geo.js";
import type { TlsConnector } from "./tls.js";

/** Everything a probe may touch. Nothing in here is mutated by a probe. */
export interface ProbeContext {
  config: ScanConfiguration;
  http: HttpClient;
  resolver: HostResolver;
  geoProviders: readonly GeoProvider[];
  tlsConnector: TlsConnector;
  /** Per-IP slots shared by every direct connection to the scanned hosts. */
  hostSlots: HostLimiter;
  /** Waits `perRequestDelayMs` before each network call. */
  pace(signal?: AbortSignal): Promise<void>;
  signal?: AbortSignal;
}
