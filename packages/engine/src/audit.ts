/**
 * Audit orchestrator, the single entry point for a scan.
 *
 * Pipeline:
 *   1. Validate domain and configuration (synchronous, before any I/O)
 *   2. Open the per-scan HTTP session
 *   3. Discover candidate hostnames
 *   4. Fan out over a fixed-size worker pool: probe → assess → recommend → score
 *   5. Close the session (always), sort and return the reports
 *
 * Cancelling through `signal` stops new assets from starting and tears down
 * in-flight probes; only fully scored assets are returned.
 */

import {
  ScanConfigurationSchema,
  type AssetReport,
  type ScanConfiguration,
  type SubdomainSourceId,
} from "./schemas.js";
import { validateDomain } from "./config.js";
import { ConfigurationError, AuditAbortedError, errorMessage } from "./errors.js";
import { ScanSession, withScanSession, type HttpClient } from "./net/session.js";
import { sleep, withTimeout } from "./net/timeout.js";
import { HostLimiter } from "./net/host-limiter.js";
import { discover } from "./discovery/discover.js";
import { createAsset } from "./discovery/asset.js";
import type { SubdomainSource } from "./discovery/types.js";
import { DNS_TIMEOUT_CAP_MS, systemResolver, type HostResolver } from "./probe/dns.js";
import { DEFAULT_GEO_PROVIDERS, type GeoProvider } from "./probe/geo.js";
import { nodeTlsConnector, type TlsConnector } from "./probe/tls.js";
import { probe, sentinelProbe, type ProbeResult } from "./probe/prober.js";
import type { ProbeContext } from "./probe/types.js";
import { assessAssumed } from "./quantum/assessor.js";
import { score } from "./scoring.js";
import { runPool } from "./pool.js";
import { logger } from "./logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RunAuditOptions {
  /** Cancels the scan cooperatively. */
  signal?: AbortSignal;
  /** Opens the per-scan HTTP client. Defaults to a ScanSession. */
  openSession?: (config: ScanConfiguration) => HttpClient;
  resolver?: HostResolver;
  geoProviders?: readonly GeoProvider[];
  tlsConnector?: TlsConnector;
  sources?: Partial<Record<SubdomainSourceId, SubdomainSource>>;
  /** Clock for the assessment year and report timestamps. */
  now?: () => Date;
}

/** Slack on top of the summed probe timeouts before an asset is cut off. */
export const ASSET_GRACE_MS = 250;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Worst-case wall time for one asset: DNS, then geolocation chain and TLS
 * in parallel, each call preceded by the pacing delay.
 */
export function assetBudgetMs(config: ScanConfiguration, geoProviderCount: number): number {
  const call = config.timeoutMs + config.perRequestDelayMs;
  const dns = Math.min(DNS_TIMEOUT_CAP_MS, config.timeoutMs) + config.perRequestDelayMs;
  const geo = config.enableGeo ? geoProviderCount * call : 0;
  const tls = config.enableTlsCheck ? call : 0;
  return dns + Math.max(geo, tls) + ASSET_GRACE_MS;
}

function compareHostnames(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function sortReports(reports: AssetReport[]): AssetReport[] {
  return [...reports].sort(
    (a, b) => b.riskScore - a.riskScore || compareHostnames(a.asset.hostname, b.asset.hostname),
  );
}

function openDefaultSession(config: ScanConfiguration): HttpClient {
  return new ScanSession({ maxConnectionsPerHost: config.maxConnectionsPerHost });
}

async function analyzeAsset(
  hostname: string,
  domain: string,
  ctx: ProbeContext,
  budgetMs: number,
  at: Date,
): Promise<AssetReport> {
  const { config } = ctx;
  const asset = createAsset(hostname, config.criticality, domain);

  let probed: ProbeResult;
  try {
    probed = await withTimeout(
      `asset ${hostname}`,
      budgetMs,
      (signal) => probe(hostname, { ...ctx, signal }),
      ctx.signal,
    );
  } catch (err) {
    if (ctx.signal?.aborted) throw err;
    logger.debug(`[audit] ${hostname}: ${errorMessage(err)}; using sentinel records`);
    probed = sentinelProbe(ctx);
  }

  // Drop assets that finished probing after cancellation.
  if (ctx.signal?.aborted) throw new AuditAbortedError();

  const quantum = assessAssumed(at.getUTCFullYear(), config.quantum);
  return score(asset, probed.geo, probed.tls, quantum, config, at);
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Audit `domain` under `config`.
 *
 * Throws ConfigurationError synchronously for an invalid domain or
 * configuration. Otherwise the returned promise always resolves: individual
 * asset failures become sentinel data, and cancellation yields the reports
 * completed so far.
 */
export function runAudit(
  domain: string,
  config: ScanConfiguration,
  options: RunAuditOptions = {},
): Promise<AssetReport[]> {
  const root = validateDomain(domain);

  const checked = ScanConfigurationSchema.safeParse(config);
  if (!checked.success) {
    const issue = checked.error.issues[0];
    const field = issue ? issue.path.join(".") : "config";
    throw new ConfigurationError(field, `invalid configuration — ${field}: ${issue?.message ?? "invalid"}`);
  }

  return executeAudit(root, config, options);
}

async function executeAudit(
  domain: string,
  config: ScanConfiguration,
  options: RunAuditOptions,
): Promise<AssetReport[]> {
  const { signal } = options;
  const now = options.now ?? (() => new Date());
  const geoProviders = options.geoProviders ?? DEFAULT_GEO_PROVIDERS;
  const started = Date.now();

  logger.info(`[audit] ${config.mode} scan of ${domain} (max ${config.maxAssets} assets, concurrency ${config.concurrency})`);

  return withScanSession(
    () => (options.openSession ?? openDefaultSession)(config),
    async (http) => {
      let hosts: string[];
      try {
        hosts = await discover(domain, config, { http, signal, sources: options.sources });
      } catch (err) {
        if (signal?.aborted) {
          logger.warn("[audit] aborted during discovery");
          return [];
        }
        throw err;
      }

      const ctx: ProbeContext = {
        config,
        http,
        resolver: options.resolver ?? systemResolver,
        geoProviders,
        tlsConnector: options.tlsConnector ?? nodeTlsConnector,
        hostSlots: new HostLimiter(config.maxConnectionsPerHost),
        pace: (s) => sleep(config.perRequestDelayMs, s),
        signal,
      };
      const budget = assetBudgetMs(config, geoProviders.length);

      const outcomes = await runPool(
        hosts,
        (host) => analyzeAsset(host, domain, ctx, budget, now()),
        { concurrency: config.concurrency, signal },
      );

      const reports: AssetReport[] = [];
      outcomes.forEach((outcome, i) => {
        if (outcome.status === "fulfilled") {
          reports.push(outcome.value);
        } else if (outcome.status === "rejected" && !signal?.aborted) {
          logger.error(`[audit] ${hosts[i]} failed: ${errorMessage(outcome.reason)}`);
        }
      });

      if (signal?.aborted) {
        logger.warn(`[audit] aborted — returning ${reports.length} of ${hosts.length} assets`);
      } else {
        logger.info(`[audit] ${reports.length} assets scored in ${Date.now() - started}ms`);
      }

      return sortReports(reports);
    },
  );
}
