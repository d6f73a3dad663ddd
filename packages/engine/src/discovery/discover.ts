/**
 * Asset source registry.
 *
 * Runs every enabled source, merges their names with the root domain, and
 * returns a sorted, deduplicated list no longer than `config.maxAssets`.
 * The root domain always survives truncation.
 */

import type { ScanConfiguration, SubdomainSourceId } from "../schemas.js";
import type { HttpClient } from "../net/session.js";
import { sleep } from "../net/timeout.js";
import { logger } from "../logger.js";
import { AuditAbortedError, errorMessage } from "../errors.js";
import { ctLogSource } from "./ct-log.js";
import { commonWordlistSource, extendedWordlistSource } from "./wordlist.js";
import type { SourceContext, SubdomainSource } from "./types.js";

/** All registered sources, keyed by id. */
export const DEFAULT_SOURCES: Record<SubdomainSourceId, SubdomainSource> = {
  "ct-log": ctLogSource,
  "wordlist-common": commonWordlistSource,
  "wordlist-extended": extendedWordlistSource,
};

export interface DiscoverOptions {
  http: HttpClient;
  signal?: AbortSignal;
  /** Override source implementations (tests, custom wordlists). */
  sources?: Partial<Record<SubdomainSourceId, SubdomainSource>>;
}

/**
 * Keep the root plus the lexicographically first `maxAssets - 1` other names,
 * then sort the whole selection.
 */
export function selectAssets(names: Iterable<string>, domain: string, maxAssets: number): string[] {
  const others = [...new Set(names)].filter((n) => n !== domain).sort();
  return [domain, ...others.slice(0, Math.max(0, maxAssets - 1))].sort();
}

export async function discover(
  domain: string,
  config: ScanConfiguration,
  options: DiscoverOptions,
): Promise<string[]> {
  const root = domain.toLowerCase();
  const registry = { ...DEFAULT_SOURCES, ...options.sources };

  const ctx: SourceContext = {
    domain: root,
    config,
    http: options.http,
    pace: (signal) => sleep(config.perRequestDelayMs, signal),
    signal: options.signal,
  };

  const found = new Set<string>();
  const ids = config.subdomainSources;
  const settled = await Promise.allSettled(
    ids.map(async (id) => {
      const names = await registry[id].collect(ctx);
      logger.debug(`[discovery] ${id}: ${names.length} candidates`);
      return names;
    }),
  );

  if (options.signal?.aborted) {
    const rejected = settled.find((r) => r.status === "rejected");
    throw rejected?.status === "rejected" ? rejected.reason : new AuditAbortedError();
  }

  const results: string[][] = [];
  settled.forEach((result, i) => {
    if (result.status === "fulfilled") {
      results.push(result.value);
    } else {
      logger.warn(`[discovery] source ${ids[i]} failed: ${errorMessage(result.reason)}; continuing without it`);
    }
  });

  for (const names of results) {
    for (const name of names) {
      const normalized = name.trim().toLowerCase();
      if (normalized) found.add(normalized);
    }
  }

  const selected = selectAssets(found, root, config.maxAssets);
  logger.info(
    `[discovery] ${found.size + (found.has(root) ? 0 : 1)} unique names for ${root}, auditing ${selected.length}`,
  );
  return selected;
}
