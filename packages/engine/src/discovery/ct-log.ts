/**
 * Certificate-transparency source (crt.sh).
 *
 * One query for `%.<domain>`; the first MAX_CT_ENTRIES entries are parsed.
 * The payload is untrusted: malformed entries are skipped and any failure
 * degrades to an empty list.
 */

import { CtLogEntrySchema } from "../schemas.js";
import { withTimeout } from "../net/timeout.js";
import { errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { SubdomainSource } from "./types.js";

export const CT_LOG_ENDPOINT = "https://crt.sh/";
export const MAX_CT_ENTRIES = 100;

export function ctLogUrl(domain: string): string {
  return `${CT_LOG_ENDPOINT}?q=${encodeURIComponent(`%.${domain}`)}&output=json`;
}

/** True for the domain itself or any name below it. */
export function belongsToDomain(name: string, domain: string): boolean {
  return name === domain || name.endsWith(`.${domain}`);
}

/**
 * Extract hostnames from a crt.sh JSON body. Each `name_value` may hold
 * several newline-separated names, some of them wildcards.
 */
export function parseCtLogEntries(body: unknown, domain: string, limit = MAX_CT_ENTRIES): string[] {
  if (!Array.isArray(body)) return [];

  const root = domain.toLowerCase();
  const names = new Set<string>();

  for (const raw of body.slice(0, limit)) {
    const entry = CtLogEntrySchema.safeParse(raw);
    if (!entry.success) continue;

    for (const part of entry.data.name_value.split(/[\n,]/)) {
      const name = part.trim().toLowerCase().replace(/^\*\./, "");
      if (name && !name.includes("*") && !name.includes(" ") && belongsToDomain(name, root)) {
        names.add(name);
      }
    }
  }

  return [...names];
}

export const ctLogSource: SubdomainSource = {
  id: "ct-log",
  async collect({ domain, config, http, pace, signal }) {
    try {
      await pace(signal);
      const res = await withTimeout(
        "ct-log query",
        config.timeoutMs,
        (s) => http.getJson(ctLogUrl(domain), { signal: s }),
        signal,
      );
      if (res.status !== 200) {
        logger.warn(`[discovery] crt.sh returned HTTP ${res.status}; continuing without CT results`);
        return [];
      }
      const names = parseCtLogEntries(res.body, domain);
      logger.debug(`[discovery] crt.sh yielded ${names.length} names`);
      return names;
    } catch (err) {
      if (signal?.aborted) throw err;
      logger.warn(`[discovery] crt.sh lookup failed: ${errorMessage(err)}`);
      return [];
    }
  },
};
