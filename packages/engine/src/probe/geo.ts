/**
 * IP geolocation with an ordered fallback chain.
 *
 * Providers are tried strictly one after another, each under its own
 * timeout. The first usable answer wins; if none answers, the sentinel
 * record comes back. Nothing here throws for a failed lookup.
 */

import { IpApiPayloadSchema, IpapiCoPayloadSchema, type GeoRecord } from "../schemas.js";
import type { HttpClient } from "../net/session.js";
import { withTimeout } from "../net/timeout.js";
import { errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { ProbeContext } from "./types.js";

export const UNKNOWN = "Unknown";

export interface GeoProvider {
  name: string;
  /**
   * Look up `ip`. Returns null for a well-formed refusal (non-200, "fail"
   * status, schema mismatch); network errors may reject.
   */
  lookup(ip: string, http: HttpClient, signal: AbortSignal): Promise<GeoRecord | null>;
}

export function sentinelGeo(ip = "N/A"): GeoRecord {
  return {
    ip,
    latitude: 0,
    longitude: 0,
    country: UNKNOWN,
    city: UNKNOWN,
    isp: UNKNOWN,
    timezone: UNKNOWN,
    resolved: false,
    provider: null,
  };
}

/** ip-api.com. The free tier is plain HTTP only. */
export const ipApiProvider: GeoProvider = {
  name: "ip-api.com",
  async lookup(ip, http, signal) {
    const res = await http.getJson(`http://ip-api.com/json/${encodeURIComponent(ip)}`, { signal });
    if (res.status !== 200) return null;
    const parsed = IpApiPayloadSchema.safeParse(res.body);
    if (!parsed.success || parsed.data.status !== "success") return null;
    const d = parsed.data;
    return {
      ip,
      latitude: d.lat ?? 0,
      longitude: d.lon ?? 0,
      country: d.country || UNKNOWN,
      city: d.city || UNKNOWN,
      isp: d.isp || UNKNOWN,
      timezone: d.timezone || UNKNOWN,
      resolved: true,
      provider: "ip-api.com",
    };
  },
};

export const ipapiCoProvider: GeoProvider = {
  name: "ipapi.co",
  async lookup(ip, http, signal) {
    const res = await http.getJson(`https://ipapi.co/${encodeURIComponent(ip)}/json/`, { signal });
    if (res.status !== 200) return null;
    const parsed = IpapiCoPayloadSchema.safeParse(res.body);
    if (!parsed.success || parsed.data.error) return null;
    const d = parsed.data;
    return {
      ip,
      latitude: d.latitude ?? 0,
      longitude: d.longitude ?? 0,
      country: d.country_name || UNKNOWN,
      city: d.city || UNKNOWN,
      isp: d.org || UNKNOWN,
      timezone: d.timezone || UNKNOWN,
      resolved: true,
      provider: "ipapi.co",
    };
  },
};

export const DEFAULT_GEO_PROVIDERS: readonly GeoProvider[] = [ipApiProvider, ipapiCoProvider];

export async function lookupGeo(ip: string, ctx: ProbeContext): Promise<GeoRecord> {
  for (const provider of ctx.geoProviders) {
    try {
      await ctx.pace(ctx.signal);
      const record = await withTimeout(
        `geo ${provider.name}`,
        ctx.config.timeoutMs,
        (s) => provider.lookup(ip, ctx.http, s),
        ctx.signal,
      );
      if (record) return record;
      logger.debug(`[geo] ${provider.name} had no answer for ${ip}`);
    } catch (err) {
      if (ctx.signal?.aborted) throw err;
      logger.debug(`[geo] ${provider.name} failed for ${ip}: ${errorMessage(err)}`);
    }
  }
  return sentinelGeo(ip);
}
