/**
 * Resolver/prober: DNS, then geolocation and TLS for one asset.
 *
 * An unresolved host short-circuits to sentinel records; no further
 * probes are attempted against it.
 */

import type { GeoRecord, TLSRecord } from "../schemas.js";
import { resolveHost } from "./dns.js";
import { lookupGeo, sentinelGeo } from "./geo.js";
import { invalidTls, probeTls, uncheckedTls } from "./tls.js";
import type { ProbeContext } from "./types.js";

export interface ProbeResult {
  geo: GeoRecord;
  tls: TLSRecord;
}

/** Sentinel pair used when a host does not resolve or its budget runs out. */
export function sentinelProbe(ctx: Pick<ProbeContext, "config">, ip?: string): ProbeResult {
  return {
    geo: sentinelGeo(ip),
    tls: ctx.config.enableTlsCheck ? invalidTls() : uncheckedTls(),
  };
}

export async function probe(hostname: string, ctx: ProbeContext): Promise<ProbeResult> {
  const ip = await resolveHost(hostname, ctx);
  if (ip === null) return sentinelProbe(ctx);

  const [geo, tls] = await Promise.all([
    ctx.config.enableGeo ? lookupGeo(ip, ctx) : Promise.resolve(sentinelGeo(ip)),
    probeTls(hostname, ip, ctx),
  ]);
  return { geo, tls };
}
