import dns from "node:dns/promises";
import { withTimeout } from "../net/timeout.js";
import { errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { ProbeContext } from "./types.js";

/** Resolves a hostname to one IP address. Rejects when there is none. */
export type HostResolver = (hostname: string, signal: AbortSignal) => Promise<string>;

/** DNS gets a shorter leash than the other probes. */
export const DNS_TIMEOUT_CAP_MS = 5_000;

/** System resolver; IPv4 answers are preferred over IPv6. */
export const systemResolver: HostResolver = async (hostname) => {
  const addrs = await dns.lookup(hostname, { all: true });
  const sorted = [
    ...addrs.filter((a) => a.family === 4),
    ...addrs.filter((a) => a.family === 6),
  ];
  const first = sorted[0];
  if (!first) throw new Error(`no A/AAAA records for ${hostname}`);
  return first.address;
};

/** Resolve `hostname`, or return null on any failure or timeout. */
export async function resolveHost(hostname: string, ctx: ProbeContext): Promise<string | null> {
  const ms = Math.min(DNS_TIMEOUT_CAP_MS, ctx.config.timeoutMs);
  try {
    await ctx.pace(ctx.signal);
    return await withTimeout(`dns ${hostname}`, ms, (s) => ctx.resolver(hostname, s), ctx.signal);
  } catch (err) {
    if (ctx.signal?.aborted) throw err;
    logger.debug(`[dns] ${hostname}: ${errorMessage(err)}`);
    return null;
  }
}
