/**
 * Hostname-based criticality heuristic.
 *
 * A declarative table of keyword sets, checked in order. The first tier with
 * a matching keyword wins; hosts matching nothing are HIGH. Keywords are
 * compared against hostname tokens (labels split on "." "-" "_", trailing
 * digits dropped), so "api2.example.com" is an api host but "rapid" is not.
 */

import type { Criticality, CriticalityRules } from "../schemas.js";

export const DEFAULT_CRITICALITY_RULES: CriticalityRules = {
  critical: ["vault", "api", "pqc", "secure", "admin", "gateway", "quantum", "keys", "auth", "iam"],
  moderate: ["dev", "test", "staging"],
};

const DEFAULT_TIER: Criticality = "HIGH";

function hostTokens(hostname: string, domain?: string): string[] {
  let host = hostname.toLowerCase();
  const root = domain?.toLowerCase();
  // The registered domain's own labels say nothing about the asset.
  if (root && host === root) return [];
  if (root && host.endsWith(`.${root}`)) host = host.slice(0, -(root.length + 1));

  return host
    .split(/[.\-_]/)
    .map((t) => t.replace(/\d+$/, ""))
    .filter((t) => t.length > 0);
}

export function classifyCriticality(
  hostname: string,
  rules: CriticalityRules = DEFAULT_CRITICALITY_RULES,
  domain?: string,
): Criticality {
  const tokens = new Set(hostTokens(hostname, domain));
  const tiers: Array<[Criticality, string[]]> = [
    ["CRITICAL", rules.critical],
    ["MODERATE", rules.moderate],
  ];

  for (const [tier, keywords] of tiers) {
    if (keywords.some((k) => tokens.has(k.toLowerCase()))) return tier;
  }
  return DEFAULT_TIER;
}
