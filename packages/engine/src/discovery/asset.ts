import { createHash } from "node:crypto";
import type { Asset, CriticalityRules } from "../schemas.js";
import { classifyCriticality } from "./criticality.js";

export function assetIdFor(hostname: string): string {
  return createHash("sha256").update(hostname).digest("hex").slice(0, 12);
}

export function createAsset(hostname: string, rules: CriticalityRules, domain?: string): Asset {
  return {
    hostname,
    assetId: assetIdFor(hostname),
    criticality: classifyCriticality(hostname, rules, domain),
  };
}
