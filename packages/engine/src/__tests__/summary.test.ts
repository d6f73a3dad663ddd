import { describe, it, expect } from "vitest";
import { summarizeAudit } from "../summary.js";
import { score } from "../scoring.js";
import { assess } from "../quantum/assessor.js";
import { createAsset } from "../discovery/asset.js";
import { DEFAULT_CRITICALITY_RULES } from "../discovery/criticality.js";
import { sentinelGeo } from "../probe/geo.js";
import { invalidTls } from "../probe/tls.js";
import type { TLSRecord } from "../schemas.js";
import { geoRecord } from "./fixtures/fakes.js";

const FULL = { enableQuantum: true, enableGeo: true };
const AT = new Date("2026-06-01T00:00:00Z");

const safeTls: TLSRecord = {
  checked: true,
  valid: true,
  protocolVersion: "TLSv1.3",
  cipherSuite: "TLS_AES_128_GCM_SHA256",
  keyExchange: "X25519MLKEM768",
  issuer: "Test CA",
  quantumSafe: true,
};

const asset = (host: string) => createAsset(host, DEFAULT_CRITICALITY_RULES, "example.com");

describe("summarizeAudit", () => {
  it("returns zeros for an empty audit", () => {
    expect(summarizeAudit([])).toEqual({
      totalAssets: 0,
      byRiskLevel: { CRITICAL: 0, HIGH: 0, MODERATE: 0, LOW: 0 },
      quantumVulnerableSoon: 0,
      harvestNowExposed: 0,
      unresolvedGeo: 0,
      invalidTls: 0,
      quantumSafeTls: 0,
      averageRiskScore: 0,
    });
  });

  it("tallies levels, exposure and probe outcomes", () => {
    const rsaSoon = assess("RSA", 2048, 2026); // 4 years, URGENT, 28 points
    const aesLate = assess("AES", 256, 2026); // 14 years, MODERATE, 16 points

    const reports = [
      // 40 + 20 + 28 + 10 = 98
      score(asset("vault.example.com"), sentinelGeo(), invalidTls(), rsaSoon, FULL, AT),
      // 25 + 0 + 28 + 0 = 53
      score(asset("www.example.com"), geoRecord("192.0.2.1"), safeTls, rsaSoon, FULL, AT),
      // 15 + 0 + 16 + 0 = 31
      score(asset("dev.example.com"), geoRecord("192.0.2.2"), safeTls, aesLate, FULL, AT),
    ];

    expect(reports.map((r) => r.riskScore)).toEqual([98, 53, 31]);
    expect(summarizeAudit(reports)).toEqual({
      totalAssets: 3,
      byRiskLevel: { CRITICAL: 1, HIGH: 0, MODERATE: 1, LOW: 1 },
      quantumVulnerableSoon: 2,
      harvestNowExposed: 2,
      unresolvedGeo: 1,
      invalidTls: 1,
      quantumSafeTls: 2,
      averageRiskScore: 60.7,
    });
  });
});
