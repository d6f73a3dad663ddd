/**
 * Risk aggregator.
 *
 * Combines criticality, TLS posture, quantum urgency and geolocation
 * confidence into a 0-100 score. Deterministic: the same inputs under the
 * same configuration always give the same score, level and remediation.
 *
 *   criticality   CRITICAL 40 · HIGH 25 · MODERATE 15
 *   TLS           invalid 20 · valid, not quantum-safe 15 · quantum-safe 0
 *   quantum       min(30, floor(quantumRiskScore / 3)), only if enabled
 *   geolocation   unresolved 10, only if enabled
 */

import type {
  Asset,
  AssetReport,
  Criticality,
  GeoRecord,
  QuantumAssessment,
  RiskLevel,
  ScanConfiguration,
  TLSRecord,
} from "./schemas.js";
import { recommend } from "./quantum/pqc.js";

export const CRITICALITY_WEIGHTS: Record<Criticality, number> = {
  CRITICAL: 40,
  HIGH: 25,
  MODERATE: 15,
};

export const TLS_INVALID_WEIGHT = 20;
export const TLS_NOT_QUANTUM_SAFE_WEIGHT = 15;
export const QUANTUM_WEIGHT_CAP = 30;
export const GEO_UNRESOLVED_WEIGHT = 10;
/** Years within which harvested traffic is considered exposed. */
export const HNDL_HORIZON_YEARS = 10;

export const REMEDIATION_DEFAULT = "Maintain quarterly security audits and monitoring";

export type ScoringConfig = Pick<ScanConfiguration, "enableQuantum" | "enableGeo">;

export interface RiskBreakdown {
  criticality: number;
  tls: number;
  quantum: number;
  geo: number;
}

export function riskBreakdown(
  asset: Asset,
  geo: GeoRecord,
  tls: TLSRecord,
  quantum: QuantumAssessment,
  config: ScoringConfig,
): RiskBreakdown {
  let tlsPoints = 0;
  if (tls.checked) {
    if (!tls.valid) tlsPoints = TLS_INVALID_WEIGHT;
    else if (!tls.quantumSafe) tlsPoints = TLS_NOT_QUANTUM_SAFE_WEIGHT;
  }

  return {
    criticality: CRITICALITY_WEIGHTS[asset.criticality],
    tls: tlsPoints,
    quantum: config.enableQuantum
      ? Math.min(QUANTUM_WEIGHT_CAP, Math.floor(quantum.quantumRiskScore / 3))
      : 0,
    geo: config.enableGeo && !geo.resolved ? GEO_UNRESOLVED_WEIGHT : 0,
  };
}

export function riskLevelFor(score: number): RiskLevel {
  if (score >= 80) return "CRITICAL";
  if (score >= 60) return "HIGH";
  if (score >= 40) return "MODERATE";
  return "LOW";
}

export function buildRemediation(
  tls: TLSRecord,
  quantum: QuantumAssessment,
  kemSuite: string,
  config: ScoringConfig,
): string {
  const parts: string[] = [];

  if (config.enableQuantum && (quantum.urgency === "IMMEDIATE" || quantum.urgency === "URGENT")) {
    parts.push(`QUANTUM THREAT: Migrate to ${kemSuite}`);
  }
  if (tls.checked && !tls.valid) {
    parts.push("Deploy valid SSL/TLS certificate");
  }
  if (tls.checked && !tls.quantumSafe) {
    parts.push("Enable hybrid classical-PQC mode");
  }

  return parts.length > 0 ? parts.join(" | ") : REMEDIATION_DEFAULT;
}

export function score(
  asset: Asset,
  geo: GeoRecord,
  tls: TLSRecord,
  quantum: QuantumAssessment,
  config: ScoringConfig,
  assessedAt: Date = new Date(),
): AssetReport {
  const pqc = recommend(asset.criticality);
  const b = riskBreakdown(asset, geo, tls, quantum, config);
  const riskScore = Math.max(0, Math.min(100, b.criticality + b.tls + b.quantum + b.geo));

  return {
    asset,
    geo,
    tls,
    quantum,
    pqc,
    riskScore,
    riskLevel: riskLevelFor(riskScore),
    remediation: buildRemediation(tls, quantum, pqc.kemSuite, config),
    harvestNowThreat: quantum.yearsUntilVulnerable <= HNDL_HORIZON_YEARS,
    assessedAt: assessedAt.toISOString(),
  };
}
