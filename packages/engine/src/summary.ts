import type { AssetReport, RiskLevel } from "./schemas.js";

export interface AuditSummary {
  totalAssets: number;
  byRiskLevel: Record<RiskLevel, number>;
  /** Assets whose assumed crypto breaks within five years. */
  quantumVulnerableSoon: number;
  /** Assets exposed to harvest-now-decrypt-later. */
  harvestNowExposed: number;
  unresolvedGeo: number;
  invalidTls: number;
  quantumSafeTls: number;
  /** Mean risk score, one decimal place; 0 for an empty audit. */
  averageRiskScore: number;
}

export const QUANTUM_VULNERABLE_SOON_YEARS = 5;

export function summarizeAudit(reports: readonly AssetReport[]): AuditSummary {
  const byRiskLevel: Record<RiskLevel, number> = { CRITICAL: 0, HIGH: 0, MODERATE: 0, LOW: 0 };
  let total = 0;

  for (const r of reports) {
    byRiskLevel[r.riskLevel]++;
    total += r.riskScore;
  }

  return {
    totalAssets: reports.length,
    byRiskLevel,
    quantumVulnerableSoon: reports.filter(
      (r) => r.quantum.yearsUntilVulnerable <= QUANTUM_VULNERABLE_SOON_YEARS,
    ).length,
    harvestNowExposed: reports.filter((r) => r.harvestNowThreat).length,
    unresolvedGeo: reports.filter((r) => !r.geo.resolved).length,
    invalidTls: reports.filter((r) => r.tls.checked && !r.tls.valid).length,
    quantumSafeTls: reports.filter((r) => r.tls.quantumSafe).length,
    averageRiskScore: reports.length > 0 ? Math.round((total / reports.length) * 10) / 10 : 0,
  };
}
