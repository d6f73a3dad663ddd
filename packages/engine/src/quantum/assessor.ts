/**
 * Quantum vulnerability assessor.
 *
 * A pure, total function of (crypto family, key size, current year) and a
 * tunable model. Break years and urgency thresholds are illustrative
 * heuristics, not predictions; the defaults below can be overridden
 * through configuration.
 *
 * Live cipher analysis is not performed: unless told otherwise, every asset
 * is assessed as the model's assumed family and key size (RSA-2048).
 */

import type {
  BreakYears,
  CryptoFamily,
  QuantumAssessment,
  QuantumModel,
  Urgency,
  UrgencyThresholds,
} from "../schemas.js";

export const DEFAULT_BREAK_YEARS: BreakYears = {
  rsaUpTo2048: 2030,
  rsaAbove2048: 2032,
  ecc: 2030,
  aes: 2040,
  sha: 2040,
};

/** Upper bounds (inclusive) on years-until-vulnerable for each tier. */
export const DEFAULT_URGENCY_THRESHOLDS: UrgencyThresholds = {
  immediate: 3,
  urgent: 5,
  high: 7,
};

export const DEFAULT_QUANTUM_MODEL: QuantumModel = {
  assumedFamily: "RSA",
  assumedKeySize: 2048,
  breakYears: DEFAULT_BREAK_YEARS,
  urgencyThresholds: DEFAULT_URGENCY_THRESHOLDS,
};

export const URGENCY_RISK_SCORES: Record<Urgency, number> = {
  IMMEDIATE: 95,
  URGENT: 85,
  HIGH: 70,
  MODERATE: 50,
};

interface FamilyProfile {
  threatAlgorithm: QuantumAssessment["threatAlgorithm"];
  quantumSpeedup: QuantumAssessment["quantumSpeedup"];
  severity: QuantumAssessment["severity"];
  breakYear(keySize: number, years: BreakYears): number;
}

const FAMILY_PROFILES: Record<CryptoFamily, FamilyProfile> = {
  RSA: {
    threatAlgorithm: "SHOR",
    quantumSpeedup: "exponential",
    severity: "CRITICAL",
    breakYear: (keySize, y) => (keySize <= 2048 ? y.rsaUpTo2048 : y.rsaAbove2048),
  },
  ECC: {
    threatAlgorithm: "SHOR",
    quantumSpeedup: "exponential",
    severity: "CRITICAL",
    breakYear: (_keySize, y) => y.ecc,
  },
  AES: {
    threatAlgorithm: "GROVER",
    quantumSpeedup: "quadratic",
    severity: "MODERATE",
    breakYear: (_keySize, y) => y.aes,
  },
  SHA: {
    threatAlgorithm: "GROVER",
    quantumSpeedup: "quadratic",
    severity: "LOW",
    breakYear: (_keySize, y) => y.sha,
  },
};

/** Ties go to the more urgent tier. */
export function urgencyFor(yearsUntilVulnerable: number, t: UrgencyThresholds = DEFAULT_URGENCY_THRESHOLDS): Urgency {
  if (yearsUntilVulnerable <= t.immediate) return "IMMEDIATE";
  if (yearsUntilVulnerable <= t.urgent) return "URGENT";
  if (yearsUntilVulnerable <= t.high) return "HIGH";
  return "MODERATE";
}

export function assess(
  cryptoFamily: CryptoFamily,
  keySize: number,
  currentYear: number,
  model: QuantumModel = DEFAULT_QUANTUM_MODEL,
): QuantumAssessment {
  const profile = FAMILY_PROFILES[cryptoFamily];
  const vulnerabilityYear = profile.breakYear(keySize, model.breakYears);
  const yearsUntilVulnerable = Math.max(0, vulnerabilityYear - currentYear);
  const urgency = urgencyFor(yearsUntilVulnerable, model.urgencyThresholds);

  return {
    cryptoFamily,
    keySize,
    threatAlgorithm: profile.threatAlgorithm,
    quantumSpeedup: profile.quantumSpeedup,
    vulnerabilityYear,
    yearsUntilVulnerable,
    quantumRiskScore: URGENCY_RISK_SCORES[urgency],
    urgency,
    severity: profile.severity,
  };
}

/** Assessment under the model's assumed crypto (no live cipher analysis). */
export function assessAssumed(currentYear: number, model: QuantumModel = DEFAULT_QUANTUM_MODEL): QuantumAssessment {
  return assess(model.assumedFamily, model.assumedKeySize, currentYear, model);
}
