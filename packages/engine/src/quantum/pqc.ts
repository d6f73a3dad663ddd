import type { Criticality, PQCRecommendation } from "../schemas.js";

type Suite = Omit<PQCRecommendation, "criticality" | "hybridMode" | "standards">;

const SUITES: Record<Criticality, Suite> = {
  CRITICAL: {
    kemSuite: "ML-KEM-1024",
    signatureSuite: "ML-DSA-87",
    hashSuite: "SHA3-512",
    migrationPriority: "P0 - Immediate",
    timeline: "0-3 months",
  },
  HIGH: {
    kemSuite: "ML-KEM-768",
    signatureSuite: "ML-DSA-65",
    hashSuite: "SHA3-256",
    migrationPriority: "P1 - Urgent",
    timeline: "3-6 months",
  },
  MODERATE: {
    kemSuite: "ML-KEM-512",
    signatureSuite: "ML-DSA-44",
    hashSuite: "SHA3-256",
    migrationPriority: "P2 - Standard",
    timeline: "6-12 months",
  },
};

export const HYBRID_MODE_ADVICE = "Combine with classical crypto during transition";
export const PQC_STANDARDS = "FIPS 203, 204, 205";

/** Post-quantum suite for a criticality tier. Independent of the quantum assessment. */
export function recommend(criticality: Criticality): PQCRecommendation {
  return {
    criticality,
    ...SUITES[criticality],
    hybridMode: HYBRID_MODE_ADVICE,
    standards: PQC_STANDARDS,
  };
}
