import { z } from "zod";

// ---------------------------------------------------------------------------
// Enumerations
// ---------------------------------------------------------------------------

export const CriticalitySchema = z.enum(["CRITICAL", "HIGH", "MODERATE"]);
export type Criticality = z.infer<typeof CriticalitySchema>;

export const RiskLevelSchema = z.enum(["LOW", "MODERATE", "HIGH", "CRITICAL"]);
export type RiskLevel = z.infer<typeof RiskLevelSchema>;

export const UrgencySchema = z.enum(["IMMEDIATE", "URGENT", "HIGH", "MODERATE"]);
export type Urgency = z.infer<typeof UrgencySchema>;

export const ThreatAlgorithmSchema = z.enum(["SHOR", "GROVER", "NONE"]);
export type ThreatAlgorithm = z.infer<typeof ThreatAlgorithmSchema>;

export const CryptoFamilySchema = z.enum(["RSA", "ECC", "AES", "SHA"]);
export type CryptoFamily = z.infer<typeof CryptoFamilySchema>;

export const SubdomainSourceIdSchema = z.enum([
  "ct-log",
  "wordlist-common",
  "wordlist-extended",
]);
export type SubdomainSourceId = z.infer<typeof SubdomainSourceIdSchema>;

// ---------------------------------------------------------------------------
// Quantum model (tunable heuristics, not measured facts)
// ---------------------------------------------------------------------------

export const BreakYearsSchema = z.object({
  /** RSA keys up to 2048 bits. */
  rsaUpTo2048: z.number().int(),
  /** RSA keys above 2048 bits. */
  rsaAbove2048: z.number().int(),
  ecc: z.number().int(),
  aes: z.number().int(),
  sha: z.number().int(),
});
export type BreakYears = z.infer<typeof BreakYearsSchema>;

export const UrgencyThresholdsSchema = z
  .object({
    immediate: z.number().int().nonnegative(),
    urgent: z.number().int().nonnegative(),
    high: z.number().int().nonnegative(),
  })
  .refine((t) => t.immediate <= t.urgent && t.urgent <= t.high, {
    message: "urgency thresholds must be ordered immediate <= urgent <= high",
  });
export type UrgencyThresholds = z.infer<typeof UrgencyThresholdsSchema>;

export const QuantumModelSchema = z.object({
  assumedFamily: CryptoFamilySchema,
  assumedKeySize: z.number().int().positive(),
  breakYears: BreakYearsSchema,
  urgencyThresholds: UrgencyThresholdsSchema,
});
export type QuantumModel = z.infer<typeof QuantumModelSchema>;

export const CriticalityRulesSchema = z.object({
  /** Hostname keywords that mark an asset CRITICAL. Checked first. */
  critical: z.array(z.string().min(1)),
  /** Hostname keywords that mark an asset MODERATE. Anything else is HIGH. */
  moderate: z.array(z.string().min(1)),
});
export type CriticalityRules = z.infer<typeof CriticalityRulesSchema>;

// ---------------------------------------------------------------------------
// Scan configuration
// ---------------------------------------------------------------------------

export const ScanConfigurationSchema = z.object({
  mode: z.string(),
  maxAssets: z.number().int().min(1, "maxAssets must be at least 1"),
  enableQuantum: z.boolean(),
  enableTlsCheck: z.boolean(),
  enableGeo: z.boolean(),
  perRequestDelayMs: z.number().int().nonnegative("perRequestDelayMs must not be negative"),
  timeoutMs: z.number().int().positive("timeoutMs must be positive"),
  concurrency: z.number().int().min(1, "concurrency must be at least 1"),
  maxConnectionsPerHost: z.number().int().min(1),
  subdomainSources: z.array(SubdomainSourceIdSchema).min(1, "at least one subdomain source is required"),
  quantum: QuantumModelSchema,
  criticality: CriticalityRulesSchema,
});
export type ScanConfiguration = Readonly<z.infer<typeof ScanConfigurationSchema>>;

// ---------------------------------------------------------------------------
// Per-asset records
// ---------------------------------------------------------------------------

export interface Asset {
  hostname: string;
  /** First 12 hex chars of sha256(hostname); stable across scans. */
  assetId: string;
  criticality: Criticality;
}

export interface GeoRecord {
  ip: string;
  latitude: number;
  longitude: number;
  country: string;
  city: string;
  isp: string;
  timezone: string;
  resolved: boolean;
  /** Name of the provider that answered, or null when none did. */
  provider: string | null;
}

export interface TLSRecord {
  /** False when TLS probing is disabled for the scan. */
  checked: boolean;
  valid: boolean;
  protocolVersion: string;
  cipherSuite: string;
  keyExchange: string;
  issuer: string;
  quantumSafe: boolean;
}

export interface QuantumAssessment {
  cryptoFamily: CryptoFamily;
  keySize: number;
  threatAlgorithm: ThreatAlgorithm;
  quantumSpeedup: "exponential" | "quadratic" | "none";
  vulnerabilityYear: number;
  yearsUntilVulnerable: number;
  quantumRiskScore: number;
  urgency: Urgency;
  severity: "CRITICAL" | "MODERATE" | "LOW";
}

export interface PQCRecommendation {
  criticality: Criticality;
  kemSuite: string;
  signatureSuite: string;
  hashSuite: string;
  migrationPriority: string;
  timeline: string;
  hybridMode: string;
  standards: string;
}

export interface AssetReport {
  asset: Asset;
  geo: GeoRecord;
  tls: TLSRecord;
  quantum: QuantumAssessment;
  pqc: PQCRecommendation;
  riskScore: number;
  riskLevel: RiskLevel;
  remediation: string;
  /** Harvest-now-decrypt-later exposure: vulnerable within ten years. */
  harvestNowThreat: boolean;
  assessedAt: string;
}

// ---------------------------------------------------------------------------
// Untrusted third-party payloads
// ---------------------------------------------------------------------------

export const CtLogEntrySchema = z.object({
  name_value: z.string(),
});

export const IpApiPayloadSchema = z.object({
  status: z.string(),
  lat: z.number().nullish(),
  lon: z.number().nullish(),
  country: z.string().nullish(),
  city: z.string().nullish(),
  isp: z.string().nullish(),
  timezone: z.string().nullish(),
});

export const IpapiCoPayloadSchema = z.object({
  error: z.boolean().nullish(),
  latitude: z.number().nullish(),
  longitude: z.number().nullish(),
  country_name: z.string().nullish(),
  city: z.string().nullish(),
  org: z.string().nullish(),
  timezone: z.string().nullish(),
});
