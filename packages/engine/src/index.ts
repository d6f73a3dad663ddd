// ---------------------------------------------------------------------------
// @qsurface/engine
//
// Attack-surface discovery, per-asset probing and quantum-risk scoring.
// Shared by the CLI and any reporting layer that consumes AssetReports.
// ---------------------------------------------------------------------------

// Types
export {
  CriticalitySchema,
  RiskLevelSchema,
  UrgencySchema,
  ThreatAlgorithmSchema,
  CryptoFamilySchema,
  SubdomainSourceIdSchema,
  ScanConfigurationSchema,
  type Criticality,
  type RiskLevel,
  type Urgency,
  type ThreatAlgorithm,
  type CryptoFamily,
  type SubdomainSourceId,
  type BreakYears,
  type UrgencyThresholds,
  type QuantumModel,
  type CriticalityRules,
  type ScanConfiguration,
  type Asset,
  type GeoRecord,
  type TLSRecord,
  type QuantumAssessment,
  type PQCRecommendation,
  type AssetReport,
} from "./schemas.js";

// Errors
export { ConfigurationError, AuditAbortedError, errorMessage } from "./errors.js";

// Config
export {
  SCAN_MODES,
  SCAN_MODE_NAMES,
  DEFAULT_SCAN_MODE,
  CONFIG_FILE_NAME,
  isScanModeName,
  resolveScanConfiguration,
  validateDomain,
  loadConfig,
  type ScanModeName,
  type ScanModePreset,
  type ScanOverrides,
  type FileConfig,
} from "./config.js";

// Discovery
export { discover, selectAssets, DEFAULT_SOURCES, type DiscoverOptions } from "./discovery/discover.js";
export { ctLogSource, parseCtLogEntries, ctLogUrl } from "./discovery/ct-log.js";
export {
  commonWordlistSource,
  extendedWordlistSource,
  createWordlistSource,
  COMMON_LABELS,
  EXTENDED_LABELS,
} from "./discovery/wordlist.js";
export { classifyCriticality, DEFAULT_CRITICALITY_RULES } from "./discovery/criticality.js";
export { createAsset, assetIdFor } from "./discovery/asset.js";
export type { SubdomainSource, SourceContext } from "./discovery/types.js";

// Network
export {
  ScanSession,
  withScanSession,
  type HttpClient,
  type HttpJsonResponse,
  type HttpGetOptions,
  type ScanSessionOptions,
} from "./net/session.js";
export { sleep, withTimeout, ProbeTimeoutError } from "./net/timeout.js";
export { HostLimiter } from "./net/host-limiter.js";

// Probes
export { probe, sentinelProbe, type ProbeResult } from "./probe/prober.js";
export { resolveHost, systemResolver, type HostResolver } from "./probe/dns.js";
export {
  lookupGeo,
  sentinelGeo,
  ipApiProvider,
  ipapiCoProvider,
  DEFAULT_GEO_PROVIDERS,
  type GeoProvider,
} from "./probe/geo.js";
export {
  probeTls,
  invalidTls,
  uncheckedTls,
  isQuantumSafe,
  nodeTlsConnector,
  QUANTUM_SAFE_TOKENS,
  type TlsConnector,
  type TlsHandshake,
  type TlsTarget,
} from "./probe/tls.js";
export type { ProbeContext } from "./probe/types.js";

// Quantum
export {
  assess,
  assessAssumed,
  urgencyFor,
  DEFAULT_QUANTUM_MODEL,
  DEFAULT_BREAK_YEARS,
  DEFAULT_URGENCY_THRESHOLDS,
  URGENCY_RISK_SCORES,
} from "./quantum/assessor.js";
export { recommend } from "./quantum/pqc.js";

// Scoring
export {
  score,
  riskBreakdown,
  riskLevelFor,
  buildRemediation,
  REMEDIATION_DEFAULT,
  type RiskBreakdown,
} from "./scoring.js";

// Summary
export { summarizeAudit, type AuditSummary } from "./summary.js";

// Worker pool
export { runPool, type PoolOutcome, type PoolOptions } from "./pool.js";

// Logger
export { logger } from "./logger.js";

// Main orchestrator
export { runAudit, assetBudgetMs, sortReports, type RunAuditOptions } from "./audit.js";
