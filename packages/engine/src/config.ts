/**
 * Scan configuration: named scan modes, validation, and the optional
 * `.qsurface.yml` project file (js-yaml + Zod, with did-you-mean warnings).
 *
 * The engine itself never reads files or env vars; callers resolve a
 * ScanConfiguration here and pass it in.
 */

import { readFileSync, existsSync } from "node:fs";
import { resolve, join } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import {
  CryptoFamilySchema,
  ScanConfigurationSchema,
  SubdomainSourceIdSchema,
  type BreakYears,
  type CriticalityRules,
  type QuantumModel,
  type ScanConfiguration,
  type SubdomainSourceId,
  type UrgencyThresholds,
} from "./schemas.js";
import { DEFAULT_QUANTUM_MODEL } from "./quantum/assessor.js";
import { DEFAULT_CRITICALITY_RULES } from "./discovery/criticality.js";
import { ConfigurationError, errorMessage } from "./errors.js";
import { logger } from "./logger.js";

/* ------------------------------------------------------------------ */
/*  Scan modes                                                         */
/* ------------------------------------------------------------------ */

export const SCAN_MODE_NAMES = ["standard", "deep-quantum", "stealth", "comprehensive"] as const;
export type ScanModeName = typeof SCAN_MODE_NAMES[number];

export const DEFAULT_SCAN_MODE: ScanModeName = "deep-quantum";

export interface ScanModePreset {
  description: string;
  maxAssets: number;
  enableQuantum: boolean;
  perRequestDelayMs: number;
  concurrency: number;
  subdomainSources: SubdomainSourceId[];
}

export const SCAN_MODES: Record<ScanModeName, ScanModePreset> = {
  standard: {
    description: "Quick attack-surface overview, no quantum analysis",
    maxAssets: 10,
    enableQuantum: false,
    perRequestDelayMs: 0,
    concurrency: 5,
    subdomainSources: ["ct-log", "wordlist-common"],
  },
  "deep-quantum": {
    description: "Full quantum threat assessment with PQC recommendations",
    maxAssets: 25,
    enableQuantum: true,
    perRequestDelayMs: 0,
    concurrency: 5,
    subdomainSources: ["ct-log", "wordlist-common"],
  },
  stealth: {
    description: "Paced requests (3s before every call), low concurrency",
    maxAssets: 15,
    enableQuantum: true,
    perRequestDelayMs: 3_000,
    concurrency: 2,
    subdomainSources: ["ct-log", "wordlist-common"],
  },
  comprehensive: {
    description: "Extended subdomain wordlist, full quantum analysis",
    maxAssets: 50,
    enableQuantum: true,
    perRequestDelayMs: 0,
    concurrency: 5,
    subdomainSources: ["ct-log", "wordlist-common", "wordlist-extended"],
  },
};

const BASE_TIMEOUT_MS = 10_000;
const MAX_CONNECTIONS_PER_HOST = 5;

export function isScanModeName(name: string): name is ScanModeName {
  return Object.prototype.hasOwnProperty.call(SCAN_MODES, name);
}

export interface ScanOverrides {
  maxAssets?: number;
  enableQuantum?: boolean;
  enableTlsCheck?: boolean;
  enableGeo?: boolean;
  perRequestDelayMs?: number;
  timeoutMs?: number;
  concurrency?: number;
  maxConnectionsPerHost?: number;
  subdomainSources?: SubdomainSourceId[];
  quantum?: {
    assumedFamily?: QuantumModel["assumedFamily"];
    assumedKeySize?: number;
    breakYears?: Partial<BreakYears>;
    urgencyThresholds?: Partial<UrgencyThresholds>;
  };
  criticality?: Partial<CriticalityRules>;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

/**
 * Build an immutable ScanConfiguration from a named mode plus overrides.
 * Throws ConfigurationError on the first invalid field.
 */
export function resolveScanConfiguration(
  mode: string = DEFAULT_SCAN_MODE,
  overrides: ScanOverrides = {},
): ScanConfiguration {
  if (!isScanModeName(mode)) {
    const suggestion = didYouMean(mode, SCAN_MODE_NAMES);
    const hint = suggestion ? ` — did you mean '${suggestion}'?` : "";
    throw new ConfigurationError("mode", `unknown scan mode '${mode}'${hint}`);
  }

  const preset = SCAN_MODES[mode];
  const q = overrides.quantum ?? {};
  const defaultYears = DEFAULT_QUANTUM_MODEL.breakYears;
  const defaultThresholds = DEFAULT_QUANTUM_MODEL.urgencyThresholds;

  const candidate = {
    mode,
    maxAssets: overrides.maxAssets ?? preset.maxAssets,
    enableQuantum: overrides.enableQuantum ?? preset.enableQuantum,
    enableTlsCheck: overrides.enableTlsCheck ?? true,
    enableGeo: overrides.enableGeo ?? true,
    perRequestDelayMs: overrides.perRequestDelayMs ?? preset.perRequestDelayMs,
    timeoutMs: overrides.timeoutMs ?? BASE_TIMEOUT_MS,
    concurrency: overrides.concurrency ?? preset.concurrency,
    maxConnectionsPerHost: overrides.maxConnectionsPerHost ?? MAX_CONNECTIONS_PER_HOST,
    subdomainSources: [...new Set(overrides.subdomainSources ?? preset.subdomainSources)],
    quantum: {
      assumedFamily: q.assumedFamily ?? DEFAULT_QUANTUM_MODEL.assumedFamily,
      assumedKeySize: q.assumedKeySize ?? DEFAULT_QUANTUM_MODEL.assumedKeySize,
      breakYears: {
        rsaUpTo2048: q.breakYears?.rsaUpTo2048 ?? defaultYears.rsaUpTo2048,
        rsaAbove2048: q.breakYears?.rsaAbove2048 ?? defaultYears.rsaAbove2048,
        ecc: q.breakYears?.ecc ?? defaultYears.ecc,
        aes: q.breakYears?.aes ?? defaultYears.aes,
        sha: q.breakYears?.sha ?? defaultYears.sha,
      },
      urgencyThresholds: {
        immediate: q.urgencyThresholds?.immediate ?? defaultThresholds.immediate,
        urgent: q.urgencyThresholds?.urgent ?? defaultThresholds.urgent,
        high: q.urgencyThresholds?.high ?? defaultThresholds.high,
      },
    },
    criticality: {
      critical: overrides.criticality?.critical ?? DEFAULT_CRITICALITY_RULES.critical,
      moderate: overrides.criticality?.moderate ?? DEFAULT_CRITICALITY_RULES.moderate,
    },
  };

  const result = ScanConfigurationSchema.safeParse(candidate);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue ? issue.path.join(".") : "config";
    throw new ConfigurationError(field, `invalid configuration — ${field}: ${issue?.message ?? "invalid"}`);
  }

  return deepFreeze(result.data);
}

/* ------------------------------------------------------------------ */
/*  Domain validation                                                  */
/* ------------------------------------------------------------------ */

const HOSTNAME_RE = /^(?=.{1,253}$)([a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?\.)+[a-z][a-z0-9-]{0,61}[a-z0-9]$/;
const IPV4_RE = /^\d{1,3}(\.\d{1,3}){3}$/;

/** Normalize and check a scan target. Throws ConfigurationError. */
export function validateDomain(domain: string): string {
  const normalized = domain.trim().toLowerCase().replace(/\.$/, "");
  if (!normalized) {
    throw new ConfigurationError("domain", "domain is required");
  }
  if (IPV4_RE.test(normalized) || normalized.includes(":")) {
    throw new ConfigurationError("domain", `'${domain}' is an IP address, not a domain`);
  }
  if (!HOSTNAME_RE.test(normalized)) {
    throw new ConfigurationError("domain", `'${domain}' is not a valid domain name`);
  }
  return normalized;
}

/* ------------------------------------------------------------------ */
/*  Zod schema for .qsurface.yml                                       */
/* ------------------------------------------------------------------ */

const fileConfigSchema = z.object({
  mode: z.string().optional(),
  max_assets: z.number().int().optional(),
  timeout_ms: z.number().int().optional(),
  per_request_delay_ms: z.number().int().optional(),
  concurrency: z.number().int().optional(),
  max_connections_per_host: z.number().int().optional(),
  sources: z.array(z.string()).optional(),
  quantum: z.object({
    assumed_family: z.string().optional(),
    assumed_key_size: z.number().int().positive().optional(),
    urgency_thresholds: z.object({
      immediate: z.number().int().nonnegative().optional(),
      urgent: z.number().int().nonnegative().optional(),
      high: z.number().int().nonnegative().optional(),
    }).optional(),
    break_years: z.object({
      rsa_up_to_2048: z.number().int().optional(),
      rsa_above_2048: z.number().int().optional(),
      ecc: z.number().int().optional(),
      aes: z.number().int().optional(),
      sha: z.number().int().optional(),
    }).optional(),
  }).optional(),
  criticality: z.object({
    critical: z.array(z.string()).optional(),
    moderate: z.array(z.string()).optional(),
  }).optional(),
}).passthrough();

const KNOWN_KEYS = new Set([
  "mode", "max_assets", "timeout_ms", "per_request_delay_ms",
  "concurrency", "max_connections_per_host", "sources", "quantum", "criticality",
]);

export const CONFIG_FILE_NAME = ".qsurface.yml";

export interface FileConfig {
  mode?: ScanModeName;
  overrides: ScanOverrides;
}

/* ------------------------------------------------------------------ */
/*  Helpers                                                            */
/* ------------------------------------------------------------------ */

function didYouMean(input: string, valid: readonly string[]): string | null {
  let best: string | null = null;
  let bestDist = Infinity;

  for (const candidate of valid) {
    const dist = levenshtein(input.toLowerCase(), candidate.toLowerCase());
    if (dist < bestDist && dist <= 3) {
      bestDist = dist;
      best = candidate;
    }
  }

  return best;
}

function levenshtein(a: string, b: string): number {
  const m = a.length;
  const n = b.length;
  let prev = Array.from({ length: n + 1 }, (_, j) => j);

  for (let i = 1; i <= m; i++) {
    const curr = [i];
    for (let j = 1; j <= n; j++) {
      curr[j] = a[i - 1] === b[j - 1]
        ? prev[j - 1]
        : 1 + Math.min(prev[j], curr[j - 1], prev[j - 1]);
    }
    prev = curr;
  }

  return prev[n];
}

/* ------------------------------------------------------------------ */
/*  Loader                                                             */
/* ------------------------------------------------------------------ */

/**
 * Load `.qsurface.yml` from the given directory.
 * Returns the mode and overrides it sets, or null if no config file exists.
 * Invalid entries are warned about and skipped.
 */
export function loadConfig(dir: string): FileConfig | null {
  const configPath = resolve(join(dir, CONFIG_FILE_NAME));

  if (!existsSync(configPath)) return null;

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (err) {
    logger.warn(`Warning: could not parse ${CONFIG_FILE_NAME} — ${errorMessage(err)}. Using defaults.`);
    return { overrides: {} };
  }

  if (!parsed || typeof parsed !== "object") return { overrides: {} };

  const result = fileConfigSchema.safeParse(parsed);
  if (!result.success) {
    for (const issue of result.error.issues) {
      logger.warn(`Warning: config validation error — ${issue.path.join(".")}: ${issue.message}`);
    }
    return { overrides: {} };
  }

  const data = result.data;

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.has(key)) {
      const suggestion = didYouMean(key, [...KNOWN_KEYS]);
      const hint = suggestion ? ` — did you mean '${suggestion}'?` : "";
      logger.warn(`Warning: unknown config key '${key}'${hint}`);
    }
  }

  const config: FileConfig = { overrides: {} };
  const o = config.overrides;

  // mode
  if (data.mode !== undefined) {
    if (isScanModeName(data.mode)) {
      config.mode = data.mode;
    } else {
      const suggestion = didYouMean(data.mode, SCAN_MODE_NAMES);
      const hint = suggestion ? ` — did you mean '${suggestion}'?` : "";
      logger.warn(`Warning: unknown scan mode '${data.mode}'${hint}. Using default '${DEFAULT_SCAN_MODE}'.`);
    }
  }

  if (data.max_assets !== undefined) o.maxAssets = data.max_assets;
  if (data.timeout_ms !== undefined) o.timeoutMs = data.timeout_ms;
  if (data.per_request_delay_ms !== undefined) o.perRequestDelayMs = data.per_request_delay_ms;
  if (data.concurrency !== undefined) o.concurrency = data.concurrency;
  if (data.max_connections_per_host !== undefined) o.maxConnectionsPerHost = data.max_connections_per_host;

  // sources
  if (data.sources) {
    const valid: SubdomainSourceId[] = [];
    for (const s of data.sources) {
      const id = SubdomainSourceIdSchema.safeParse(s);
      if (id.success) {
        valid.push(id.data);
      } else {
        const suggestion = didYouMean(s, SubdomainSourceIdSchema.options);
        const hint = suggestion ? ` — did you mean '${suggestion}'?` : "";
        logger.warn(`Warning: unknown subdomain source '${s}'${hint}`);
      }
    }
    if (valid.length > 0) o.subdomainSources = valid;
  }

  // quantum model
  if (data.quantum) {
    const q = data.quantum;
    const quantum: NonNullable<ScanOverrides["quantum"]> = {};

    if (q.assumed_family !== undefined) {
      const family = CryptoFamilySchema.safeParse(q.assumed_family.toUpperCase());
      if (family.success) {
        quantum.assumedFamily = family.data;
      } else {
        logger.warn(
          `Warning: unknown crypto family '${q.assumed_family}'. Expected one of: ${CryptoFamilySchema.options.join(", ")}`,
        );
      }
    }
    if (q.assumed_key_size !== undefined) quantum.assumedKeySize = q.assumed_key_size;
    if (q.urgency_thresholds) quantum.urgencyThresholds = q.urgency_thresholds;
    if (q.break_years) {
      quantum.breakYears = {
        rsaUpTo2048: q.break_years.rsa_up_to_2048,
        rsaAbove2048: q.break_years.rsa_above_2048,
        ecc: q.break_years.ecc,
        aes: q.break_years.aes,
        sha: q.break_years.sha,
      };
    }
    o.quantum = quantum;
  }

  // criticality keyword sets
  if (data.criticality) {
    o.criticality = {
      critical: data.criticality.critical?.map((k) => k.toLowerCase()),
      moderate: data.criticality.moderate?.map((k) => k.toLowerCase()),
    };
  }

  return config;
}
