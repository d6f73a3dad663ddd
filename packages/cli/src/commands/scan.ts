import { writeFileSync } from "node:fs";
import { resolve } from "node:path";
import {
  runAudit,
  loadConfig,
  resolveScanConfiguration,
  validateDomain,
  logger,
  ConfigurationError,
  RiskLevelSchema,
  errorMessage,
  type AssetReport,
  type RiskLevel,
  type RunAuditOptions,
  type ScanConfiguration,
  type ScanOverrides,
} from "@qsurface/engine";
import { formatReport, isOutputFormat, OUTPUT_FORMATS, type OutputFormat } from "../formatter.js";

export interface ScanOptions {
  domain: string;
  /** Directory searched for .qsurface.yml. */
  cwd: string;
  mode?: string;
  maxAssets?: number;
  timeoutMs?: number;
  delayMs?: number;
  concurrency?: number;
  maxConnectionsPerHost?: number;
  quantum: boolean;
  tls: boolean;
  geo: boolean;
  format: string;
  output?: string;
  failOn?: string;
  color?: boolean;
}

export interface ScanDeps {
  audit?: (domain: string, config: ScanConfiguration, options: RunAuditOptions) => Promise<AssetReport[]>;
  /** Where the report goes when no --output is given. */
  write?: (text: string) => void;
  /** Interrupt source; tests pass their own emitter. */
  interrupts?: InterruptSource;
}

export interface InterruptSource {
  once(event: "SIGINT", listener: () => void): unknown;
  off(event: "SIGINT", listener: () => void): unknown;
}

const LEVEL_ORDER: readonly RiskLevel[] = ["LOW", "MODERATE", "HIGH", "CRITICAL"];

export function parseFailOn(raw: string): RiskLevel {
  const level = RiskLevelSchema.safeParse(raw.toUpperCase());
  if (!level.success) {
    throw new ConfigurationError(
      "fail-on",
      `invalid --fail-on '${raw}'. Must be one of: ${LEVEL_ORDER.map((l) => l.toLowerCase()).join(", ")}`,
    );
  }
  return level.data;
}

export function meetsThreshold(reports: readonly AssetReport[], threshold: RiskLevel): boolean {
  const min = LEVEL_ORDER.indexOf(threshold);
  return reports.some((r) => LEVEL_ORDER.indexOf(r.riskLevel) >= min);
}

/** CLI flags win over .qsurface.yml, which wins over the mode preset. */
export function buildConfiguration(options: ScanOptions): ScanConfiguration {
  const file = loadConfig(options.cwd);
  const overrides: ScanOverrides = { ...file?.overrides };

  if (options.maxAssets !== undefined) overrides.maxAssets = options.maxAssets;
  if (options.timeoutMs !== undefined) overrides.timeoutMs = options.timeoutMs;
  if (options.delayMs !== undefined) overrides.perRequestDelayMs = options.delayMs;
  if (options.concurrency !== undefined) overrides.concurrency = options.concurrency;
  if (options.maxConnectionsPerHost !== undefined) overrides.maxConnectionsPerHost = options.maxConnectionsPerHost;
  if (!options.quantum) overrides.enableQuantum = false;
  if (!options.tls) overrides.enableTlsCheck = false;
  if (!options.geo) overrides.enableGeo = false;

  return resolveScanConfiguration(options.mode ?? file?.mode, overrides);
}

/**
 * Run a scan and print the report. Resolves to the process exit code.
 * Configuration problems throw ConfigurationError before any network I/O.
 */
export async function runScan(options: ScanOptions, deps: ScanDeps = {}): Promise<number> {
  const format = options.format;
  if (!isOutputFormat(format)) {
    throw new ConfigurationError(
      "format",
      `invalid format '${format}'. Must be one of: ${OUTPUT_FORMATS.join(", ")}`,
    );
  }
  const outputFormat: OutputFormat = format;
  const failOn = options.failOn !== undefined ? parseFailOn(options.failOn) : undefined;

  const domain = validateDomain(options.domain);
  const config = buildConfiguration(options);
  const audit = deps.audit ?? runAudit;
  const interrupts: InterruptSource = deps.interrupts ?? process;

  const controller = new AbortController();
  const onInterrupt = () => {
    logger.warn("Interrupted: waiting for in-flight assets to stop");
    controller.abort();
  };
  interrupts.once("SIGINT", onInterrupt);

  let reports: AssetReport[];
  try {
    reports = await audit(domain, config, { signal: controller.signal });
  } finally {
    interrupts.off("SIGINT", onInterrupt);
  }

  const output = formatReport(
    reports,
    { domain, config, interrupted: controller.signal.aborted },
    { format: outputFormat, color: options.color },
  );

  if (options.output) {
    try {
      writeFileSync(resolve(options.output), output);
      logger.info(`Report written to ${options.output}`);
    } catch (err) {
      logger.error(`Error: could not write to ${options.output} — ${errorMessage(err)}`);
      return 1;
    }
  } else {
    const write = deps.write ?? ((text: string) => { process.stdout.write(text); });
    write(`${output}\n`);
  }

  if (controller.signal.aborted) return 130;
  if (failOn && meetsThreshold(reports, failOn)) return 1;
  return 0;
}
