import type { AssetReport, RiskLevel, ScanConfiguration } from "@qsurface/engine";
import { summarizeAudit, SCAN_MODES, SCAN_MODE_NAMES, DEFAULT_SCAN_MODE } from "@qsurface/engine";

// ANSI escape codes
const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RED = "\x1b[31m";
const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";
const CYAN = "\x1b[36m";
const BG_RED = "\x1b[41m";
const WHITE = "\x1b[37m";

export type OutputFormat = "table" | "json";
export const OUTPUT_FORMATS: readonly OutputFormat[] = ["table", "json"];

export function isOutputFormat(value: string): value is OutputFormat {
  return value === "table" || value === "json";
}

export interface FormatOptions {
  format: OutputFormat;
  /** ANSI colors in table output. Defaults to on. */
  color?: boolean;
}

export interface ReportMeta {
  domain: string;
  config: ScanConfiguration;
  /** Set when the scan was cancelled before every asset finished. */
  interrupted?: boolean;
}

type Paint = (color: string, text: string) => string;

function painter(enabled: boolean): Paint {
  return enabled ? (color, text) => `${color}${text}${RESET}` : (_color, text) => text;
}

function levelColor(level: RiskLevel): string {
  switch (level) {
    case "CRITICAL": return BG_RED + WHITE;
    case "HIGH": return RED;
    case "MODERATE": return YELLOW;
    case "LOW": return GREEN;
  }
}

const BOX_WIDTH = 42;

function banner(title: string, c: Paint): string[] {
  const left = Math.floor((BOX_WIDTH - title.length) / 2);
  const centered = title.padStart(left + title.length).padEnd(BOX_WIDTH);
  return [
    c(CYAN, `  ╔${"═".repeat(BOX_WIDTH)}╗`),
    c(CYAN, "  ║") + c(BOLD, centered) + c(CYAN, "║"),
    c(CYAN, `  ╚${"═".repeat(BOX_WIDTH)}╝`),
  ];
}

export function formatReport(reports: AssetReport[], meta: ReportMeta, options: FormatOptions): string {
  switch (options.format) {
    case "json":
      return formatJson(reports, meta);
    case "table":
    default:
      return formatTable(reports, meta, painter(options.color ?? true));
  }
}

function formatJson(reports: AssetReport[], meta: ReportMeta): string {
  return JSON.stringify(
    {
      domain: meta.domain,
      mode: meta.config.mode,
      interrupted: meta.interrupted === true,
      summary: summarizeAudit(reports),
      assets: reports,
    },
    null,
    2,
  );
}

function tlsCell(report: AssetReport): string {
  const { tls } = report;
  if (!tls.checked) return "skipped";
  if (!tls.valid) return "invalid";
  if (tls.quantumSafe) return "pq-hybrid";
  return tls.protocolVersion;
}

function geoCell(report: AssetReport): string {
  return report.geo.resolved ? report.geo.country.slice(0, 14) : "unresolved";
}

function quantumCell(report: AssetReport, config: ScanConfiguration): string {
  if (!config.enableQuantum) return "off";
  return `${report.quantum.urgency} (${report.quantum.vulnerabilityYear})`;
}

const COLUMNS = { criticality: 13, risk: 6, level: 10, tls: 11, geo: 16, quantum: 12 };

function formatTable(reports: AssetReport[], meta: ReportMeta, c: Paint): string {
  const lines: string[] = [];
  const summary = summarizeAudit(reports);

  lines.push("");
  lines.push(...banner("QUANTUM RISK SURFACE REPORT", c));
  lines.push("");
  lines.push(`  Domain: ${c(BOLD, meta.domain)}   Mode: ${meta.config.mode}`);
  if (meta.interrupted) {
    lines.push(c(YELLOW, "  Scan interrupted: showing completed assets only"));
  }
  lines.push("");

  // Breakdown bar
  const parts: string[] = [];
  for (const level of ["CRITICAL", "HIGH", "MODERATE", "LOW"] as const) {
    const count = summary.byRiskLevel[level];
    if (count > 0) parts.push(c(levelColor(level), `${level} ${count}`));
  }
  if (parts.length > 0) {
    lines.push(`  ${parts.join("  ")}`);
  }

  if (reports.length === 0) {
    lines.push(c(GREEN, "  No assets audited."));
    lines.push("");
    return lines.join("\n");
  }

  lines.push(
    `  Average risk: ${c(BOLD, String(summary.averageRiskScore))}${c(DIM, "/100")}` +
    `   Harvest-now exposure: ${summary.harvestNowExposed} of ${summary.totalAssets}`,
  );
  lines.push("");

  const hostW = Math.max(4, ...reports.map((r) => r.asset.hostname.length)) + 2;
  const width = hostW + Object.values(COLUMNS).reduce((a, b) => a + b, 0);

  lines.push(
    "  " +
    c(BOLD, "HOST".padEnd(hostW)) +
    c(BOLD, "CRITICALITY".padEnd(COLUMNS.criticality)) +
    c(BOLD, "RISK".padEnd(COLUMNS.risk)) +
    c(BOLD, "LEVEL".padEnd(COLUMNS.level)) +
    c(BOLD, "TLS".padEnd(COLUMNS.tls)) +
    c(BOLD, "GEO".padEnd(COLUMNS.geo)) +
    c(BOLD, "QUANTUM"),
  );
  lines.push(`  ${"─".repeat(width)}`);

  for (const r of reports) {
    lines.push(
      "  " +
      r.asset.hostname.padEnd(hostW) +
      r.asset.criticality.padEnd(COLUMNS.criticality) +
      String(r.riskScore).padEnd(COLUMNS.risk) +
      c(levelColor(r.riskLevel), r.riskLevel.padEnd(COLUMNS.level)) +
      tlsCell(r).padEnd(COLUMNS.tls) +
      geoCell(r).padEnd(COLUMNS.geo) +
      quantumCell(r, meta.config),
    );
  }

  lines.push("");
  lines.push(c(BOLD, "  REMEDIATION"));
  lines.push("");
  for (const r of reports) {
    lines.push(`  ${c(DIM, r.asset.hostname.padEnd(hostW))}${r.remediation}`);
    if (meta.config.enableQuantum && r.riskLevel === "CRITICAL") {
      lines.push(
        `  ${" ".repeat(hostW)}${c(DIM, `${r.pqc.migrationPriority}, ${r.pqc.timeline}: ${r.pqc.kemSuite} + ${r.pqc.signatureSuite}`)}`,
      );
    }
  }

  lines.push("");
  lines.push(`  ${reports.length} asset${reports.length === 1 ? "" : "s"} total`);
  lines.push("");

  return lines.join("\n");
}

export function formatModesTable(color = true): string {
  const c = painter(color);
  const lines: string[] = [];

  lines.push("");
  lines.push(...banner("SCAN MODES", c));
  lines.push("");

  const nameW = 16;
  const assetsW = 8;
  const quantumW = 9;
  const delayW = 8;
  const workersW = 9;

  lines.push(
    `  ${c(BOLD, "MODE".padEnd(nameW))}${c(BOLD, "ASSETS".padEnd(assetsW))}${c(BOLD, "QUANTUM".padEnd(quantumW))}${c(BOLD, "DELAY".padEnd(delayW))}${c(BOLD, "WORKERS".padEnd(workersW))}${c(BOLD, "DESCRIPTION")}`,
  );
  lines.push(`  ${"─".repeat(nameW + assetsW + quantumW + delayW + workersW + 40)}`);

  for (const name of SCAN_MODE_NAMES) {
    const m = SCAN_MODES[name];
    const label = name === DEFAULT_SCAN_MODE ? `${name}*` : name;
    lines.push(
      `  ${c(CYAN, label.padEnd(nameW))}${String(m.maxAssets).padEnd(assetsW)}${(m.enableQuantum ? "yes" : "no").padEnd(quantumW)}${`${m.perRequestDelayMs / 1000}s`.padEnd(delayW)}${String(m.concurrency).padEnd(workersW)}${m.description}`,
    );
  }

  lines.push("");
  lines.push(c(DIM, "  * default mode"));
  lines.push("");

  return lines.join("\n");
}
