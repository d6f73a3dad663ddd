#!/usr/bin/env node

import { ConfigurationError, DEFAULT_SCAN_MODE, SCAN_MODE_NAMES } from "@qsurface/engine";
import { parseArgs, intFlag } from "./args.js";
import { runScan, type ScanOptions } from "./commands/scan.js";
import { runModes } from "./commands/modes.js";

const VERSION = "0.1.0";

function printHelp(): void {
  process.stdout.write(`
\x1b[36mqsurface\x1b[0m — attack-surface discovery & quantum-risk audit
\x1b[2mv${VERSION}\x1b[0m

\x1b[1mUSAGE\x1b[0m
  qsurface scan <domain>            Discover and audit a domain's public hosts
  qsurface modes                    List scan modes
  qsurface version                  Print version

\x1b[1mSCAN OPTIONS\x1b[0m
  --mode, -m <name>            ${SCAN_MODE_NAMES.join(", ")} (default: ${DEFAULT_SCAN_MODE})
  --max-assets <n>             Cap on audited hosts (overrides the mode)
  --timeout <ms>               Per-request timeout (default: 10000)
  --delay <ms>                 Pause before every network call
  --concurrency <n>            Assets audited in parallel
  --max-connections-per-host <n>
                               Concurrent connections to one address (default: 5)
  --no-quantum                 Leave quantum urgency out of the score
  --no-tls                     Skip TLS handshakes
  --no-geo                     Skip IP geolocation
  --format <fmt>               Output: table, json (default: table)
  --output, -o <file>          Write report to file
  --fail-on <level>            Exit 1 if any asset is >= level (low, moderate, high, critical)

\x1b[1mEXAMPLES\x1b[0m
  qsurface scan example.com                              Deep quantum audit
  qsurface scan example.com --mode standard              Quick overview
  qsurface scan example.com --mode stealth --delay 5000  Slow and quiet
  qsurface scan example.com --format json -o report.json JSON report to file
  qsurface scan example.com --fail-on critical           CI gate on critical assets

\x1b[1mGLOBAL OPTIONS\x1b[0m
  --verbose                    Set log level to debug
  --quiet                      Suppress info/warn output

\x1b[1mCONFIGURATION\x1b[0m
  .qsurface.yml in the working directory sets defaults; flags win over it.

\x1b[1mENVIRONMENT\x1b[0m
  QSURFACE_LOG_LEVEL                Log level: debug, info, warn, error, silent
  NO_COLOR                          Disable ANSI colors

`);
}

async function main(): Promise<number> {
  const rawArgs = process.argv.slice(2);

  if (rawArgs.length === 0 || rawArgs.includes("--help") || rawArgs.includes("-h")) {
    printHelp();
    return 0;
  }

  if (rawArgs.includes("--version") || rawArgs.includes("-v")) {
    process.stdout.write(`qsurface v${VERSION}\n`);
    return 0;
  }

  const { command, args, positional } = parseArgs(rawArgs);
  const color = process.stdout.isTTY === true && !process.env.NO_COLOR;

  switch (command) {
    case "version":
      process.stdout.write(`qsurface v${VERSION}\n`);
      return 0;

    case "modes":
      runModes(color);
      return 0;

    case "scan": {
      const domain = positional[0];
      if (!domain) {
        throw new ConfigurationError("domain", "usage: qsurface scan <domain>");
      }
      const scanOpts: ScanOptions = {
        domain,
        cwd: process.cwd(),
        mode: args["mode"],
        maxAssets: intFlag(args, "max-assets"),
        timeoutMs: intFlag(args, "timeout"),
        delayMs: intFlag(args, "delay"),
        concurrency: intFlag(args, "concurrency"),
        maxConnectionsPerHost: intFlag(args, "max-connections-per-host"),
        quantum: args["no-quantum"] !== "true",
        tls: args["no-tls"] !== "true",
        geo: args["no-geo"] !== "true",
        format: args["format"] || "table",
        output: args["output"],
        failOn: args["fail-on"],
        color,
      };
      return runScan(scanOpts);
    }

    default:
      process.stderr.write(`Unknown command: ${command}\n`);
      printHelp();
      return 1;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    if (err instanceof ConfigurationError) {
      process.stderr.write(`[qsurface] Error: ${err.message}\n`);
    } else {
      process.stderr.write(`[qsurface] Fatal: ${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
    }
    process.exitCode = 1;
  },
);
