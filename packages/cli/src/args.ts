import { ConfigurationError } from "@qsurface/engine";

export interface ParsedArgs {
  command: string;
  args: Record<string, string>;
  positional: string[];
}

const BOOLEAN_FLAGS = new Set([
  "help", "version", "verbose", "quiet",
  "no-quantum", "no-tls", "no-geo",
]);

const KNOWN_FLAGS = new Set([
  ...BOOLEAN_FLAGS,
  "mode", "max-assets", "timeout", "delay", "concurrency",
  "max-connections-per-host",
  "format", "output", "fail-on",
]);

export function parseArgs(argv: string[]): ParsedArgs {
  const command = argv[0] || "";
  const args: Record<string, string> = {};
  const positional: string[] = [];

  for (let i = 1; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith("--")) {
      const key = arg.slice(2);

      if (!KNOWN_FLAGS.has(key)) {
        process.stderr.write(`[qsurface] Warning: unknown flag --${key}\n`);
      }

      if (BOOLEAN_FLAGS.has(key)) {
        args[key] = "true";
      } else {
        const value = argv[i + 1];
        if (value === undefined || value.startsWith("--")) {
          throw new ConfigurationError(key, `--${key} requires a value`);
        }
        args[key] = value;
        i++;
      }
    } else if (arg.startsWith("-")) {
      const key = arg.slice(1);
      if (key === "h") args["help"] = "true";
      else if (key === "v") args["version"] = "true";
      else if (key === "m") args["mode"] = argv[++i] || "";
      else if (key === "o") args["output"] = argv[++i] || "";
      else process.stderr.write(`[qsurface] Warning: unknown flag -${key}\n`);
    } else {
      positional.push(arg);
    }
  }

  // Handle --verbose / --quiet
  if (args["verbose"] === "true") {
    process.env.QSURFACE_LOG_LEVEL = "debug";
  } else if (args["quiet"] === "true") {
    process.env.QSURFACE_LOG_LEVEL = "error";
  }

  return { command, args, positional };
}

/** Read a whole-number flag; undefined when absent. */
export function intFlag(args: Record<string, string>, key: string): number | undefined {
  const raw = args[key];
  if (raw === undefined) return undefined;
  if (!/^\d+$/.test(raw)) {
    throw new ConfigurationError(key, `--${key} expects a whole number, got '${raw}'`);
  }
  return Number.parseInt(raw, 10);
}
