/**
 * Minimal structured logger for @qsurface/engine.
 *
 * Respects QSURFACE_LOG_LEVEL env var (debug | info | warn | error | silent).
 * Writes to stderr so stdout stays clean for CLI/CI output.
 */

const LEVELS = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 } as const;
type Level = keyof typeof LEVELS;

function isLevel(raw: string): raw is Level {
  return Object.prototype.hasOwnProperty.call(LEVELS, raw);
}

function parseLevel(raw: string | undefined): number {
  if (!raw) return LEVELS.info;
  const key = raw.toLowerCase();
  return isLevel(key) ? LEVELS[key] : LEVELS.info;
}

// Read on every call so the CLI can change the level after import (--verbose / --quiet).
function enabled(min: number): boolean {
  return parseLevel(process.env.QSURFACE_LOG_LEVEL) <= min;
}

export const logger = {
  debug(msg: string) { if (enabled(LEVELS.debug)) process.stderr.write(`[qsurface] ${msg}\n`); },
  info(msg: string)  { if (enabled(LEVELS.info))  process.stderr.write(`[qsurface] ${msg}\n`); },
  warn(msg: string)  { if (enabled(LEVELS.warn))  process.stderr.write(`[qsurface] ${msg}\n`); },
  error(msg: string) { if (enabled(LEVELS.error)) process.stderr.write(`[qsurface] ${msg}\n`); },
};
