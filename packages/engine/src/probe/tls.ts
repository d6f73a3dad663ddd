/**
 * TLS handshake inspection on port 443.
 *
 * Uses Node's bundled trust store with certificate verification on, so an
 * untrusted, expired or mismatched certificate fails the handshake and the
 * asset is recorded as `valid: false`. Quantum safety is a token match on
 * the negotiated cipher and key-exchange group names.
 */

import tls from "node:tls";
import { withTimeout } from "../net/timeout.js";
import { errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { TLSRecord } from "../schemas.js";
import type { ProbeContext } from "./types.js";

/** Hybrid / post-quantum key-exchange markers, compared without separators. */
export const QUANTUM_SAFE_TOKENS = ["CECPQ2", "KYBER", "MLKEM", "NTRU"] as const;

export interface TlsTarget {
  hostname: string;
  ip: string;
  port: number;
}

export interface TlsHandshake {
  protocol: string | null;
  cipher: string | null;
  /** Negotiated key-exchange group, e.g. "X25519" or "X25519MLKEM768". */
  keyExchange: string | null;
  issuer: string | null;
}

export type TlsConnector = (target: TlsTarget, signal: AbortSignal) => Promise<TlsHandshake>;

export function isQuantumSafe(...names: Array<string | null | undefined>): boolean {
  return names.some((name) => {
    if (!name) return false;
    const compact = name.toUpperCase().replace(/[^A-Z0-9]/g, "");
    return QUANTUM_SAFE_TOKENS.some((token) => compact.includes(token));
  });
}

export function uncheckedTls(): TLSRecord {
  return {
    checked: false,
    valid: false,
    protocolVersion: "N/A",
    cipherSuite: "Unknown",
    keyExchange: "Unknown",
    issuer: "N/A",
    quantumSafe: false,
  };
}

export function invalidTls(): TLSRecord {
  return { ...uncheckedTls(), checked: true };
}

/** Connect by IP with SNI set to the hostname, so DNS is not repeated. */
export const nodeTlsConnector: TlsConnector = (target, signal) =>
  new Promise<TlsHandshake>((resolve, reject) => {
    const socket = tls.connect({
      host: target.ip,
      port: target.port,
      servername: target.hostname,
      ALPNProtocols: ["h2", "http/1.1"],
    });

    const onAbort = () => socket.destroy(new Error("tls probe aborted"));
    signal.addEventListener("abort", onAbort, { once: true });

    socket.once("secureConnect", () => {
      signal.removeEventListener("abort", onAbort);

      const keyInfo = socket.getEphemeralKeyInfo();
      const keyExchange = keyInfo && "name" in keyInfo && typeof keyInfo.name === "string"
        ? keyInfo.name
        : null;
      const peer = socket.getPeerCertificate();

      resolve({
        protocol: socket.getProtocol(),
        cipher: socket.getCipher()?.name ?? null,
        keyExchange,
        issuer: peer?.issuer?.O ?? peer?.issuer?.CN ?? null,
      });
      socket.end();
    });

    socket.once("error", (err) => {
      signal.removeEventListener("abort", onAbort);
      socket.destroy();
      reject(err);
    });
  });

export async function probeTls(hostname: string, ip: string, ctx: ProbeContext): Promise<TLSRecord> {
  if (!ctx.config.enableTlsCheck) return uncheckedTls();

  try {
    await ctx.pace(ctx.signal);
    const hs = await ctx.hostSlots.run(
      ip,
      () => withTimeout(
        `tls ${hostname}`,
        ctx.config.timeoutMs,
        (s) => ctx.tlsConnector({ hostname, ip, port: 443 }, s),
        ctx.signal,
      ),
      ctx.signal,
    );
    return {
      checked: true,
      valid: true,
      protocolVersion: hs.protocol ?? "Unknown",
      cipherSuite: hs.cipher ?? "Unknown",
      keyExchange: hs.keyExchange ?? "Unknown",
      issuer: hs.issuer ?? "Unknown",
      quantumSafe: isQuantumSafe(hs.cipher, hs.keyExchange),
    };
  } catch (err) {
    if (ctx.signal?.aborted) throw err;
    logger.debug(`[tls] ${hostname}: ${errorMessage(err)}`);
    return invalidTls();
  }
}
