import { describe, it, expect } from "vitest";
import { isQuantumSafe, probeTls, uncheckedTls, invalidTls, type TlsConnector } from "../tls.js";
import { handshake, hangForever } from "../../__tests__/fixtures/fakes.js";
import { probeContext } from "./context.js";

describe("isQuantumSafe", () => {
  it("recognizes hybrid and post-quantum groups", () => {
    expect(isQuantumSafe("X25519MLKEM768")).toBe(true);
    expect(isQuantumSafe("X25519Kyber768Draft00")).toBe(true);
    expect(isQuantumSafe("ML-KEM-768")).toBe(true);
    expect(isQuantumSafe("TLS_AES_128_GCM_SHA256", "CECPQ2")).toBe(true);
  });

  it("rejects classical suites and missing names", () => {
    expect(isQuantumSafe("TLS_AES_256_GCM_SHA384", "X25519")).toBe(false);
    expect(isQuantumSafe("ECDHE-RSA-AES128-GCM-SHA256")).toBe(false);
    expect(isQuantumSafe(null, undefined, "")).toBe(false);
  });
});

describe("probeTls", () => {
  it("records a completed handshake", async () => {
    const record = await probeTls("vpn.example.com", "203.0.113.10", probeContext());
    expect(record).toEqual({
      checked: true,
      valid: true,
      protocolVersion: "TLSv1.3",
      cipherSuite: "TLS_AES_256_GCM_SHA384",
      keyExchange: "X25519",
      issuer: "Test CA",
      quantumSafe: false,
    });
  });

  it("connects by IP with SNI on port 443", async () => {
    const targets: unknown[] = [];
    const connector: TlsConnector = async (target) => {
      targets.push(target);
      return handshake();
    };
    await probeTls("vpn.example.com", "203.0.113.10", probeContext({}, { tlsConnector: connector }));
    expect(targets).toEqual([{ hostname: "vpn.example.com", ip: "203.0.113.10", port: 443 }]);
  });

  it("flags a hybrid key exchange as quantum-safe", async () => {
    const connector: TlsConnector = async () => handshake({ keyExchange: "X25519MLKEM768" });
    const record = await probeTls("vpn.example.com", "203.0.113.10", probeContext({}, { tlsConnector: connector }));
    expect(record.quantumSafe).toBe(true);
    expect(record.keyExchange).toBe("X25519MLKEM768");
  });

  it("fills missing handshake details with Unknown", async () => {
    const connector: TlsConnector = async () => ({ protocol: null, cipher: null, keyExchange: null, issuer: null });
    const record = await probeTls("vpn.example.com", "203.0.113.10", probeContext({}, { tlsConnector: connector }));
    expect(record.protocolVersion).toBe("Unknown");
    expect(record.issuer).toBe("Unknown");
    expect(record.valid).toBe(true);
  });

  it("records a failed handshake as invalid", async () => {
    const connector: TlsConnector = async () => {
      throw new Error("certificate has expired");
    };
    const record = await probeTls("vpn.example.com", "203.0.113.10", probeContext({}, { tlsConnector: connector }));
    expect(record).toEqual(invalidTls());
    expect(record.checked).toBe(true);
    expect(record.valid).toBe(false);
  });

  it("records a hung handshake as invalid after the timeout", async () => {
    const connector: TlsConnector = () => hangForever();
    const record = await probeTls("vpn.example.com", "203.0.113.10", probeContext({ timeoutMs: 20 }, { tlsConnector: connector }));
    expect(record).toEqual(invalidTls());
  });

  it("skips the handshake when TLS checks are disabled", async () => {
    let called = false;
    const connector: TlsConnector = async () => {
      called = true;
      return handshake();
    };
    const record = await probeTls(
      "vpn.example.com",
      "203.0.113.10",
      probeContext({ enableTlsCheck: false }, { tlsConnector: connector }),
    );
    expect(record).toEqual(uncheckedTls());
    expect(called).toBe(false);
  });
});
