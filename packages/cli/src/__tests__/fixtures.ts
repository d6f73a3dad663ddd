import {
  assess,
  createAsset,
  invalidTls,
  resolveScanConfiguration,
  score,
  sentinelGeo,
  DEFAULT_CRITICALITY_RULES,
  type AssetReport,
  type GeoRecord,
  type TLSRecord,
} from "@qsurface/engine";

export const AT = new Date("2026-06-01T00:00:00Z");

const berlin: GeoRecord = {
  ip: "192.0.2.20",
  latitude: 52.52,
  longitude: 13.405,
  country: "Germany",
  city: "Berlin",
  isp: "Test ISP",
  timezone: "Europe/Berlin",
  resolved: true,
  provider: "fake-geo",
};

const classicalTls: TLSRecord = {
  checked: true,
  valid: true,
  protocolVersion: "TLSv1.3",
  cipherSuite: "TLS_AES_256_GCM_SHA384",
  keyExchange: "X25519",
  issuer: "Test CA",
  quantumSafe: false,
};

/** vault (98, CRITICAL) and www (68, HIGH) under deep-quantum. */
export function sampleReports(config = resolveScanConfiguration("deep-quantum")): AssetReport[] {
  const quantum = assess("RSA", 2048, 2026);
  const asset = (host: string) => createAsset(host, DEFAULT_CRITICALITY_RULES, "example.com");
  return [
    score(asset("vault.example.com"), sentinelGeo(), invalidTls(), quantum, config, AT),
    score(asset("www.example.com"), berlin, classicalTls, quantum, config, AT),
  ];
}
