import { describe, it, expect } from "vitest";
import { runAudit, assetBudgetMs, sortReports } from "../audit.js";
import { resolveScanConfiguration } from "../config.js";
import { ConfigurationError } from "../errors.js";
import type { SubdomainSource } from "../discovery/types.js";
import type { TlsConnector } from "../probe/tls.js";
import type { GeoProvider } from "../probe/geo.js";
import type { HostResolver } from "../probe/dns.js";
import type { ScanConfiguration } from "../schemas.js";
import {
  FakeHttpClient,
  failingGeoProvider,
  fixedGeoProvider,
  handshake,
  hangForever,
  hangUntilAborted,
  mapResolver,
  okConnector,
} from "./fixtures/fakes.js";

const NOW = () => new Date("2026-06-01T00:00:00Z");

const staticSource = (id: SubdomainSource["id"], names: string[]): SubdomainSource => ({
  id,
  collect: async () => names,
});

const SOURCES = {
  "ct-log": staticSource("ct-log", ["api.example.com", "vault.example.com"]),
  "wordlist-common": staticSource("wordlist-common", ["vpn.example.com"]),
};

const RESOLVER = mapResolver({
  "example.com": "192.0.2.1",
  "api.example.com": "192.0.2.2",
  "vault.example.com": "192.0.2.3",
  "vpn.example.com": "192.0.2.4",
});

function fakeOptions(http = new FakeHttpClient()) {
  return {
    openSession: () => http,
    resolver: RESOLVER,
    geoProviders: [fixedGeoProvider()],
    tlsConnector: okConnector,
    sources: SOURCES,
    now: NOW,
  };
}

describe("runAudit", () => {
  it("scores every discovered asset and sorts by risk, then hostname", async () => {
    const http = new FakeHttpClient();
    const reports = await runAudit("example.com", resolveScanConfiguration("deep-quantum"), fakeOptions(http));

    // 40|25 criticality + 15 classical TLS + 28 quantum (RSA-2048, four years out)
    expect(reports.map((r) => [r.asset.hostname, r.riskScore, r.riskLevel])).toEqual([
      ["api.example.com", 83, "CRITICAL"],
      ["vault.example.com", 83, "CRITICAL"],
      ["example.com", 68, "HIGH"],
      ["vpn.example.com", 68, "HIGH"],
    ]);
    expect(http.closed).toBe(true);
  });

  it("fills in the full report for each asset", async () => {
    const [api] = await runAudit("example.com", resolveScanConfiguration("deep-quantum"), fakeOptions());

    expect(api.geo.ip).toBe("192.0.2.2");
    expect(api.geo.resolved).toBe(true);
    expect(api.tls.keyExchange).toBe("X25519");
    expect(api.quantum.vulnerabilityYear).toBe(2030);
    expect(api.quantum.urgency).toBe("URGENT");
    expect(api.pqc.kemSuite).toBe("ML-KEM-1024");
    expect(api.remediation).toBe("QUANTUM THREAT: Migrate to ML-KEM-1024 | Enable hybrid classical-PQC mode");
    expect(api.harvestNowThreat).toBe(true);
    expect(api.assessedAt).toBe("2026-06-01T00:00:00.000Z");
  });

  it("adds the geolocation penalty when every provider fails", async () => {
    const reports = await runAudit("example.com", resolveScanConfiguration("deep-quantum"), {
      ...fakeOptions(),
      geoProviders: [failingGeoProvider("a"), failingGeoProvider("b")],
    });

    expect(reports.map((r) => r.riskScore)).toEqual([93, 93, 78, 78]);
    expect(reports.every((r) => r.geo.country === "Unknown")).toBe(true);
  });

  it("scores an unresolvable host from sentinel records", async () => {
    const reports = await runAudit("example.com", resolveScanConfiguration("deep-quantum"), {
      ...fakeOptions(),
      resolver: mapResolver({}),
    });

    // HIGH 25 + invalid TLS 20 + quantum 28 + unresolved geo 10
    const root = reports.find((r) => r.asset.hostname === "example.com");
    expect(root?.riskScore).toBe(83);
    expect(root?.geo.ip).toBe("N/A");
    expect(root?.tls.valid).toBe(false);
  });

  it("leaves quantum urgency out of the score in standard mode", async () => {
    const reports = await runAudit("example.com", resolveScanConfiguration("standard"), fakeOptions());
    expect(reports.map((r) => r.riskScore)).toEqual([55, 55, 40, 40]);
    expect(reports[0].remediation).toBe("Enable hybrid classical-PQC mode");
  });

  it("throws ConfigurationError synchronously for a bad domain, before opening a session", () => {
    let opened = false;
    const options = { ...fakeOptions(), openSession: () => { opened = true; return new FakeHttpClient(); } };

    expect(() => runAudit("not a domain", resolveScanConfiguration("standard"), options)).toThrow(ConfigurationError);
    expect(() => runAudit("192.0.2.1", resolveScanConfiguration("standard"), options)).toThrow(ConfigurationError);
    expect(opened).toBe(false);
  });

  it("throws ConfigurationError synchronously for an invalid configuration", () => {
    const config: ScanConfiguration = { ...resolveScanConfiguration("standard"), concurrency: 0 };
    try {
      void runAudit("example.com", config, fakeOptions());
      expect.unreachable("runAudit should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      expect(err).toMatchObject({ field: "concurrency" });
    }
  });

  it("audits the remaining sources' hosts when one source fails", async () => {
    const http = new FakeHttpClient();
    const broken: SubdomainSource = {
      id: "ct-log",
      collect: async () => { throw new Error("source exploded"); },
    };

    const reports = await runAudit("example.com", resolveScanConfiguration("standard"), {
      ...fakeOptions(http),
      sources: { ...SOURCES, "ct-log": broken },
    });

    expect(reports.map((r) => [r.asset.hostname, r.riskScore])).toEqual([
      ["example.com", 40],
      ["vpn.example.com", 40],
    ]);
    expect(http.closed).toBe(true);
  });

  it("caps concurrent TLS handshakes to one address at maxConnectionsPerHost", async () => {
    const hosts = ["a", "b", "c", "d", "e", "f", "g", "h"].map((l) => `${l}.example.com`);
    let inFlight = 0;
    let peak = 0;
    const tlsConnector: TlsConnector = async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((r) => setTimeout(r, 15));
      inFlight--;
      return handshake();
    };

    const config = resolveScanConfiguration("deep-quantum", { concurrency: 20, maxConnectionsPerHost: 2 });
    const reports = await runAudit("example.com", config, {
      ...fakeOptions(),
      resolver: async () => "192.0.2.80",
      sources: {
        "ct-log": staticSource("ct-log", hosts),
        "wordlist-common": staticSource("wordlist-common", []),
      },
      tlsConnector,
    });

    expect(reports).toHaveLength(9);
    expect(reports.every((r) => r.tls.valid)).toBe(true);
    expect(peak).toBe(2);
  });

  it("finishes within the per-asset budget when every probe hangs", async () => {
    const config = resolveScanConfiguration("deep-quantum", { timeoutMs: 30, concurrency: 2 });
    const hangingGeo: GeoProvider = { name: "hang", lookup: () => hangForever() };
    const hangingTls: TlsConnector = () => hangForever();

    const started = Date.now();
    const reports = await runAudit("example.com", config, {
      ...fakeOptions(),
      geoProviders: [hangingGeo],
      tlsConnector: hangingTls,
    });
    const elapsed = Date.now() - started;

    expect(reports).toHaveLength(4);
    // two rounds of at most one budget each, plus scheduling slack
    expect(elapsed).toBeLessThan(2 * assetBudgetMs(config, 1) + 500);
    expect(reports.every((r) => !r.tls.valid && !r.geo.resolved)).toBe(true);
  });

  it("falls back to sentinels when a resolver ignores its deadline", async () => {
    const config = resolveScanConfiguration("deep-quantum", { timeoutMs: 30 });
    const resolver: HostResolver = () => hangForever();
    const reports = await runAudit("example.com", config, { ...fakeOptions(), resolver });
    expect(reports).toHaveLength(4);
    expect(reports.every((r) => r.geo.ip === "N/A")).toBe(true);
  });

  it("returns only completed assets when cancelled mid-scan", async () => {
    const controller = new AbortController();
    const http = new FakeHttpClient();
    const tlsConnector: TlsConnector = (target, signal) => {
      if (target.hostname === "b.example.com") {
        controller.abort();
        return hangUntilAborted(signal);
      }
      return Promise.resolve(handshake());
    };

    const reports = await runAudit("example.com", resolveScanConfiguration("deep-quantum", { concurrency: 1 }), {
      ...fakeOptions(http),
      resolver: mapResolver({ "a.example.com": "192.0.2.5", "b.example.com": "192.0.2.6", "c.example.com": "192.0.2.7" }),
      sources: {
        "ct-log": staticSource("ct-log", ["a.example.com", "b.example.com", "c.example.com"]),
        "wordlist-common": staticSource("wordlist-common", []),
      },
      tlsConnector,
      signal: controller.signal,
    });

    expect(reports.map((r) => r.asset.hostname)).toEqual(["a.example.com"]);
    expect(http.closed).toBe(true);
  });

  it("returns nothing when cancelled before it starts", async () => {
    const controller = new AbortController();
    controller.abort();
    const http = new FakeHttpClient();
    const reports = await runAudit("example.com", resolveScanConfiguration("standard"), {
      ...fakeOptions(http),
      signal: controller.signal,
    });
    expect(reports).toEqual([]);
    expect(http.closed).toBe(true);
  });

  it("gives the same scores on repeated runs", async () => {
    const config = resolveScanConfiguration("comprehensive");
    const first = await runAudit("example.com", config, fakeOptions());
    const second = await runAudit("example.com", config, fakeOptions());
    expect(second).toEqual(first);
  });
});

describe("assetBudgetMs", () => {
  it("covers DNS plus the slower of the geo chain and TLS", () => {
    const config = resolveScanConfiguration("deep-quantum");
    // 5000 dns + max(2 * 10000, 10000) + 250
    expect(assetBudgetMs(config, 2)).toBe(25_250);
  });

  it("adds the pacing delay to every call", () => {
    const config = resolveScanConfiguration("stealth");
    // (5000 + 3000) + 2 * (10000 + 3000) + 250
    expect(assetBudgetMs(config, 2)).toBe(34_250);
  });

  it("drops disabled probes", () => {
    const config = resolveScanConfiguration("standard", { enableGeo: false, enableTlsCheck: false });
    expect(assetBudgetMs(config, 2)).toBe(5_250);
  });
});

describe("sortReports", () => {
  it("does not mutate its input", async () => {
    const reports = await runAudit("example.com", resolveScanConfiguration("deep-quantum"), fakeOptions());
    const reversed = [...reports].reverse();
    const copy = [...reversed];
    expect(sortReports(reversed)).toEqual(reports);
    expect(reversed).toEqual(copy);
  });

  it("breaks score ties by code-unit order of the hostname", async () => {
    const [base] = await runAudit("example.com", resolveScanConfiguration("deep-quantum"), fakeOptions());
    const named = ["aa", "a0", "a", "a-b"].map((label) => ({
      ...base,
      asset: { ...base.asset, hostname: `${label}.example.com` },
    }));

    expect(sortReports(named).map((r) => r.asset.hostname)).toEqual([
      "a-b.example.com",
      "a.example.com",
      "a0.example.com",
      "aa.example.com",
    ]);
  });
});
