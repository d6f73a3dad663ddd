import { describe, it, expect } from "vitest";
import { probe } from "../prober.js";
import { resolveHost } from "../dns.js";
import { sentinelGeo } from "../geo.js";
import { invalidTls, uncheckedTls, type TlsConnector } from "../tls.js";
import type { HostResolver } from "../dns.js";
import { geoRecord, handshake, hangForever } from "../../__tests__/fixtures/fakes.js";
import { probeContext } from "./context.js";

describe("resolveHost", () => {
  it("returns the resolved address", async () => {
    expect(await resolveHost("vpn.example.com", probeContext())).toBe("203.0.113.10");
  });

  it("returns null for a name that does not resolve", async () => {
    expect(await resolveHost("ghost.example.com", probeContext())).toBeNull();
  });

  it("returns null when the resolver hangs", async () => {
    const resolver: HostResolver = () => hangForever();
    expect(await resolveHost("vpn.example.com", probeContext({ timeoutMs: 20 }, { resolver }))).toBeNull();
  });
});

describe("probe", () => {
  it("returns geo and TLS records for a resolvable host", async () => {
    const result = await probe("vpn.example.com", probeContext());
    expect(result.geo).toEqual(geoRecord("203.0.113.10"));
    expect(result.tls.valid).toBe(true);
  });

  it("short-circuits an unresolvable host without further probes", async () => {
    let tlsCalls = 0;
    const connector: TlsConnector = async () => {
      tlsCalls++;
      return handshake();
    };
    const result = await probe("ghost.example.com", probeContext({}, { tlsConnector: connector }));
    expect(result).toEqual({ geo: sentinelGeo(), tls: invalidTls() });
    expect(result.geo.ip).toBe("N/A");
    expect(tlsCalls).toBe(0);
  });

  it("reports unchecked TLS for an unresolvable host when TLS is off", async () => {
    const result = await probe("ghost.example.com", probeContext({ enableTlsCheck: false }));
    expect(result.tls).toEqual(uncheckedTls());
  });

  it("keeps the IP but skips providers when geolocation is disabled", async () => {
    const result = await probe("vpn.example.com", probeContext({ enableGeo: false }));
    expect(result.geo).toEqual(sentinelGeo("203.0.113.10"));
  });

  it("paces every network call", async () => {
    let paced = 0;
    const ctx = probeContext({}, { pace: async () => { paced++; } });
    await probe("vpn.example.com", ctx);
    // dns, one geo provider, tls
    expect(paced).toBe(3);
  });
});
