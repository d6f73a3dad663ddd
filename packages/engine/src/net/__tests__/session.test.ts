import { describe, it, expect, beforeAll, afterAll } from "vitest";
import http from "node:http";
import { ScanSession, withScanSession } from "../session.js";
import { FakeHttpClient } from "../../__tests__/fixtures/fakes.js";

// Loopback stand-in for the geolocation and CT endpoints.
let server: http.Server;
let base = "";
let active = 0;
let peak = 0;

beforeAll(async () => {
  server = http.createServer((req, res) => {
    active++;
    peak = Math.max(peak, active);
    const done = (status: number, body: string) => {
      setTimeout(() => {
        active--;
        res.writeHead(status, { "content-type": "application/json" });
        res.end(body);
      }, 20);
    };

    switch (req.url) {
      case "/json": return done(200, JSON.stringify({ status: "success", ua: req.headers["user-agent"] }));
      case "/html": return done(200, "<html>rate limited</html>");
      case "/missing": return done(404, JSON.stringify({ error: true }));
      default: return done(500, "");
    }
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("loopback server has no port");
  base = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

describe("ScanSession", () => {
  it("parses JSON bodies and sends its user agent", async () => {
    const session = new ScanSession({ maxConnectionsPerHost: 2, userAgent: "qsurface-test" });
    try {
      const res = await session.getJson(`${base}/json`);
      expect(res).toEqual({ status: 200, body: { status: "success", ua: "qsurface-test" } });
    } finally {
      await session.close();
    }
  });

  it("returns an undefined body for non-JSON responses", async () => {
    const session = new ScanSession({ maxConnectionsPerHost: 2 });
    try {
      expect(await session.getJson(`${base}/html`)).toEqual({ status: 200, body: undefined });
      expect(await session.getJson(`${base}/missing`)).toEqual({ status: 404, body: { error: true } });
    } finally {
      await session.close();
    }
  });

  it("never opens more than maxConnectionsPerHost sockets to one host", async () => {
    peak = 0;
    const session = new ScanSession({ maxConnectionsPerHost: 2 });
    try {
      await Promise.all(Array.from({ length: 6 }, () => session.getJson(`${base}/json`)));
    } finally {
      await session.close();
    }
    expect(peak).toBe(2);
  });

  it("rejects requests after close", async () => {
    const session = new ScanSession({ maxConnectionsPerHost: 1 });
    await session.close();
    expect(session.isClosed).toBe(true);
    await expect(session.getJson(`${base}/json`)).rejects.toThrow("session is closed");
  });

  it("aborts an in-flight request", async () => {
    const session = new ScanSession({ maxConnectionsPerHost: 1 });
    const controller = new AbortController();
    try {
      const pending = session.getJson(`${base}/json`, { signal: controller.signal });
      controller.abort();
      await expect(pending).rejects.toThrow();
    } finally {
      await session.close();
    }
  });
});

describe("withScanSession", () => {
  it("closes the client after success", async () => {
    const client = new FakeHttpClient();
    await expect(withScanSession(() => client, async () => "ok")).resolves.toBe("ok");
    expect(client.closed).toBe(true);
  });

  it("closes the client when the body throws", async () => {
    const client = new FakeHttpClient();
    await expect(
      withScanSession(() => client, async () => { throw new Error("probe exploded"); }),
    ).rejects.toThrow("probe exploded");
    expect(client.closed).toBe(true);
  });
});
