/**
 * Per-scan HTTP session.
 *
 * One session is opened when a scan starts and closed when it ends, on every
 * exit path. It owns the keep-alive agents, so the connection cap per host
 * towards crt.sh and the geolocation providers holds for the whole scan.
 * Direct connections to the scanned hosts are capped by `HostLimiter`.
 */

import http from "node:http";
import https from "node:https";
import { errorMessage } from "../errors.js";
import { logger } from "../logger.js";

export interface HttpJsonResponse {
  status: number;
  /** Parsed JSON body, or undefined when the body was not valid JSON. */
  body: unknown;
}

export interface HttpGetOptions {
  signal?: AbortSignal;
  headers?: Record<string, string>;
}

/** The only HTTP surface the probes need. Tests substitute an in-process fake. */
export interface HttpClient {
  getJson(url: string, options?: HttpGetOptions): Promise<HttpJsonResponse>;
  close(): Promise<void>;
}

export interface ScanSessionOptions {
  /** Maximum concurrent sockets per host. */
  maxConnectionsPerHost: number;
  /** Maximum concurrent sockets across all hosts. */
  maxConnections?: number;
  /** Responses larger than this are cut off and treated as unparseable. */
  maxBodyBytes?: number;
  userAgent?: string;
}

const DEFAULT_USER_AGENT = "qsurface/0.1 (attack-surface audit)";
const DEFAULT_MAX_BODY_BYTES = 8 * 1024 * 1024;

export class ScanSession implements HttpClient {
  private readonly httpAgent: http.Agent;
  private readonly httpsAgent: https.Agent;
  private readonly maxBodyBytes: number;
  private readonly userAgent: string;
  private closed = false;

  constructor(options: ScanSessionOptions) {
    const agentOptions = {
      keepAlive: true,
      maxSockets: options.maxConnectionsPerHost,
      maxTotalSockets: options.maxConnections ?? options.maxConnectionsPerHost * 2,
    };
    this.httpAgent = new http.Agent(agentOptions);
    this.httpsAgent = new https.Agent(agentOptions);
    this.maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  getJson(url: string, options: HttpGetOptions = {}): Promise<HttpJsonResponse> {
    if (this.closed) return Promise.reject(new Error("session is closed"));
    const target = new URL(url);
    const requestOptions: http.RequestOptions = {
      signal: options.signal,
      headers: {
        "user-agent": this.userAgent,
        accept: "application/json",
        ...options.headers,
      },
    };

    return new Promise<HttpJsonResponse>((resolve, reject) => {
      const onResponse = (res: http.IncomingMessage) => {
        const chunks: Buffer[] = [];
        let size = 0;

        res.on("data", (chunk: Buffer) => {
          size += chunk.length;
          if (size > this.maxBodyBytes) {
            res.destroy(new Error(`response from ${target.host} exceeds ${this.maxBodyBytes} bytes`));
            return;
          }
          chunks.push(chunk);
        });
        res.on("error", reject);
        res.on("end", () => {
          const text = Buffer.concat(chunks).toString("utf-8");
          let body: unknown;
          try {
            body = JSON.parse(text);
          } catch {
            body = undefined;
          }
          resolve({ status: res.statusCode ?? 0, body });
        });
      };

      const req = target.protocol === "https:"
        ? https.get(target, { ...requestOptions, agent: this.httpsAgent }, onResponse)
        : http.get(target, { ...requestOptions, agent: this.httpAgent }, onResponse);
      req.on("error", reject);
    });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
    logger.debug("[session] closed");
  }
}

/**
 * Open a session, run `fn`, and always close the session afterwards,
 * whether `fn` resolves, rejects, or is aborted.
 */
export async function withScanSession<T>(
  open: () => HttpClient,
  fn: (client: HttpClient) => Promise<T>,
): Promise<T> {
  const client = open();
  try {
    return await fn(client);
  } finally {
    try {
      await client.close();
    } catch (err) {
      logger.warn(`[session] close failed: ${errorMessage(err)}`);
    }
  }
}
