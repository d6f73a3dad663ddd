/**
 * Per-host connection slots for direct connections to the scanned domain.
 *
 * The HTTP agents in `ScanSession` cap sockets to crt.sh and the geolocation
 * providers; TLS handshakes bypass them, so they take a slot here keyed by
 * the target IP. Subdomains behind one address share its slots.
 */

import { AuditAbortedError } from "../errors.js";

interface Waiter {
  grant(): void;
}

export class HostLimiter {
  private readonly active = new Map<string, number>();
  private readonly queues = new Map<string, Waiter[]>();

  constructor(readonly maxPerHost: number) {}

  /** Connections currently holding a slot for `host`. */
  inFlight(host: string): number {
    return this.active.get(host) ?? 0;
  }

  async run<T>(host: string, task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(host, signal);
    try {
      return await task();
    } finally {
      this.release(host);
    }
  }

  private acquire(host: string, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason instanceof Error ? signal.reason : new AuditAbortedError());
    }
    const held = this.inFlight(host);
    if (held < this.maxPerHost) {
      this.active.set(host, held + 1);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const queue = this.queues.get(host) ?? [];
      const onAbort = () => {
        const at = queue.indexOf(waiter);
        if (at !== -1) queue.splice(at, 1);
        if (queue.length === 0) this.queues.delete(host);
        reject(signal?.reason instanceof Error ? signal.reason : new AuditAbortedError());
      };
      const waiter: Waiter = {
        grant: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve();
        },
      };
      queue.push(waiter);
      this.queues.set(host, queue);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  private release(host: string): void {
    const queue = this.queues.get(host);
    const next = queue?.shift();
    if (queue && queue.length === 0) this.queues.delete(host);
    if (next) {
      // Slot passes straight to the next waiter; the count is unchanged.
      next.grant();
      return;
    }
    const held = this.inFlight(host) - 1;
    if (held > 0) this.active.set(host, held);
    else this.active.delete(host);
  }
}
