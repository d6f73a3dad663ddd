/**
 * Timeout and pacing helpers shared by every network probe.
 *
 * All waits are cancellable: when the scan-level signal aborts, pending
 * sleeps and timed tasks reject at once instead of holding a worker.
 */

import { AuditAbortedError } from "../errors.js";

export class ProbeTimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = "ProbeTimeoutError";
  }
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new AuditAbortedError();
}

/** Resolve after `ms`, or reject early if `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(abortReason(signal));
  if (ms <= 0) return Promise.resolve();

  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal ? abortReason(signal) : new AuditAbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Run `task` with a hard deadline.
 *
 * The task receives its own signal, aborted when the deadline passes or the
 * parent aborts, so sockets and requests can be torn down. The returned
 * promise settles at the deadline even if the task ignores its signal.
 */
export function withTimeout<T>(
  label: string,
  ms: number,
  task: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal,
): Promise<T> {
  if (parent?.aborted) return Promise.reject(abortReason(parent));

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const finish = (fn: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
      fn();
    };

    const onParentAbort = () => {
      const reason = parent ? abortReason(parent) : new AuditAbortedError();
      controller.abort(reason);
      finish(() => reject(reason));
    };

    const timer = setTimeout(() => {
      const err = new ProbeTimeoutError(label, ms);
      controller.abort(err);
      finish(() => reject(err));
    }, ms);

    parent?.addEventListener("abort", onParentAbort, { once: true });

    task(controller.signal).then(
      (value) => finish(() => resolve(value)),
      (err: unknown) => finish(() => reject(err)),
    );
  });
}
