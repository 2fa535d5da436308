import { setTimeout as sleep } from "node:timers/promises";
import { ProviderUnavailableError } from "./errors";

export interface RetryOptions {
  /** Retries after the first attempt. */
  retries: number;
  /** Delay before the first retry; doubles each time. */
  baseDelayMs: number;
  /** Per-attempt limit; an attempt that takes longer counts as unavailable. */
  timeoutMs: number;
  /** Used in log lines. */
  label: string;
  signal?: AbortSignal;
}

/**
 * Run `fn` under a timeout, retrying {@link ProviderUnavailableError} with
 * exponential backoff (base, 2·base, 4·base, ...). Every other error, and the
 * last transient one, is rethrown unchanged.
 */
export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    opts.signal?.throwIfAborted();
    try {
      return await withTimeout(fn(), opts.timeoutMs, opts.label);
    } catch (err) {
      if (!(err instanceof ProviderUnavailableError) || attempt >= opts.retries) throw err;
      const delay = opts.baseDelayMs * 2 ** attempt;
      console.error(
        `[MCP] ${opts.label} failed (${err.message}); retrying in ${delay}ms (attempt ${attempt + 1}/${opts.retries})`,
      );
      await sleep(delay, undefined, { signal: opts.signal });
    }
  }
}

/** Reject with {@link ProviderUnavailableError} if `work` has not settled within `ms`. */
export async function withTimeout<T>(work: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new ProviderUnavailableError(`${label} timed out after ${ms}ms`)),
      ms,
    );
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
