import { describe, it, expect, vi } from "vitest";
import { ProviderUnavailableError, ValidationError } from "../src/errors";
import { withRetry, withTimeout } from "../src/retry";

const opts = { retries: 2, baseDelayMs: 0, timeoutMs: 1000, label: "embed" };

describe("withRetry", () => {
  it("retries transient failures", async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new ProviderUnavailableError("down"))
      .mockRejectedValueOnce(new ProviderUnavailableError("still down"))
      .mockResolvedValue("ok");
    await expect(withRetry(fn, opts)).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("surfaces a persistent failure after retries + 1 attempts", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new ProviderUnavailableError("down"));
    await expect(withRetry(fn, opts)).rejects.toBeInstanceOf(ProviderUnavailableError);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("does not retry other errors", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new ValidationError("bad"));
    await expect(withRetry(fn, opts)).rejects.toBeInstanceOf(ValidationError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("treats a slow attempt as unavailable", async () => {
    const fn = () => new Promise<string>(() => {});
    await expect(withRetry(fn, { ...opts, retries: 0, timeoutMs: 20 })).rejects.toThrow(
      "embed timed out after 20ms",
    );
  });

  it("stops when the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort(new Error("cancelled"));
    const fn = vi.fn<() => Promise<string>>().mockResolvedValue("ok");
    await expect(withRetry(fn, { ...opts, signal: controller.signal })).rejects.toThrow("cancelled");
    expect(fn).not.toHaveBeenCalled();
  });
});

describe("withTimeout", () => {
  it("passes through a fast result", async () => {
    await expect(withTimeout(Promise.resolve(42), 1000, "x")).resolves.toBe(42);
  });
});
