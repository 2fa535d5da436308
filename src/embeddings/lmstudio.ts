import { z } from "zod";
import { ProviderError, ProviderUnavailableError } from "../errors";
import { providerIdentity, type EmbeddingProvider } from "./provider";

/** Client errors that may pass on their own; every other 4xx is a request LM Studio will keep refusing. */
const TRANSIENT_CLIENT_STATUSES = new Set([408, 429]);

const embeddingsResponseSchema = z.object({
  data: z.array(z.object({ index: z.number().int(), embedding: z.array(z.number()) })),
});

/**
 * Embedding provider for LM Studio's OpenAI-compatible server
 * (`POST /v1/embeddings`). Inputs are sent in batches of `batchSize`; the
 * response items are re-ordered by `index` since the server may return them
 * in any order.
 */
export class LmStudioProvider implements EmbeddingProvider {
  public readonly kind = "lmstudio";
  public readonly model: string;
  public readonly dimension: number;
  public readonly identity: string;
  private readonly baseUrl: string;
  private readonly batchSize: number;
  private readonly timeoutMs: number;

  public constructor(opts: {
    url: string;
    model: string;
    dimension: number;
    batchSize: number;
    timeoutMs: number;
  }) {
    this.baseUrl = opts.url.replace(/\/+$/, "");
    this.model = opts.model;
    this.dimension = opts.dimension;
    this.batchSize = Math.max(1, opts.batchSize);
    this.timeoutMs = opts.timeoutMs;
    this.identity = providerIdentity(this.kind, this.model);
  }

  /** Query `/v1/models` so a misconfigured URL fails at start-up rather than on first use. */
  public async init(): Promise<void> {
    const res = await this.request("/v1/models", { method: "GET" });
    console.error(`[MCP] Connected to LM Studio at ${this.baseUrl} (HTTP ${res.status})`);
  }

  public async embed(texts: readonly string[]): Promise<Float32Array[]> {
    const out: Float32Array[] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      const res = await this.request("/v1/embeddings", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ model: this.model, input: batch }),
      });
      let body: unknown;
      try {
        body = await res.json();
      } catch (e) {
        throw new ProviderUnavailableError(`LM Studio returned a non-JSON body`, { cause: e });
      }
      const parsed = embeddingsResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new ProviderUnavailableError(
          `LM Studio returned an unexpected embeddings payload: ${parsed.error.issues[0]?.message}`,
        );
      }
      const sorted = [...parsed.data.data].sort((a, b) => a.index - b.index);
      for (const item of sorted) out.push(Float32Array.from(item.embedding));
    }
    return out;
  }

  private async request(pathname: string, init: RequestInit): Promise<Response> {
    const url = `${this.baseUrl}${pathname}`;
    let res: Response;
    try {
      res = await fetch(url, { ...init, signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (e) {
      throw new ProviderUnavailableError(`Cannot reach LM Studio at ${url}`, { cause: e });
    }
    if (!res.ok) {
      const detail = await res.text().catch(() => "");
      const message = `LM Studio ${pathname} failed with HTTP ${res.status}: ${detail.slice(0, 200)}`;
      if (res.status >= 400 && res.status < 500 && !TRANSIENT_CLIENT_STATUSES.has(res.status)) {
        // Unknown model, bad URL path: check LMSTUDIO_URL and LMSTUDIO_MODEL.
        throw new ProviderError("input", message);
      }
      throw new ProviderUnavailableError(message);
    }
    return res;
  }
}
