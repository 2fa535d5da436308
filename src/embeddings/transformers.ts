import fs from "node:fs/promises";
import path from "node:path";
import { env, pipeline, type FeatureExtractionPipeline } from "@huggingface/transformers";
import { ProviderUnavailableError } from "../errors";
import { providerIdentity, type EmbeddingProvider } from "./provider";

// The transformers env is process-wide; the first provider to load picks the cache.
let cacheDirInUse: string | null = null;

/**
 * Point the transformers model cache at a filesystem directory (default
 * `.cache/transformers` under the working directory). Must run before the
 * first pipeline is created.
 */
async function useFilesystemCache(cacheDir?: string): Promise<string> {
  if (cacheDirInUse) return cacheDirInUse;
  const dir = cacheDir ?? path.resolve(process.cwd(), ".cache/transformers");
  await fs.mkdir(dir, { recursive: true });
  env.useBrowserCache = false;
  env.cacheDir = dir;
  env.allowLocalModels = true;
  console.error(`[MCP] Transformers cache: ${dir}`);
  cacheDirInUse = dir;
  return dir;
}

/**
 * Local embedding provider backed by an @huggingface/transformers
 * feature-extraction pipeline (mean pooling + L2 normalization). The model is
 * downloaded into the transformers cache on first use and reused afterwards.
 */
export class TransformersProvider implements EmbeddingProvider {
  public readonly kind = "transformers";
  public readonly model: string;
  public readonly dimension: number;
  public readonly identity: string;
  private readonly cacheDir?: string;
  private embedder: FeatureExtractionPipeline | null = null;
  private loading: Promise<FeatureExtractionPipeline> | null = null;

  public constructor(opts: { model: string; dimension: number; cacheDir?: string }) {
    this.model = opts.model;
    this.dimension = opts.dimension;
    this.cacheDir = opts.cacheDir;
    this.identity = providerIdentity(this.kind, this.model);
  }

  /** Lazily initialize the underlying embedding pipeline (idempotent). */
  public async init(): Promise<void> {
    await this.load();
  }

  private async load(): Promise<FeatureExtractionPipeline> {
    if (this.embedder) return this.embedder;
    this.loading ??= (async () => {
      await useFilesystemCache(this.cacheDir);
      console.error(`[MCP] Loading embedding model: ${this.model}`);
      const extractor = await pipeline("feature-extraction", this.model);
      console.error(`[MCP] Model ready: ${this.model}`);
      return extractor;
    })();
    try {
      this.embedder = await this.loading;
      return this.embedder;
    } catch (e) {
      this.loading = null; // allow a later retry
      throw new ProviderUnavailableError(`Could not load embedding model ${this.model}`, {
        cause: e,
      });
    }
  }

  /**
   * Embed a batch in a single pipeline call. The pipeline returns one
   * `[n, dimension]` tensor; it is split into one vector per input.
   */
  public async embed(texts: readonly string[]): Promise<Float32Array[]> {
    if (texts.length === 0) return [];
    const extractor = await this.load();
    const output = await extractor([...texts], { pooling: "mean", normalize: true });
    const data: unknown = output.data;
    if (!(data instanceof Float32Array)) {
      throw new ProviderUnavailableError(`${this.identity} returned a non-float32 tensor`);
    }
    const width = output.dims[output.dims.length - 1] ?? 0;
    const out: Float32Array[] = [];
    for (let i = 0; i < texts.length; i++) {
      out.push(data.slice(i * width, (i + 1) * width));
    }
    return out;
  }
}
