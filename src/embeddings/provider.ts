import { DimensionMismatchError, ProviderUnavailableError } from "../errors";

/** Settings for each supported backend, selected by `kind`. */
export type ProviderSettings =
  | {
      kind: "transformers";
      /** Hugging Face model id loadable by @huggingface/transformers. */
      model: string;
      dimension: number;
      /** Model download cache (default `.cache/transformers` under the working directory). */
      cacheDir?: string;
    }
  | {
      kind: "lmstudio";
      /** Base URL of LM Studio's OpenAI-compatible server. */
      url: string;
      model: string;
      dimension: number;
      /** Texts per HTTP request. */
      batchSize: number;
      /** Per-request timeout in ms. */
      timeoutMs: number;
    };

/**
 * Converts text to fixed-size vectors. Each implementation declares its
 * output dimension up front; callers verify every returned vector against it.
 */
export interface EmbeddingProvider {
  readonly kind: string;
  readonly model: string;
  readonly dimension: number;
  /** `kind/model`; stored with every vector to keep collections homogeneous. */
  readonly identity: string;
  /** Prepare the backend (load a model, reach a server). Idempotent. */
  init(): Promise<void>;
  /**
   * Embed a batch of texts, one vector per input in input order.
   * @throws {ProviderUnavailableError} When the backend cannot be reached.
   */
  embed(texts: readonly string[]): Promise<Float32Array[]>;
}

export function providerIdentity(kind: string, model: string): string {
  return `${kind}/${model}`;
}

/**
 * Verify a provider's output: one vector per input, each of the declared
 * dimension.
 * @throws {DimensionMismatchError} On a vector of the wrong length.
 * @throws {ProviderUnavailableError} On a wrong number of vectors.
 */
export function assertEmbeddings(
  provider: Pick<EmbeddingProvider, "identity" | "dimension">,
  vectors: readonly Float32Array[],
  expectedCount: number,
): void {
  if (vectors.length !== expectedCount) {
    throw new ProviderUnavailableError(
      `${provider.identity} returned ${vectors.length} vectors for ${expectedCount} inputs`,
    );
  }
  for (const v of vectors) {
    if (v.length !== provider.dimension) {
      throw new DimensionMismatchError(
        `${provider.identity} returned a ${v.length}-d vector but is configured for ${provider.dimension}`,
        provider.dimension,
        v.length,
      );
    }
  }
}
