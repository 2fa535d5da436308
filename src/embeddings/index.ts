import { TransformersProvider } from "./transformers";
import { LmStudioProvider } from "./lmstudio";
import type { EmbeddingProvider, ProviderSettings } from "./provider";

export type { EmbeddingProvider, ProviderSettings } from "./provider";
export { assertEmbeddings, providerIdentity } from "./provider";
export { TransformersProvider } from "./transformers";
export { LmStudioProvider } from "./lmstudio";

/** Instantiate the provider described by `settings` (not yet initialized). */
export function createEmbeddingProvider(settings: ProviderSettings): EmbeddingProvider {
  switch (settings.kind) {
    case "transformers":
      return new TransformersProvider(settings);
    case "lmstudio":
      return new LmStudioProvider(settings);
  }
}
