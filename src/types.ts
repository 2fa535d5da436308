/**
 * Shared prompt / chunk / catalog types used throughout the library.
 */

/** Closed set of prompt categories. `general` is the fallback. */
export const CATEGORIES = [
  "refactoring",
  "testing",
  "debugging",
  "implementation",
  "documentation",
  "code-review",
  "general",
] as const;

export type Category = (typeof CATEGORIES)[number];

export function isCategory(value: string): value is Category {
  return CATEGORIES.some((c) => c === value);
}

/** Optional structured sections found in prompts written as role/context/objective. */
export interface PromptSections {
  role?: string;
  context?: string;
  objective?: string;
}

/**
 * How a prompt entered the library. Only `session` prompts are removed when
 * their session is re-ingested without them.
 */
export const PROMPT_ORIGINS = ["session", "manual"] as const;
export type PromptOrigin = (typeof PROMPT_ORIGINS)[number];

/** A prompt extracted from a session (or supplied directly), before it is stored. */
export interface PromptDraft {
  readonly text: string;
  readonly category: Category;
  readonly title: string;
  readonly tags: readonly string[];
  readonly sections: PromptSections;
}

/** The full prompt as held in its markdown file. */
export interface PromptDocument {
  readonly id: string;
  readonly title: string;
  readonly category: Category;
  readonly tags: readonly string[];
  /** ISO timestamp of creation. */
  readonly createdAt: string;
  /** Source session identifier ("manual" for prompts created directly). */
  readonly session: string;
  readonly origin: PromptOrigin;
  readonly sections: PromptSections;
  readonly text: string;
}

/**
 * A window of a prompt's text used as one embedding input. Never stored on
 * its own; regenerated from the prompt text whenever needed.
 */
export interface Chunk {
  readonly promptId: string;
  /** Sequence index within the prompt (0-based). */
  readonly index: number;
  readonly text: string;
  /** Start offset (inclusive) in the prompt text. */
  readonly start: number;
  /** End offset (exclusive) in the prompt text. */
  readonly end: number;
}

/** Durable metadata record for an indexed prompt. */
export interface CatalogEntry {
  readonly category: Category;
  readonly title: string;
  readonly tags: readonly string[];
  /** Prompt file path relative to the prompts directory (forward slashes). */
  readonly filePath: string;
  readonly chunkCount: number;
  readonly session: string;
  readonly origin: PromptOrigin;
  readonly createdAt: string;
  readonly indexedAt: string;
}

/** Payload stored alongside each chunk vector. */
export interface ChunkPayload {
  readonly promptId: string;
  readonly chunkIndex: number;
  readonly start: number;
  readonly end: number;
  readonly category: Category;
  readonly text: string;
}
