import { z } from "zod";
import rulesData from "./data/category-rules.json" with { type: "json" };
import vocabularyData from "./data/tag-vocabulary.json" with { type: "json" };
import { CATEGORIES, type Category } from "./types";
import { ValidationError } from "./errors";

/**
 * Rule-based prompt classification and tagging.
 *
 * The keyword table is versioned data (src/data/category-rules.json): adding
 * a category term never touches control flow. A term matches at the start of
 * a word, so `refactor` counts in "refactoring" but `test` does not count in
 * "latest". A category's score is the number of term occurrences; ties go to
 * the earlier category in `priority`, no match at all gives `general`.
 */

const ruleTableSchema = z
  .object({
    version: z.number().int().positive(),
    priority: z.array(z.enum(CATEGORIES)),
    rules: z.record(z.enum(CATEGORIES), z.array(z.string().trim().min(1))),
  })
  .superRefine((table, ctx) => {
    const ranked = new Set(table.priority);
    if (ranked.size !== table.priority.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "priority lists a category twice" });
    }
    if (ranked.has("general")) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "general is the fallback, not a rule" });
    }
    for (const category of Object.keys(table.rules)) {
      if (!table.priority.some((c) => c === category)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `rules for '${category}' have no priority rank`,
        });
      }
    }
  });

const vocabularySchema = z.object({
  version: z.number().int().positive(),
  terms: z.array(z.string().trim().min(1)),
});

interface CompiledRule {
  readonly category: Category;
  readonly patterns: readonly RegExp[];
}

/** Validated, compiled keyword table. */
export interface RuleTable {
  readonly version: number;
  /** Rules in tie-break order. */
  readonly rules: readonly CompiledRule[];
}

interface CompiledTerm {
  readonly tag: string;
  readonly pattern: RegExp;
}

export interface TagVocabulary {
  readonly version: number;
  readonly terms: readonly CompiledTerm[];
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Matches `term` where it starts a word (optionally also where it ends one). */
function wordPattern(term: string, wholeWord: boolean): RegExp {
  const tail = wholeWord ? "(?![\\p{L}\\p{N}_])" : "";
  return new RegExp(`(?<![\\p{L}\\p{N}_])${escapeRegExp(term.toLowerCase())}${tail}`, "gu");
}

/**
 * Validate and compile a keyword table.
 * @throws {ValidationError} If the table is malformed.
 */
export function loadRuleTable(data: unknown): RuleTable {
  const parsed = ruleTableSchema.safeParse(data);
  if (!parsed.success) {
    throw new ValidationError(`Invalid category rule table: ${parsed.error.issues[0]?.message}`);
  }
  const { version, priority, rules } = parsed.data;
  return {
    version,
    rules: priority.map((category) => ({
      category,
      patterns: (rules[category] ?? []).map((term) => wordPattern(term, false)),
    })),
  };
}

/**
 * Validate and compile a tag vocabulary. Terms ending in `*` match any word
 * they start; the others match whole words only.
 */
export function loadTagVocabulary(data: unknown): TagVocabulary {
  const parsed = vocabularySchema.safeParse(data);
  if (!parsed.success) {
    throw new ValidationError(`Invalid tag vocabulary: ${parsed.error.issues[0]?.message}`);
  }
  return {
    version: parsed.data.version,
    terms: parsed.data.terms.map((raw) => {
      const prefix = raw.endsWith("*");
      const tag = (prefix ? raw.slice(0, -1) : raw).toLowerCase();
      return { tag, pattern: wordPattern(tag, !prefix) };
    }),
  };
}

export const DEFAULT_RULES: RuleTable = loadRuleTable(rulesData);
export const DEFAULT_VOCABULARY: TagVocabulary = loadTagVocabulary(vocabularyData);

/** Occurrence count per ruled category, in priority order. */
export function scoreCategories(text: string, table: RuleTable = DEFAULT_RULES): Map<Category, number> {
  const lower = text.toLowerCase();
  const scores = new Map<Category, number>();
  for (const rule of table.rules) {
    let score = 0;
    for (const pattern of rule.patterns) score += lower.match(pattern)?.length ?? 0;
    scores.set(rule.category, score);
  }
  return scores;
}

export function classify(text: string, table: RuleTable = DEFAULT_RULES): Category {
  let best: Category = "general";
  let bestScore = 0;
  // Map preserves priority order; strict > keeps the earlier category on ties.
  for (const [category, score] of scoreCategories(text, table)) {
    if (score > bestScore) {
      best = category;
      bestScore = score;
    }
  }
  return best;
}

/** Vocabulary terms present in `text`, sorted. */
export function extractTags(text: string, vocabulary: TagVocabulary = DEFAULT_VOCABULARY): string[] {
  const lower = text.toLowerCase();
  const found = new Set<string>();
  for (const term of vocabulary.terms) {
    if (lower.match(term.pattern)) found.add(term.tag);
  }
  return [...found].sort();
}

/** Trim, lower-case, de-duplicate and sort caller-supplied tags. */
export function normalizeTags(tags: Iterable<string>): string[] {
  const out = new Set<string>();
  for (const t of tags) {
    const v = t.trim().toLowerCase();
    if (v) out.add(v);
  }
  return [...out].sort();
}
