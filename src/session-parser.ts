import { createHash } from "node:crypto";
import type { PromptDraft, PromptSections } from "./types";
import {
  classify,
  extractTags,
  DEFAULT_RULES,
  DEFAULT_VOCABULARY,
  type RuleTable,
  type TagVocabulary,
} from "./classifier";

/**
 * Transcript formats understood by the parser.
 *  - copilot-cli : Copilot CLI session exports; every `### 👤 User` block is a prompt.
 *  - plain       : free text, prompts separated by `---` lines.
 *  - auto        : copilot-cli when a user heading is present, else plain.
 */
export type SessionFormat = "copilot-cli" | "plain" | "auto";

export interface ParseOptions {
  format?: SessionFormat;
  /** Spans longer than this are skipped. */
  maxPromptChars?: number;
  rules?: RuleTable;
  vocabulary?: TagVocabulary;
}

export interface SessionHeader {
  sessionId?: string;
  started?: string;
}

export interface ParsedSession {
  format: Exclude<SessionFormat, "auto">;
  header: SessionHeader;
  drafts: PromptDraft[];
  /** Spans dropped for exceeding `maxPromptChars`. */
  skipped: number;
}

const USER_HEADING = /^### 👤 User\s*$/m;
const USER_BLOCK = /### 👤 User\s*\n\n([\s\S]*?)(?=\n---|\n### |$)/g;
const PLAIN_SEPARATOR = /^[ \t]*-{3,}[ \t]*$/m;

const SECTION_MARKERS: ReadonlyArray<[keyof PromptSections, readonly string[]]> = [
  ["role", ["ROL", "ROLE"]],
  ["context", ["CONTEXTO", "CONTEXT"]],
  ["objective", ["OBJETIVO", "OBJECTIVE"]],
];

const TITLE_MAX = 60;

export function detectFormat(text: string): Exclude<SessionFormat, "auto"> {
  return USER_HEADING.test(text) ? "copilot-cli" : "plain";
}

/** Read `Session ID` / `Started` from a transcript header, when present. */
export function parseSessionHeader(text: string): SessionHeader {
  const header: SessionHeader = {};
  const id = /Session ID:.*?`([^`]+)`/.exec(text);
  if (id) header.sessionId = id[1].trim();
  const started = /Started:.*?(\d{1,2}\/\d{1,2}\/\d{4}, \d{1,2}:\d{2}:\d{2})/.exec(text);
  if (started) header.started = started[1];
  return header;
}

/** Split a transcript into raw prompt spans (trimmed, empty spans dropped). */
export function splitSpans(text: string, format: Exclude<SessionFormat, "auto">): string[] {
  const raw =
    format === "copilot-cli"
      ? Array.from(text.matchAll(USER_BLOCK), (m) => m[1])
      : text.split(PLAIN_SEPARATOR);
  return raw.map((s) => s.trim()).filter((s) => s.length > 0);
}

/**
 * Pull `## ROLE` / `## CONTEXT` / `## OBJECTIVE` sections (Spanish headings
 * and a leading emoji are accepted too). Each section runs to the next `##`.
 */
export function extractSections(text: string): PromptSections {
  const sections: PromptSections = {};
  for (const [key, names] of SECTION_MARKERS) {
    const pattern = new RegExp(
      `^##[ \\t]+(?:\\p{Extended_Pictographic}\\uFE0F?[ \\t]+)?(?:${names.join("|")})\\b[^\\n]*\\n([\\s\\S]*?)(?=^##|(?![\\s\\S]))`,
      "imu",
    );
    const match = pattern.exec(text);
    const body = match?.[1].trim();
    if (body) sections[key] = body;
  }
  return sections;
}

/** First meaningful heading or line, trimmed to a short title. */
export function generateTitle(text: string, maxLength = TITLE_MAX): string {
  const clip = (s: string) => (s.length > maxLength ? `${s.slice(0, maxLength)}...` : s);
  for (const line of text.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    if (trimmed.startsWith("#")) {
      const heading = trimmed.replace(/^#+/, "").trim();
      if (heading && !heading.toLowerCase().startsWith("prompt")) return clip(heading);
      continue;
    }
    const plain = trimmed.replace(/\*/g, "").trim();
    if (plain) return clip(plain);
  }
  return "Untitled Prompt";
}

/** Classify, tag and title a single prompt text. */
export function draftPrompt(
  text: string,
  rules: RuleTable = DEFAULT_RULES,
  vocabulary: TagVocabulary = DEFAULT_VOCABULARY,
): PromptDraft {
  return {
    text,
    category: classify(text, rules),
    title: generateTitle(text),
    tags: extractTags(text, vocabulary),
    sections: extractSections(text),
  };
}

/**
 * Turn a raw transcript into prompt drafts, in span order. Never throws on
 * malformed input: a transcript without recognisable spans gives no drafts.
 * Spans repeated verbatim within the session are kept once.
 */
export function parseSession(text: string, options: ParseOptions = {}): ParsedSession {
  const requested = options.format ?? "auto";
  const format = requested === "auto" ? detectFormat(text) : requested;
  const max = options.maxPromptChars ?? Number.POSITIVE_INFINITY;
  const seen = new Set<string>();
  const drafts: PromptDraft[] = [];
  let skipped = 0;
  for (const span of splitSpans(text, format)) {
    if (span.length > max) {
      skipped++;
      continue;
    }
    if (seen.has(span)) continue;
    seen.add(span);
    drafts.push(draftPrompt(span, options.rules, options.vocabulary));
  }
  return { format, header: parseSessionHeader(text), drafts, skipped };
}

/**
 * Stable prompt id: the same text from the same source always maps to the
 * same id, so re-ingesting a session is idempotent.
 */
export function promptId(source: string, text: string): string {
  return createHash("sha256").update(`${source}\u0000${text}`).digest("hex").slice(0, 16);
}

/** Source identifier for a session: explicit, from its header, or derived from its text. */
export function sessionSource(text: string, explicit?: string): string {
  const trimmed = explicit?.trim();
  if (trimmed) return trimmed;
  const fromHeader = parseSessionHeader(text).sessionId;
  if (fromHeader) return fromHeader;
  return `session-${createHash("sha256").update(text).digest("hex").slice(0, 12)}`;
}
