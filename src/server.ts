/**
 * MCP tool surface of the prompt library.
 *
 * Tools are thin: validate arguments with zod, call one library operation,
 * return its result as pretty JSON text. Argument problems become
 * `McpError(InvalidParams)`, unknown tools `McpError(MethodNotFound)`, and
 * library errors an `isError` result carrying `{ error, kind, message }` so
 * the client can tell "fix the input" from "retry" from "rebuild".
 */
import { z } from "zod";
import {
  Server,
  ListToolsRequestSchema,
  CallToolRequestSchema,
  ErrorCode,
  McpError,
  type CallToolResult,
  type Tool,
} from "./mcp-sdk";
import { APP_VERSION } from "./config";
import { PromptLibraryError } from "./errors";
import { MAX_K, type PromptLibrary, type SearchHit } from "./library";
import { fileSource, ingestPending, type SessionSource } from "./session-source";
import { CATEGORIES } from "./types";

export interface ToolContext {
  library: PromptLibrary;
  sessions: SessionSource;
}

const categoryProperty = {
  type: "string",
  enum: [...CATEGORIES],
  description: "Prompt category.",
};

const idProperty = { type: "string", description: "Prompt id (16 hex characters)." };

const kProperty = {
  type: "number",
  description: `Maximum number of prompts to return (1-${MAX_K}). Defaults to 5 if omitted.`,
  minimum: 1,
  maximum: MAX_K,
};

export const TOOLS: Tool[] = [
  {
    name: "search_prompts",
    description:
      "Semantically search the prompt library. Returns the best matching prompts with id, score, title, category, tags and the best matching snippet.",
    inputSchema: {
      type: "object",
      properties: {
        query: {
          type: "string",
          description: "Natural language description of the prompt you are looking for.",
        },
        k: kProperty,
        category: categoryProperty,
      },
      required: ["query"],
    },
  },
  {
    name: "get_prompt",
    description: "Return a prompt's full text and metadata.",
    inputSchema: { type: "object", properties: { id: idProperty }, required: ["id"] },
  },
  {
    name: "find_similar_prompts",
    description: "Find prompts similar to an existing one (the prompt itself is excluded).",
    inputSchema: {
      type: "object",
      properties: { id: idProperty, k: kProperty },
      required: ["id"],
    },
  },
  {
    name: "list_prompts",
    description: "List catalogued prompts, optionally filtered by category, tag or source session.",
    inputSchema: {
      type: "object",
      properties: {
        category: categoryProperty,
        tag: { type: "string", description: "Only prompts carrying this tag." },
        session: { type: "string", description: "Only prompts ingested from this session." },
      },
    },
  },
  {
    name: "get_library_stats",
    description: "Counts per category, chunk and tag totals, and the active embedding provider.",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "index_prompts",
    description:
      "Ingest new or changed session files from the sessions directory. With force=true, rebuild the whole vector index from the prompt files instead.",
    inputSchema: {
      type: "object",
      properties: {
        force: {
          type: "boolean",
          description: "Rebuild the vector index from scratch (needed after switching providers).",
        },
      },
    },
  },
  {
    name: "organize_session",
    description: "Extract, classify and index the prompts of an exported session transcript.",
    inputSchema: {
      type: "object",
      properties: {
        session_path: { type: "string", description: "Path to the exported session markdown file." },
        session_type: {
          type: "string",
          enum: ["copilot-cli", "plain", "auto"],
          description: "Transcript format. Defaults to auto-detection.",
        },
      },
      required: ["session_path"],
    },
  },
  {
    name: "get_prompt_index",
    description: "Return the catalog document: every entry plus the tag and session maps.",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "create_prompt",
    description: "Add a prompt to the library. The category is classified from the text when omitted.",
    inputSchema: {
      type: "object",
      properties: {
        text: { type: "string", description: "Prompt text." },
        category: categoryProperty,
        title: { type: "string", description: "Title (default: derived from the text)." },
        tags: { type: "array", items: { type: "string" }, description: "Extra tags." },
      },
      required: ["text"],
    },
  },
  {
    name: "update_prompt",
    description: "Change a prompt's text, category, title or tags. The id never changes.",
    inputSchema: {
      type: "object",
      properties: {
        id: idProperty,
        text: { type: "string", description: "New prompt text." },
        category: categoryProperty,
        title: { type: "string", description: "New title." },
        tags: { type: "array", items: { type: "string" }, description: "Replacement tag set." },
      },
      required: ["id"],
    },
  },
  {
    name: "delete_prompt",
    description: "Remove a prompt, its vectors and its file.",
    inputSchema: { type: "object", properties: { id: idProperty }, required: ["id"] },
  },
];

const category = z.enum(CATEGORIES);
const id = z.string().trim().min(1);
const k = z.number().int().min(1).max(MAX_K);

const argSchemas = {
  search_prompts: z.object({ query: z.string(), k: k.optional(), category: category.optional() }),
  get_prompt: z.object({ id }),
  find_similar_prompts: z.object({ id, k: k.optional() }),
  list_prompts: z.object({
    category: category.optional(),
    tag: z.string().optional(),
    session: z.string().optional(),
  }),
  get_library_stats: z.object({}),
  index_prompts: z.object({ force: z.boolean().optional() }),
  organize_session: z.object({
    session_path: z.string().trim().min(1),
    session_type: z.enum(["copilot-cli", "plain", "auto"]).optional(),
  }),
  get_prompt_index: z.object({}),
  create_prompt: z.object({
    text: z.string(),
    category: category.optional(),
    title: z.string().optional(),
    tags: z.array(z.string()).optional(),
  }),
  update_prompt: z.object({
    id,
    text: z.string().optional(),
    category: category.optional(),
    title: z.string().optional(),
    tags: z.array(z.string()).optional(),
  }),
  delete_prompt: z.object({ id }),
} as const;

type ToolName = keyof typeof argSchemas;

function isToolName(name: string): name is ToolName {
  return Object.hasOwn(argSchemas, name);
}

function parseArgs<S extends z.ZodTypeAny>(schema: S, tool: string, args: unknown): z.infer<S> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? `${issue.path.join(".")}: ` : "";
    throw new McpError(ErrorCode.InvalidParams, `Invalid arguments for ${tool}: ${where}${issue?.message}`);
  }
  return parsed.data;
}

function json(value: unknown): CallToolResult {
  return { content: [{ type: "text", text: JSON.stringify(value, null, 2) }] };
}

function formatHits(hits: SearchHit[]) {
  return hits.map((h) => ({
    id: h.id,
    score: Number(h.score.toFixed(4)),
    title: h.entry.title,
    category: h.entry.category,
    tags: h.entry.tags,
    filePath: h.entry.filePath,
    snippet: h.snippet,
  }));
}

async function dispatch(ctx: ToolContext, name: ToolName, args: unknown): Promise<CallToolResult> {
  const { library, sessions } = ctx;
  switch (name) {
    case "search_prompts": {
      const a = parseArgs(argSchemas.search_prompts, name, args);
      const hits = await library.search(a.query, { k: a.k, category: a.category });
      return json({ matches: formatHits(hits) });
    }
    case "get_prompt": {
      const a = parseArgs(argSchemas.get_prompt, name, args);
      const { entry, document } = await library.getPrompt(a.id);
      return json({ id: a.id, ...entry, sections: document.sections, text: document.text });
    }
    case "find_similar_prompts": {
      const a = parseArgs(argSchemas.find_similar_prompts, name, args);
      return json({ matches: formatHits(await library.findSimilar(a.id, a.k)) });
    }
    case "list_prompts": {
      const a = parseArgs(argSchemas.list_prompts, name, args);
      const prompts = library.listPrompts(a).map(({ id, entry }) => ({ id, ...entry }));
      return json({ count: prompts.length, prompts });
    }
    case "get_library_stats":
      parseArgs(argSchemas.get_library_stats, name, args);
      return json(library.getStats());
    case "index_prompts": {
      const a = parseArgs(argSchemas.index_prompts, name, args);
      if (a.force) return json({ rebuilt: await library.rebuildIndex() });
      const report = await ingestPending(library, sessions);
      return json({ ingested: report, stats: library.getStats() });
    }
    case "organize_session": {
      const a = parseArgs(argSchemas.organize_session, name, args);
      const file = await sessions.read(a.session_path);
      const source = fileSource(file);
      const ids = await library.ingestSession(file.text, { source, format: a.session_type });
      return json({ source, prompts: ids });
    }
    case "get_prompt_index":
      parseArgs(argSchemas.get_prompt_index, name, args);
      return json(library.catalogSnapshot());
    case "create_prompt": {
      const a = parseArgs(argSchemas.create_prompt, name, args);
      const { text, ...opts } = a;
      return json({ id: await library.createPrompt(text, opts) });
    }
    case "update_prompt": {
      const a = parseArgs(argSchemas.update_prompt, name, args);
      const { id: promptId, ...changes } = a;
      await library.updatePrompt(promptId, changes);
      return json({ id: promptId, updated: true });
    }
    case "delete_prompt": {
      const a = parseArgs(argSchemas.delete_prompt, name, args);
      await library.deletePrompt(a.id);
      return json({ id: a.id, deleted: true });
    }
  }
}

/**
 * Execute one tool call. Exported separately from {@link createServer} so it
 * can be exercised without a transport.
 */
export async function callTool(ctx: ToolContext, name: string, args: unknown): Promise<CallToolResult> {
  if (!isToolName(name)) throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
  try {
    return await dispatch(ctx, name, args);
  } catch (err) {
    if (!(err instanceof PromptLibraryError)) throw err;
    return {
      isError: true,
      content: [
        { type: "text", text: JSON.stringify({ error: err.name, kind: err.kind, message: err.message }) },
      ],
    };
  }
}

/**
 * Factory for MCP Server instances. A fresh server is created per transport
 * session (HTTP mode may serve several clients); the library is shared.
 */
export function createServerFactory(ctx: ToolContext): () => Server {
  return () => {
    const server = new Server(
      { name: "prompt-library", version: APP_VERSION },
      { capabilities: { tools: {} } },
    );
    server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));
    server.setRequestHandler(CallToolRequestSchema, async (req) =>
      callTool(ctx, req.params.name, req.params.arguments),
    );
    return server;
  };
}
