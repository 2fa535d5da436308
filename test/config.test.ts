import path from "node:path";
import { describe, it, expect } from "vitest";
import { parseConfig } from "../src/config";
import { ValidationError } from "../src/errors";

const cwd = path.resolve("/work");

describe("parseConfig", () => {
  it("applies defaults", () => {
    const config = parseConfig({}, cwd);
    expect(config.PROMPTS_DIR).toBe(path.join(cwd, "prompts"));
    expect(config.SESSIONS_DIR).toBe(path.join(cwd, "sessions"));
    expect(config.VECTOR_DB_DIR).toBe(path.join(cwd, "prompts", ".vectordb"));
    expect(config.SESSION_GLOB).toBe("copilot-session-*.md");
    expect(config.PROVIDER).toEqual({
      kind: "transformers",
      model: "Xenova/all-MiniLM-L6-v2",
      dimension: 384,
    });
    expect(config.CHUNK_SIZE).toBe(500);
    expect(config.CHUNK_OVERLAP).toBe(100);
    expect(config.MAX_PROMPT_CHARS).toBe(20000);
    expect(config.SEARCH_FANOUT).toBe(3);
    expect(config.EMBED_RETRIES).toBe(3);
    expect(config.INGEST_ON_START).toBe(true);
    expect(config.VERBOSE).toBe(false);
    expect(config.MCP_TRANSPORT).toBe("stdio");
    expect(config.MCP_PORT).toBe(3000);
    expect(config.ALLOWED_HOSTS).toBeUndefined();
  });

  it("is immutable", () => {
    const config = parseConfig({}, cwd);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.PROVIDER)).toBe(true);
  });

  it("selects LM Studio", () => {
    const config = parseConfig(
      {
        EMBEDDING_PROVIDER: "LM-Studio",
        LMSTUDIO_URL: "http://box:1234",
        LMSTUDIO_DIMENSION: "1024",
        EMBED_TIMEOUT_MS: "5000",
      },
      cwd,
    );
    expect(config.PROVIDER).toEqual({
      kind: "lmstudio",
      url: "http://box:1234",
      model: "nomic-embed-text",
      dimension: 1024,
      batchSize: 10,
      timeoutMs: 5000,
    });
  });

  it("fails fast on an unknown provider or transport", () => {
    expect(() => parseConfig({ EMBEDDING_PROVIDER: "openai" }, cwd)).toThrow(ValidationError);
    expect(() => parseConfig({ MCP_TRANSPORT: "websocket" }, cwd)).toThrow(ValidationError);
  });

  it("falls back to 15% overlap when overlap >= size", () => {
    const config = parseConfig({ CHUNK_SIZE: "200", CHUNK_OVERLAP: "300" }, cwd);
    expect(config.CHUNK_SIZE).toBe(200);
    expect(config.CHUNK_OVERLAP).toBe(30);
  });

  it("clamps and ignores bad numbers", () => {
    expect(parseConfig({ CHUNK_SIZE: "99999" }, cwd).CHUNK_SIZE).toBe(8000);
    expect(parseConfig({ CHUNK_SIZE: "abc" }, cwd).CHUNK_SIZE).toBe(500);
  });

  it("resolves relative paths and parses lists and flags", () => {
    const config = parseConfig(
      {
        PROMPTS_DIR: "lib",
        ALLOWED_HOSTS: "a, b,,",
        VERBOSE: "yes",
        INGEST_ON_START: "0",
        MCP_TRANSPORT: "streamable-http",
      },
      cwd,
    );
    expect(config.PROMPTS_DIR).toBe(path.join(cwd, "lib"));
    expect(config.VECTOR_DB_DIR).toBe(path.join(cwd, "lib", ".vectordb"));
    expect(config.ALLOWED_HOSTS).toEqual(["a", "b"]);
    expect(config.VERBOSE).toBe(true);
    expect(config.INGEST_ON_START).toBe(false);
    expect(config.MCP_TRANSPORT).toBe("http");
  });
});
