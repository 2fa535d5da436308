import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { StorageError } from "../src/errors";
import type { PromptLibrary } from "../src/library";
import { SessionSource, fileSource, ingestPending } from "../src/session-source";
import { FakeProvider, makeTempDir, openLibrary, removeDir } from "./helpers";

describe("SessionSource", () => {
  let dir: string;
  let sessionsDir: string;
  let stateFile: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    sessionsDir = path.join(dir, "sessions");
    stateFile = path.join(dir, "state.json");
    await fs.mkdir(sessionsDir);
    await fs.writeFile(path.join(sessionsDir, "b.md"), "Explain the cache layer");
    await fs.writeFile(path.join(sessionsDir, "a.md"), "Refactor the billing module");
    await fs.writeFile(path.join(sessionsDir, "notes.txt"), "not a session");
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("lists matching files by name", async () => {
    const source = await SessionSource.open(sessionsDir, "**/*.md", stateFile);
    const pending = await source.pending();
    expect(pending.map((f) => f.name)).toEqual(["a.md", "b.md"]);
    expect(pending[0].text).toBe("Refactor the billing module");
    expect(pending[0].digest).toMatch(/^[0-9a-f]{64}$/);
  });

  it("remembers processed files until they change", async () => {
    const source = await SessionSource.open(sessionsDir, "**/*.md", stateFile);
    const [a] = await source.pending();
    await source.markProcessed(a);

    const reopened = await SessionSource.open(sessionsDir, "**/*.md", stateFile);
    expect((await reopened.pending()).map((f) => f.name)).toEqual(["b.md"]);

    await fs.writeFile(path.join(sessionsDir, "a.md"), "Refactor the billing module again");
    expect((await reopened.pending()).map((f) => f.name)).toEqual(["a.md", "b.md"]);
  });

  it("treats a missing sessions directory as empty", async () => {
    const source = await SessionSource.open(path.join(dir, "nowhere"), "**/*.md", stateFile);
    expect(await source.pending()).toEqual([]);
  });

  it("rejects a corrupt state file", async () => {
    await fs.writeFile(stateFile, "{ nope");
    await expect(SessionSource.open(sessionsDir, "**/*.md", stateFile)).rejects.toBeInstanceOf(StorageError);
    await fs.writeFile(stateFile, JSON.stringify({ version: 2, processed: {} }));
    await expect(SessionSource.open(sessionsDir, "**/*.md", stateFile)).rejects.toBeInstanceOf(StorageError);
  });

  it("reads a file relative to the sessions directory", async () => {
    const source = await SessionSource.open(sessionsDir, "**/*.md", stateFile);
    const file = await source.read("a.md");
    expect(file.name).toBe("a.md");
    expect(file.absPath).toBe(path.join(sessionsDir, "a.md"));
    await expect(source.read("missing.md")).rejects.toBeInstanceOf(StorageError);
  });

  describe("fileSource", () => {
    it("prefers the transcript's session id", async () => {
      const source = await SessionSource.open(sessionsDir, "**/*.md", stateFile);
      await fs.writeFile(path.join(sessionsDir, "c.md"), "> **Session ID:** `abc-123`\n\nhello");
      expect(fileSource(await source.read("c.md"))).toBe("abc-123");
      expect(fileSource(await source.read("a.md"))).toBe("a");
    });

    it("keeps same-named files in different folders apart", async () => {
      await fs.mkdir(path.join(sessionsDir, "x"));
      await fs.writeFile(path.join(sessionsDir, "x", "copilot-session-1.md"), "hello");
      await fs.mkdir(path.join(dir, "elsewhere"));
      await fs.writeFile(path.join(dir, "elsewhere", "copilot-session-1.md"), "hello");
      const source = await SessionSource.open(sessionsDir, "**/*.md", stateFile);
      expect(fileSource(await source.read("x/copilot-session-1.md"))).toBe("x/copilot-session-1");
      const outside = await source.read("../elsewhere/copilot-session-1.md");
      expect(fileSource(outside)).toBe(path.join(dir, "elsewhere", "copilot-session-1").split(path.sep).join("/"));
    });
  });

  describe("ingestPending", () => {
    let library: PromptLibrary;

    beforeEach(async () => {
      library = await openLibrary(dir, new FakeProvider());
    });

    afterEach(async () => {
      await library.close();
    });

    it("ingests each pending file once", async () => {
      const source = await SessionSource.open(sessionsDir, "**/*.md", stateFile);
      expect(await ingestPending(library, source)).toEqual({ files: 2, prompts: 2, failed: [] });
      expect(library.listPrompts({ session: "a" })).toHaveLength(1);
      expect(await ingestPending(library, source)).toEqual({ files: 0, prompts: 0, failed: [] });
    });

    it("does not let same-named transcripts replace each other's prompts", async () => {
      await fs.mkdir(path.join(sessionsDir, "x"));
      await fs.mkdir(path.join(sessionsDir, "y"));
      await fs.writeFile(path.join(sessionsDir, "x", "copilot-session-1.md"), "Plan the kotlin migration");
      await fs.writeFile(path.join(sessionsDir, "y", "copilot-session-1.md"), "Plan the swift migration");
      const source = await SessionSource.open(sessionsDir, "**/*.md", stateFile);

      expect(await ingestPending(library, source)).toEqual({ files: 4, prompts: 4, failed: [] });
      expect(library.listPrompts({ session: "x/copilot-session-1" })).toHaveLength(1);
      expect(library.listPrompts({ session: "y/copilot-session-1" })).toHaveLength(1);
      expect(library.getStats().count).toBe(4);
    });

    it("does not remove created prompts when a transcript is named manual.md", async () => {
      const created = await library.createPrompt("Write jest tests for the checkout flow");
      await fs.writeFile(path.join(sessionsDir, "manual.md"), "Sketch the onboarding email");
      const source = await SessionSource.open(sessionsDir, "manual.md", stateFile);
      const file = await source.read("manual.md");
      expect(fileSource(file)).toBe("manual");

      await library.ingestSession(file.text, { source: fileSource(file) });
      await library.ingestSession("Sketch the welcome email", { source: fileSource(file) });
      expect((await library.getPrompt(created)).entry.origin).toBe("manual");
      expect(library.listPrompts({ session: "manual" })).toHaveLength(2);
    });

    it("reports a failing file and leaves it pending", async () => {
      await fs.writeFile(path.join(sessionsDir, "a.md"), "x".repeat(2001));
      const provider = new FakeProvider();
      const lib = await openLibrary(path.join(dir, "failing"), provider);
      provider.failures = 3;
      const source = await SessionSource.open(sessionsDir, "**/*.md", stateFile);

      const report = await ingestPending(lib, source);
      expect(report.files).toBe(1);
      expect(report.failed).toEqual([{ file: "b.md", error: "fake backend is down" }]);
      expect((await source.pending()).map((f) => f.name)).toEqual(["b.md"]);
      await lib.close();
    });
  });
});
