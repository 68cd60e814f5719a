import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { NotFoundError, ReadFailureError } from "./errors.js";
import { openLineSource } from "./line-source.js";

async function collect(iterable: AsyncIterable<string>): Promise<string[]> {
  const lines: string[] = [];
  for await (const line of iterable) {
    lines.push(line);
  }
  return lines;
}

describe("openLineSource", () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "cmlog-source-"));
    file = path.join(dir, "agent.log");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("produces every line of the file in order", async () => {
    await fs.writeFile(file, "one\ntwo\nthree\n");

    expect(await collect(openLineSource(file, { kind: "whole" }))).toEqual(["one", "two", "three"]);
  });

  it("includes an unterminated last line in whole mode", async () => {
    await fs.writeFile(file, "one\ntwo");

    expect(await collect(openLineSource(file, { kind: "whole" }))).toEqual(["one", "two"]);
  });

  it("produces only the last N lines in tail mode", async () => {
    await fs.writeFile(file, "l1\nl2\nl3\nl4\nl5\n");

    expect(await collect(openLineSource(file, { kind: "tail", lines: 2 }))).toEqual(["l4", "l5"]);
  });

  it("raises NotFoundError before producing any line", async () => {
    const source = openLineSource(path.join(dir, "missing.log"), { kind: "whole" });

    await expect(source.next()).rejects.toBeInstanceOf(NotFoundError);
  });

  describe("follow mode", () => {
    it("emits appended lines until cancelled", async () => {
      await fs.writeFile(file, "one\n");
      const controller = new AbortController();
      const source = openLineSource(
        file,
        { kind: "follow" },
        { pollIntervalMs: 20, watch: false, signal: controller.signal },
      );

      expect(await source.next()).toEqual({ value: "one", done: false });

      await fs.appendFile(file, "two\n");
      expect(await source.next()).toEqual({ value: "two", done: false });

      await fs.appendFile(file, "thr");
      const pending = source.next();
      await new Promise((resolve) => setTimeout(resolve, 60));
      await fs.appendFile(file, "ee\n");
      expect(await pending).toEqual({ value: "three", done: false });

      const waiting = source.next();
      controller.abort();
      expect(await waiting).toEqual({ value: undefined, done: true });
    });

    it("wakes on change events from the watcher", async () => {
      await fs.writeFile(file, "first\n");
      const controller = new AbortController();
      const source = openLineSource(
        file,
        { kind: "follow" },
        { pollIntervalMs: 100, signal: controller.signal },
      );

      expect(await source.next()).toEqual({ value: "first", done: false });
      await fs.appendFile(file, "second\n");
      expect(await source.next()).toEqual({ value: "second", done: false });

      controller.abort();
      expect(await source.next()).toEqual({ value: undefined, done: true });
    });

    it("releases the wait when the consumer stops iterating", async () => {
      await fs.writeFile(file, "only\n");
      const source = openLineSource(file, { kind: "follow" }, { pollIntervalMs: 20, watch: false });

      expect(await source.next()).toEqual({ value: "only", done: false });
      expect(await source.return(undefined)).toEqual({ value: undefined, done: true });
    });

    it("fails with ReadFailureError when the file is truncated", async () => {
      await fs.writeFile(file, "one\ntwo\n");
      const source = openLineSource(
        file,
        { kind: "follow" },
        { pollIntervalMs: 20, watch: false },
      );

      expect(await source.next()).toEqual({ value: "one", done: false });
      expect(await source.next()).toEqual({ value: "two", done: false });

      await fs.writeFile(file, "x\n");
      await expect(source.next()).rejects.toBeInstanceOf(ReadFailureError);
    });
  });
});
