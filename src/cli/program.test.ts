import { InvalidArgumentError } from "commander";
import { describe, expect, it, vi } from "vitest";
import {
  createProgram,
  parseMinLevel,
  parseSince,
  toTailOptions,
  type CliOptions,
} from "./program.js";

function quietProgram(action: (path: string, options: CliOptions) => Promise<void>) {
  return createProgram(action)
    .exitOverride()
    .configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
}

describe("parseSince", () => {
  const now = new Date("2025-01-15T12:00:00.000Z");

  it("reads relative durations", () => {
    expect(parseSince("30m", now).toISOString()).toBe("2025-01-15T11:30:00.000Z");
    expect(parseSince("2h", now).toISOString()).toBe("2025-01-15T10:00:00.000Z");
    expect(parseSince("1d", now).toISOString()).toBe("2025-01-14T12:00:00.000Z");
  });

  it("reads absolute timestamps", () => {
    expect(parseSince("2025-01-15T09:00:00.000Z").toISOString()).toBe("2025-01-15T09:00:00.000Z");
  });

  it("rejects anything else", () => {
    expect(() => parseSince("yesterday-ish")).toThrow(InvalidArgumentError);
  });
});

describe("parseMinLevel", () => {
  it("accepts names and numbers", () => {
    expect(parseMinLevel("info")).toBe(1);
    expect(parseMinLevel("Warn")).toBe(2);
    expect(parseMinLevel("3")).toBe(3);
  });

  it("rejects unknown levels", () => {
    expect(() => parseMinLevel("verbose")).toThrow(InvalidArgumentError);
  });
});

describe("toTailOptions", () => {
  const base: CliOptions = { minLevel: 1, color: true };

  it("maps flags onto pipeline options", () => {
    expect(toTailOptions("agent.log", { ...base, tail: 20, json: true }, true)).toEqual({
      path: "agent.log",
      mode: { kind: "tail", lines: 20 },
      since: undefined,
      component: undefined,
      componentIsPattern: false,
      minLevel: 1,
      output: "object",
      noColor: false,
      pollIntervalMs: undefined,
      usePolling: undefined,
    });
  });

  it("uses the component pattern when given", () => {
    const options = toTailOptions("agent.log", { ...base, componentPattern: "^Win" }, true);

    expect(options.component).toBe("^Win");
    expect(options.componentIsPattern).toBe(true);
  });

  it("disables color off a terminal", () => {
    expect(toTailOptions("agent.log", base, false).noColor).toBe(true);
    expect(toTailOptions("agent.log", { ...base, color: false }, true).noColor).toBe(true);
  });

  it("selects follow mode", () => {
    expect(toTailOptions("agent.log", { ...base, follow: true }, true).mode).toEqual({
      kind: "follow",
    });
  });
});

describe("createProgram", () => {
  it("passes the path and parsed options to the action", async () => {
    const action = vi.fn(async (_path: string, _options: CliOptions) => undefined);

    await quietProgram(action).parseAsync(
      ["agent.log", "-n", "5", "-l", "error", "-c", "Win32App", "--no-color"],
      { from: "user" },
    );

    expect(action).toHaveBeenCalledTimes(1);
    expect(action).toHaveBeenCalledWith(
      "agent.log",
      expect.objectContaining({ tail: 5, minLevel: 3, component: "Win32App", color: false }),
    );
  });

  it("rejects --tail together with --follow", async () => {
    const action = vi.fn(async () => undefined);

    await expect(
      quietProgram(action).parseAsync(["agent.log", "-n", "5", "-f"], { from: "user" }),
    ).rejects.toThrow("--tail and --follow cannot be combined");
    expect(action).not.toHaveBeenCalled();
  });

  it("rejects an invalid tail count", async () => {
    const action = vi.fn(async () => undefined);

    await expect(
      quietProgram(action).parseAsync(["agent.log", "-n", "0"], { from: "user" }),
    ).rejects.toThrow("Expected a positive integer.");
  });
});
