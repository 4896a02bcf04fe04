import { describe, it, expect, vi, afterEach } from "vitest";
import { AlternatingAll } from "../alternating-all.js";
import { AlternatingNoRemainder } from "../alternating-no-remainder.js";
import { Alternating } from "../alternating.js";
import { config } from "../config.js";
import * as api from "../index.js";
import { trace } from "../logger.js";

afterEach(() => {
  config.reset();
  vi.restoreAllMocks();
});

describe("config", () => {
  it("defaults debug to false", () => {
    expect(config.get("debug")).toBe(false);
    expect(config.has("debug")).toBe(false);
    expect(config.getAll()).toEqual({ debug: false });
  });

  it("sets and resets values", () => {
    config.set({ debug: true });
    expect(config.get("debug")).toBe(true);
    expect(config.has("debug")).toBe(true);

    config.reset();
    expect(config.get("debug")).toBe(false);
  });

  it("returns undefined for unknown paths", () => {
    expect(config.get("debug.level")).toBeUndefined();
    expect(config.get("missing")).toBeUndefined();
  });
});

describe("trace", () => {
  it("is silent while debug is off", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});

    trace("Test", "hello");
    expect(debug).not.toHaveBeenCalled();
  });

  it("prefixes lines with the adapter name", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    config.set({ debug: true });

    trace("Test", "hello");
    expect(debug).toHaveBeenCalledWith("[alternate:Test] hello");
  });

  it("stays internal to the package", () => {
    expect("trace" in api).toBe(false);
    expect("config" in api).toBe(true);
  });

  it("logs AlternatingAll transitions", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    config.set({ debug: true });

    expect([...new AlternatingAll([1], [])]).toEqual([1]);
    expect(debug.mock.calls).toEqual([
      ["[alternate:AlternatingAll] right exhausted, draining left"],
      ["[alternate:AlternatingAll] both sides exhausted"],
    ]);
  });

  it("logs where AlternatingNoRemainder stopped", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    config.set({ debug: true });

    expect([...new AlternatingNoRemainder([1], [])]).toEqual([1]);
    expect(debug.mock.calls).toEqual([["[alternate:AlternatingNoRemainder] right exhausted, stopping"]]);
  });

  it("does not log per-turn pulls", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    config.set({ debug: true });

    expect([...new Alternating([1, 2], [3, 4])]).toEqual([1, 3, 2, 4]);
    expect(debug).not.toHaveBeenCalled();
  });
});
