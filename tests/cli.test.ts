import { describe, it, expect } from "vitest";
import { parseCliArgs } from "../src/cli.js";

const defaults = { intervalSeconds: 3600 };

describe("parseCliArgs", () => {
  it("defaults to the continuous loop", () => {
    expect(parseCliArgs([], defaults)).toEqual({
      ok: true,
      args: { once: false, force: false, intervalSeconds: 3600, help: false }
    });
  });

  it("reads --once and --force", () => {
    expect(parseCliArgs(["--once", "--force"], defaults)).toEqual({
      ok: true,
      args: { once: true, force: true, intervalSeconds: 3600, help: false }
    });
  });

  it("reads --interval in both forms", () => {
    const spaced = parseCliArgs(["--interval", "600"], defaults);
    const joined = parseCliArgs(["--interval=900"], defaults);
    expect(spaced.ok && spaced.args.intervalSeconds).toBe(600);
    expect(joined.ok && joined.args.intervalSeconds).toBe(900);
  });

  it("rejects a bad interval", () => {
    expect(parseCliArgs(["--interval", "0"], defaults)).toEqual({ ok: false, error: "--interval expects a positive integer, got 0" });
    expect(parseCliArgs(["--interval", "soon"], defaults)).toEqual({
      ok: false,
      error: "--interval expects a positive integer, got soon"
    });
    expect(parseCliArgs(["--interval"], defaults)).toEqual({
      ok: false,
      error: "--interval expects a positive integer, got nothing"
    });
  });

  it("rejects unknown flags", () => {
    expect(parseCliArgs(["--loud"], defaults)).toEqual({ ok: false, error: "unknown argument: --loud" });
  });

  it("recognizes help", () => {
    const out = parseCliArgs(["-h"], defaults);
    expect(out.ok && out.args.help).toBe(true);
  });
});
