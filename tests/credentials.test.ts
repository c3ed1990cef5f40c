import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { findKeyValue, resolveBotToken, resolveLlmApiKey } from "../src/monitor/credentials.js";

describe("findKeyValue", () => {
  it("finds the key and strips quotes", () => {
    expect(findKeyValue(`A=1\nCEREBRAS_API_KEY='test-secret'\n`, "CEREBRAS_API_KEY")).toBe("test-secret");
    expect(findKeyValue(`CEREBRAS_API_KEY="test-secret"`, "CEREBRAS_API_KEY")).toBe("test-secret");
    expect(findKeyValue(`  CEREBRAS_API_KEY=test-secret  `, "CEREBRAS_API_KEY")).toBe("test-secret");
  });

  it("keeps = signs inside the value", () => {
    expect(findKeyValue(`KEY=abc=def`, "KEY")).toBe("abc=def");
  });

  it("returns null for missing or empty keys", () => {
    expect(findKeyValue(`OTHER=1`, "KEY")).toBeNull();
    expect(findKeyValue(`KEY=""`, "KEY")).toBeNull();
  });
});

describe("credential resolution", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "x-monitor-cred-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("prefers the configured API key over the file", async () => {
    const configPath = path.join(dir, "config");
    await writeFile(configPath, "CEREBRAS_API_KEY=test-file-secret\n", "utf8");
    expect(await resolveLlmApiKey({ fromEnv: "test-env-secret", configPath })).toEqual({ value: "test-env-secret", source: "env" });
  });

  it("reads the API key from the file", async () => {
    const configPath = path.join(dir, "config");
    await writeFile(configPath, "CEREBRAS_API_KEY=test-file-secret\n", "utf8");
    expect(await resolveLlmApiKey({ configPath })).toEqual({ value: "test-file-secret", source: "file" });
  });

  it("treats a missing API key file as unavailable", async () => {
    expect(await resolveLlmApiKey({ configPath: path.join(dir, "missing") })).toBeNull();
  });

  it("reads the bot token from the JSON config", async () => {
    const configPath = path.join(dir, "notifier.json");
    await writeFile(configPath, JSON.stringify({ channels: { telegram: { token: "test-token" } } }), "utf8");
    expect(await resolveBotToken({ configPath })).toEqual({ value: "test-token", source: "file" });
  });

  it("treats a corrupt or incomplete JSON config as unavailable", async () => {
    const corrupt = path.join(dir, "corrupt.json");
    await writeFile(corrupt, "{nope", "utf8");
    expect(await resolveBotToken({ configPath: corrupt })).toBeNull();

    const partial = path.join(dir, "partial.json");
    await writeFile(partial, JSON.stringify({ channels: {} }), "utf8");
    expect(await resolveBotToken({ configPath: partial })).toBeNull();
  });
});
