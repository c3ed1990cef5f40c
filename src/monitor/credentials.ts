import { readFile } from "node:fs/promises";
import { z } from "zod";
import { logger } from "../logger.js";
import { safeErrorMessage } from "../redact.js";

export type CredentialSource = "env" | "file";
export type ResolvedCredential = { value: string; source: CredentialSource } | null;

async function readIfExists(p: string): Promise<string | null> {
  try {
    return await readFile(p, "utf8");
  } catch {
    return null;
  }
}

/** Value of `KEY=value` in a dotenv-style file, with surrounding quotes removed. */
export function findKeyValue(text: string, key: string): string | null {
  for (const line of text.split(/\r?\n/)) {
    const trimmedLine = line.trim();
    if (!trimmedLine.startsWith(`${key}=`)) continue;
    const value = trimmedLine
      .slice(key.length + 1)
      .trim()
      .replace(/^["']+|["']+$/g, "");
    return value || null;
  }
  return null;
}

/** Completion API key: configured value first, then `CEREBRAS_API_KEY=` in the key file. */
export async function resolveLlmApiKey(args: { fromEnv?: string; configPath: string }): Promise<ResolvedCredential> {
  if (args.fromEnv) return { value: args.fromEnv, source: "env" };
  const text = await readIfExists(args.configPath);
  if (text === null) return null;
  const value = findKeyValue(text, "CEREBRAS_API_KEY") ?? findKeyValue(text, "LLM_API_KEY");
  return value ? { value, source: "file" } : null;
}

const NotifierConfigSchema = z.object({
  channels: z
    .object({
      telegram: z.object({ token: z.string().optional() }).optional()
    })
    .optional()
});

/** Bot token: configured value first, then `channels.telegram.token` in the JSON config. */
export async function resolveBotToken(args: { fromEnv?: string; configPath: string }): Promise<ResolvedCredential> {
  if (args.fromEnv) return { value: args.fromEnv, source: "env" };
  const text = await readIfExists(args.configPath);
  if (text === null) return null;

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    logger.warn("credentials.notifier_config.corrupt", { path: args.configPath, error: safeErrorMessage(err) });
    return null;
  }

  const parsed = NotifierConfigSchema.safeParse(json);
  const token = parsed.success ? parsed.data.channels?.telegram?.token?.trim() : undefined;
  return token ? { value: token, source: "file" } : null;
}
