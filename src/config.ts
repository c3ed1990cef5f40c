import * as dotenv from "dotenv";
import { existsSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { resolveStatePath } from "./monitor/state.js";
import { isSourceId, type SourceId } from "./monitor/types.js";

// Load env from the working directory first, then fall back to the parent (.env) if present.
const localEnvPath = path.join(process.cwd(), ".env");
if (existsSync(localEnvPath)) dotenv.config({ path: localEnvPath });
const parentEnvPath = path.resolve(process.cwd(), "..", ".env");
if (existsSync(parentEnvPath)) dotenv.config({ path: parentEnvPath, override: false });

const BoolFromString = z
  .enum(["true", "false"])
  .transform((v) => v === "true");

const LogLevel = z.enum(["debug", "info", "warn", "error"]);

const envSchema = z.object({
  // Monitored accounts and backends
  TARGET_ACCOUNTS: z.string().default("Pumpfun,Raydium,MeteoraAG,MarioNawfal,RohOnChain,xDaily,JupiterExchange"),
  SOURCE_ORDER: z.string().default("rss_bridge,nitter,syndication,twstalker"),
  RSS_BRIDGE_URL: z.string().url().default("https://rss-bridge.org/bridge01/"),
  NITTER_INSTANCES: z.string().default("https://nitter.poast.org,https://nitter.privacydev.net"),
  SYNDICATION_URL: z.string().url().default("https://syndication.twitter.com/srv/timeline-profile/screen-name"),
  TWSTALKER_URL: z.string().url().default("https://twstalker.com"),
  FETCH_MAX_POSTS: z.coerce.number().int().min(1).max(50).default(10),
  INTER_ACCOUNT_DELAY_MS: z.coerce.number().int().min(0).default(2000),

  // Dedup state
  STATE_PATH: z.string().optional(),
  SEEN_CAP: z.coerce.number().int().min(500).max(1000).default(500),

  // Scheduler
  SCAN_INTERVAL_SECONDS: z.coerce.number().int().positive().default(3600),

  // Summarizer (OpenAI-compatible chat completions)
  LLM_BASE_URL: z.string().url().default("https://api.cerebras.ai/v1"),
  LLM_MODEL: z.string().min(1).default("llama-3.3-70b"),
  LLM_API_KEY: z.string().optional(),
  CEREBRAS_API_KEY: z.string().optional(),
  LLM_CONFIG_PATH: z.string().optional(),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(1000),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  SUMMARY_MAX_POSTS: z.coerce.number().int().min(1).max(30).default(20),

  // Notifier (Telegram Bot API)
  TELEGRAM_API_URL: z.string().url().default("https://api.telegram.org"),
  TELEGRAM_BOT_TOKEN: z.string().optional(),
  TELEGRAM_CHAT_ID: z.string().optional(),
  NOTIFIER_CONFIG_PATH: z.string().optional(),

  DRY_RUN: BoolFromString.default("false"),
  LOG_LEVEL: LogLevel.default("info")
});

export type AppConfig = z.infer<typeof envSchema>;

export type MonitorConfig = Readonly<{
  accounts: readonly string[];
  sources: readonly SourceId[];
  endpoints: Readonly<{
    rssBridge: string;
    nitter: readonly string[];
    syndication: string;
    twstalker: string;
  }>;
  fetchMaxPosts: number;
  interAccountDelayMs: number;
  statePath: string;
  seenCap: number;
  scanIntervalSeconds: number;
  llm: Readonly<{
    baseUrl: string;
    model: string;
    apiKey?: string;
    configPath: string;
    maxTokens: number;
    temperature: number;
    maxPosts: number;
  }>;
  telegram: Readonly<{
    apiUrl: string;
    botToken?: string;
    chatId?: string;
    configPath: string;
  }>;
  dryRun: boolean;
}>;

export function parseCsv(csv: string): string[] {
  return csv
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

/** Handles are stored without a leading "@". */
export function parseAccounts(csv: string): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const raw of parseCsv(csv)) {
    const handle = raw.replace(/^@+/, "");
    if (!handle || seen.has(handle.toLowerCase())) continue;
    seen.add(handle.toLowerCase());
    out.push(handle);
  }
  return out;
}

function validateGuardrails(cfg: AppConfig): string[] {
  const errors: string[] = [];

  const accounts = parseAccounts(cfg.TARGET_ACCOUNTS);
  if (accounts.length === 0) {
    errors.push("TARGET_ACCOUNTS must name at least one account");
  }
  for (const a of accounts) {
    if (!/^[A-Za-z0-9_]{1,15}$/.test(a)) {
      errors.push(`TARGET_ACCOUNTS contains an invalid handle: ${a}`);
    }
  }

  const sources = parseCsv(cfg.SOURCE_ORDER);
  if (sources.length === 0) {
    errors.push("SOURCE_ORDER must name at least one source");
  }
  const seen = new Set<string>();
  for (const s of sources) {
    if (!isSourceId(s)) errors.push(`SOURCE_ORDER contains an unknown source: ${s}`);
    if (seen.has(s)) errors.push(`SOURCE_ORDER lists ${s} more than once`);
    seen.add(s);
  }

  if (sources.includes("nitter")) {
    const instances = parseCsv(cfg.NITTER_INSTANCES);
    if (instances.length === 0) {
      errors.push("NITTER_INSTANCES is required when SOURCE_ORDER includes nitter");
    }
    for (const u of instances) {
      if (!z.string().url().safeParse(u).success) {
        errors.push(`NITTER_INSTANCES contains an invalid url: ${u}`);
      }
    }
  }

  return errors;
}

function homePath(...parts: string[]): string {
  return path.join(os.homedir(), ...parts);
}

function trimmed(s: string | undefined): string | undefined {
  const t = s?.trim();
  return t ? t : undefined;
}

export function toMonitorConfig(cfg: AppConfig): MonitorConfig {
  const sources = parseCsv(cfg.SOURCE_ORDER).filter(isSourceId);
  return Object.freeze({
    accounts: Object.freeze(parseAccounts(cfg.TARGET_ACCOUNTS)),
    sources: Object.freeze(sources),
    endpoints: Object.freeze({
      rssBridge: cfg.RSS_BRIDGE_URL,
      nitter: Object.freeze(parseCsv(cfg.NITTER_INSTANCES).map((u) => u.replace(/\/+$/, ""))),
      syndication: cfg.SYNDICATION_URL.replace(/\/+$/, ""),
      twstalker: cfg.TWSTALKER_URL.replace(/\/+$/, "")
    }),
    fetchMaxPosts: cfg.FETCH_MAX_POSTS,
    interAccountDelayMs: cfg.INTER_ACCOUNT_DELAY_MS,
    statePath: resolveStatePath(trimmed(cfg.STATE_PATH)),
    seenCap: cfg.SEEN_CAP,
    scanIntervalSeconds: cfg.SCAN_INTERVAL_SECONDS,
    llm: Object.freeze({
      baseUrl: cfg.LLM_BASE_URL.replace(/\/+$/, ""),
      model: cfg.LLM_MODEL,
      apiKey: trimmed(cfg.LLM_API_KEY) ?? trimmed(cfg.CEREBRAS_API_KEY),
      configPath: trimmed(cfg.LLM_CONFIG_PATH) ?? homePath(".config", "cerebras", "config"),
      maxTokens: cfg.LLM_MAX_TOKENS,
      temperature: cfg.LLM_TEMPERATURE,
      maxPosts: cfg.SUMMARY_MAX_POSTS
    }),
    telegram: Object.freeze({
      apiUrl: cfg.TELEGRAM_API_URL.replace(/\/+$/, ""),
      botToken: trimmed(cfg.TELEGRAM_BOT_TOKEN),
      chatId: trimmed(cfg.TELEGRAM_CHAT_ID),
      configPath: trimmed(cfg.NOTIFIER_CONFIG_PATH) ?? homePath(".openclaw", "openclaw.json")
    }),
    dryRun: cfg.DRY_RUN
  });
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): MonitorConfig {
  const cfg = envSchema.parse(env);

  const guardErrors = validateGuardrails(cfg);
  if (guardErrors.length > 0) {
    throw new Error(`Config validation errors:\n${guardErrors.map((e) => `  - ${e}`).join("\n")}`);
  }

  return toMonitorConfig(cfg);
}
