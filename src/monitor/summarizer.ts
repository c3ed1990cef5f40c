import { z } from "zod";
import type { MonitorConfig } from "../config.js";
import { logger } from "../logger.js";
import { safeErrorMessage } from "../redact.js";
import { truncate } from "../utils.js";
import { resolveLlmApiKey } from "./credentials.js";
import { fetchWithTimeout } from "./sources/http.js";
import type { Post } from "./types.js";

export const NO_HIGHLIGHTS = "No major highlights this hour.";

// Below this the digest is not worth a model call.
export const MIN_DIGEST_CHARS = 100;
// Summaries at or below this length are treated as empty.
export const MIN_SUMMARY_CHARS = 50;

const PER_POST_PROMPT_CHARS = 500;
const REQUEST_TIMEOUT_MS = 60_000;

export interface Summarizer {
  /** Resolves to "" when the summary could not be produced; never rejects. */
  summarize(posts: readonly Post[]): Promise<string>;
}

const CompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
          reasoning: z.string().nullable().optional()
        })
      })
    )
    .min(1)
});

function sanitizePromptField(s: string, maxLen: number): string {
  return truncate(s.replace(/\s+/g, " ").trim(), maxLen);
}

export function buildPostDigest(posts: readonly Post[], maxPosts: number): string {
  return posts
    .slice(0, maxPosts)
    .map((p) => `${p.author || "?"}: ${sanitizePromptField(p.text, PER_POST_PROMPT_CHARS)}`)
    .join("\n\n");
}

export function buildPrompt(digest: string): string {
  return `Analyze these recent crypto/Solana posts and extract the most important highlights.

Focus on:
1. New token launches or announcements
2. Technical updates to protocols (Raydium, Meteora, Pump.fun)
3. Market-moving news
4. Notable alpha or trading insights
5. Partnerships or integrations

Posts:
${digest}

Provide a concise summary (max 5 bullet points) of the most important/actionable information.
Use emojis for visual appeal. Format for Telegram (Markdown).
If nothing significant, say "${NO_HIGHLIGHTS}"`;
}

/** Message content, or the reasoning field when content is absent. */
export function extractCompletionText(json: unknown): string | null {
  const parsed = CompletionSchema.safeParse(json);
  if (!parsed.success) return null;
  const msg = parsed.data.choices[0].message;
  return msg.content || msg.reasoning || "";
}

export function isNoHighlights(text: string): boolean {
  return text.toLowerCase().includes("no major highlights");
}

export function isWorthNotifying(summary: string): boolean {
  const t = summary.trim();
  if (!t) return false;
  if (isNoHighlights(t)) return false;
  return t.length > MIN_SUMMARY_CHARS;
}

export function createSummarizer(cfg: MonitorConfig["llm"]): Summarizer {
  return {
    async summarize(posts: readonly Post[]): Promise<string> {
      const key = await resolveLlmApiKey({ fromEnv: cfg.apiKey, configPath: cfg.configPath });
      if (!key) {
        logger.error("summarizer.no_api_key", { configPath: cfg.configPath });
        return "";
      }

      const digest = buildPostDigest(posts, cfg.maxPosts);
      if (digest.length < MIN_DIGEST_CHARS) {
        logger.warn("summarizer.not_enough_content", { chars: digest.length, posts: posts.length });
        return NO_HIGHLIGHTS;
      }

      const url = `${cfg.baseUrl}/chat/completions`;
      try {
        const res = await fetchWithTimeout(
          url,
          {
            method: "POST",
            headers: {
              Authorization: `Bearer ${key.value}`,
              "Content-Type": "application/json"
            },
            body: JSON.stringify({
              model: cfg.model,
              messages: [{ role: "user", content: buildPrompt(digest) }],
              max_tokens: cfg.maxTokens,
              temperature: cfg.temperature
            })
          },
          REQUEST_TIMEOUT_MS
        );

        if (!res.ok) {
          const body = await res.text().catch(() => "");
          logger.error("summarizer.http_error", { status: res.status, body: truncate(body, 500) });
          return "";
        }

        const text = extractCompletionText(await res.json());
        if (text === null) {
          logger.error("summarizer.malformed_response", { model: cfg.model });
          return "";
        }
        return text;
      } catch (err) {
        logger.error("summarizer.failed", { error: safeErrorMessage(err) });
        return "";
      }
    }
  };
}
