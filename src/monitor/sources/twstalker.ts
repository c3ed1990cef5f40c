import { logger } from "../../logger.js";
import { safeErrorMessage } from "../../redact.js";
import type { SourceAdapter, SourceResult } from "../types.js";
import { BROWSER_USER_AGENT, getText } from "./http.js";
import { htmlToText } from "./markup.js";
import { profileUrl, toPosts, toResult, type RawEntry } from "./post.js";

const TWEET_CONTENT_RE = /<div[^>]*class="[^"]*tweet-content[^"]*"[^>]*>([\s\S]*?)<\/div>/gi;

/** The mirror exposes no per-post links or times; every entry points at the profile. */
export function parseTwstalkerPage(html: string, account: string): RawEntry[] {
  const out: RawEntry[] = [];
  for (const m of html.matchAll(TWEET_CONTENT_RE)) {
    out.push({ text: htmlToText(m[1] ?? ""), url: profileUrl(account), timestamp: "" });
  }
  return out;
}

export function createTwstalkerSource(opts: { baseUrl: string; maxPosts: number; timeoutMs?: number }): SourceAdapter {
  const timeoutMs = opts.timeoutMs ?? 15_000;

  return {
    id: "twstalker",
    async fetch(account: string): Promise<SourceResult> {
      const url = `${opts.baseUrl}/${encodeURIComponent(account)}`;
      try {
        const res = await getText(url, {
          timeoutMs,
          headers: {
            Accept: "text/html",
            "User-Agent": BROWSER_USER_AGENT
          }
        });
        if (!res.ok) return { kind: "empty", reason: `HTTP ${res.status}` };

        const posts = toPosts({
          account,
          sourceId: "twstalker",
          entries: parseTwstalkerPage(res.body, account),
          maxPosts: opts.maxPosts
        });
        return toResult(posts, "no tweet blocks");
      } catch (err) {
        logger.debug("source.twstalker.failed", { account, error: safeErrorMessage(err) });
        return { kind: "empty", reason: safeErrorMessage(err) };
      }
    }
  };
}
