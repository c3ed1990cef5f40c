import { z } from "zod";
import { logger } from "../../logger.js";
import { safeErrorMessage } from "../../redact.js";
import type { SourceAdapter, SourceResult } from "../types.js";
import { BROWSER_USER_AGENT, getText } from "./http.js";
import { decodeEntities, firstMatch } from "./markup.js";
import { profileUrl, toPosts, toResult, type RawEntry } from "./post.js";

const TweetSchema = z.object({
  id_str: z.string().optional(),
  full_text: z.string().optional(),
  text: z.string().optional(),
  created_at: z.string().optional(),
  permalink: z.string().optional()
});

const NextDataSchema = z.object({
  props: z.object({
    pageProps: z.object({
      timeline: z.object({
        entries: z.array(
          z.object({
            type: z.string().optional(),
            content: z.object({ tweet: TweetSchema.optional() }).optional()
          })
        )
      })
    })
  })
});

type Tweet = z.infer<typeof TweetSchema>;

function tweetUrl(tweet: Tweet, account: string): string {
  if (tweet.permalink?.startsWith("/")) return `https://x.com${tweet.permalink}`;
  if (tweet.id_str) return `https://x.com/${account}/status/${tweet.id_str}`;
  return profileUrl(account);
}

/**
 * The embed timeline page carries its data as a `__NEXT_DATA__` JSON blob.
 * Throws when the blob is missing or does not look like a timeline.
 */
export function parseSyndicationPage(html: string, account: string): RawEntry[] {
  const blob = firstMatch(html, /<script[^>]*id="__NEXT_DATA__"[^>]*>([\s\S]*?)<\/script>/i);
  if (!blob) throw new Error("missing __NEXT_DATA__");

  const parsed = NextDataSchema.safeParse(JSON.parse(blob));
  if (!parsed.success) {
    throw new Error(`unexpected timeline shape: ${parsed.error.issues[0]?.message ?? "unknown error"}`);
  }

  const out: RawEntry[] = [];
  for (const entry of parsed.data.props.pageProps.timeline.entries) {
    const tweet = entry.content?.tweet;
    if (!tweet) continue;
    const raw = tweet.full_text ?? tweet.text ?? "";
    out.push({
      text: decodeEntities(raw).replace(/\s+/g, " ").trim(),
      url: tweetUrl(tweet, account),
      timestamp: tweet.created_at ?? ""
    });
  }
  return out;
}

export function createSyndicationSource(opts: { baseUrl: string; maxPosts: number; timeoutMs?: number }): SourceAdapter {
  const timeoutMs = opts.timeoutMs ?? 15_000;

  return {
    id: "syndication",
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
          sourceId: "syndication",
          entries: parseSyndicationPage(res.body, account),
          maxPosts: opts.maxPosts
        });
        return toResult(posts, "no usable tweets");
      } catch (err) {
        logger.debug("source.syndication.failed", { account, error: safeErrorMessage(err) });
        return { kind: "empty", reason: safeErrorMessage(err) };
      }
    }
  };
}
