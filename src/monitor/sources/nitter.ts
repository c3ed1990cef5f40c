import { logger } from "../../logger.js";
import { safeErrorMessage } from "../../redact.js";
import type { SourceAdapter, SourceResult } from "../types.js";
import { FEED_USER_AGENT, getText } from "./http.js";
import { feedText, firstMatch, splitElements } from "./markup.js";
import { profileUrl, toPosts, type RawEntry } from "./post.js";

/** Status links on a mirror point back at the mirror; rewrite them to x.com. */
export function canonicalStatusUrl(link: string, instance: string): string {
  try {
    const u = new URL(link);
    const i = new URL(instance);
    if (u.hostname !== i.hostname) return link;
    return `https://x.com${u.pathname}`;
  } catch {
    return link;
  }
}

export function parseRssItems(xml: string, account: string, instance: string): RawEntry[] {
  const out: RawEntry[] = [];
  for (const chunk of splitElements(xml, "item")) {
    const itemXml = chunk.split(/<\/item>/i)[0] ?? chunk;

    const description = firstMatch(itemXml, /<description[^>]*>([\s\S]*?)<\/description>/i);
    const title = firstMatch(itemXml, /<title[^>]*>([\s\S]*?)<\/title>/i);
    const link = firstMatch(itemXml, /<link[^>]*>([\s\S]*?)<\/link>/i);
    const pubDate = firstMatch(itemXml, /<pubDate[^>]*>([\s\S]*?)<\/pubDate>/i);

    const descriptionText = description ? feedText(description) : "";
    const text = descriptionText || (title ? feedText(title) : "");

    out.push({
      text,
      url: link ? canonicalStatusUrl(feedText(link), instance) : profileUrl(account),
      timestamp: pubDate ?? ""
    });
  }
  return out;
}

export function createNitterSource(opts: { instances: readonly string[]; maxPosts: number; timeoutMs?: number }): SourceAdapter {
  const timeoutMs = opts.timeoutMs ?? 15_000;

  return {
    id: "nitter",
    async fetch(account: string): Promise<SourceResult> {
      const reasons: string[] = [];

      // Instances are tried in order; the first one that yields posts wins.
      for (const instance of opts.instances) {
        const url = `${instance}/${encodeURIComponent(account)}/rss`;
        try {
          const res = await getText(url, {
            timeoutMs,
            headers: {
              Accept: "application/rss+xml,application/xml,text/xml,*/*",
              "User-Agent": FEED_USER_AGENT
            }
          });
          if (!res.ok) {
            reasons.push(`${instance}: HTTP ${res.status}`);
            continue;
          }
          if (!/<item\b/i.test(res.body)) {
            reasons.push(`${instance}: no items`);
            continue;
          }

          const posts = toPosts({
            account,
            sourceId: "nitter",
            entries: parseRssItems(res.body, account, instance),
            maxPosts: opts.maxPosts
          });
          if (posts.length > 0) return { kind: "posts", posts };
          reasons.push(`${instance}: no usable items`);
        } catch (err) {
          logger.debug("source.nitter.failed", { account, instance, error: safeErrorMessage(err) });
          reasons.push(`${instance}: ${safeErrorMessage(err)}`);
        }
      }

      return { kind: "empty", reason: reasons.length > 0 ? reasons.join("; ") : "no instances configured" };
    }
  };
}
