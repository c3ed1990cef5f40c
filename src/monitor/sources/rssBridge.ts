import { logger } from "../../logger.js";
import { safeErrorMessage } from "../../redact.js";
import type { SourceAdapter, SourceResult } from "../types.js";
import { FEED_USER_AGENT, getText } from "./http.js";
import { decodeEntities, feedText, firstMatch, splitElements } from "./markup.js";
import { profileUrl, toPosts, toResult, type RawEntry } from "./post.js";

export function rssBridgeFeedUrl(baseUrl: string, account: string): string {
  const u = new URL(baseUrl);
  u.searchParams.set("action", "display");
  u.searchParams.set("bridge", "TwitterBridge");
  u.searchParams.set("context", "By username");
  u.searchParams.set("u", account);
  u.searchParams.set("format", "Atom");
  return u.toString();
}

export function parseAtomEntries(xml: string, account: string): RawEntry[] {
  const out: RawEntry[] = [];
  for (const chunk of splitElements(xml, "entry")) {
    const entryXml = chunk.split(/<\/entry>/i)[0] ?? chunk;

    const content = firstMatch(entryXml, /<content[^>]*>([\s\S]*?)<\/content>/i);
    const title = firstMatch(entryXml, /<title[^>]*>([\s\S]*?)<\/title>/i);
    const href =
      firstMatch(entryXml, /<link[^>]*href="([^"]+)"/i) ??
      firstMatch(entryXml, /<link[^>]*href='([^']+)'/i);
    const published =
      firstMatch(entryXml, /<published[^>]*>([\s\S]*?)<\/published>/i) ??
      firstMatch(entryXml, /<updated[^>]*>([\s\S]*?)<\/updated>/i);

    const contentText = content ? feedText(content) : "";
    const text = contentText || (title ? feedText(title) : "");

    out.push({
      text,
      url: href ? decodeEntities(href) : profileUrl(account),
      timestamp: published ?? ""
    });
  }
  return out;
}

export function createRssBridgeSource(opts: { baseUrl: string; maxPosts: number; timeoutMs?: number }): SourceAdapter {
  const timeoutMs = opts.timeoutMs ?? 20_000;

  return {
    id: "rss_bridge",
    async fetch(account: string): Promise<SourceResult> {
      const url = rssBridgeFeedUrl(opts.baseUrl, account);
      try {
        const res = await getText(url, {
          timeoutMs,
          headers: {
            Accept: "application/atom+xml,application/xml,text/xml,*/*",
            "User-Agent": FEED_USER_AGENT
          }
        });
        if (!res.ok) return { kind: "empty", reason: `HTTP ${res.status}` };
        if (!/<entry\b/i.test(res.body)) return { kind: "empty", reason: "no entries" };

        const posts = toPosts({
          account,
          sourceId: "rss_bridge",
          entries: parseAtomEntries(res.body, account),
          maxPosts: opts.maxPosts
        });
        return toResult(posts, "no usable entries");
      } catch (err) {
        logger.debug("source.rss_bridge.failed", { account, error: safeErrorMessage(err) });
        return { kind: "empty", reason: safeErrorMessage(err) };
      }
    }
  };
}
