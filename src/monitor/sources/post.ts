import type { Post, SourceId, SourceResult } from "../types.js";
import { clampText, isUsableText } from "./markup.js";

export type RawEntry = { text: string; url: string; timestamp: string };

/**
 * Turn already-cleaned entries into posts: caps the entry count first, then
 * drops entries whose text is too short and clamps the rest.
 */
export function toPosts(args: { account: string; sourceId: SourceId; entries: RawEntry[]; maxPosts: number }): Post[] {
  const out: Post[] = [];
  for (const e of args.entries.slice(0, args.maxPosts)) {
    if (!isUsableText(e.text)) continue;
    out.push(
      Object.freeze({
        author: `@${args.account}`,
        text: clampText(e.text),
        url: e.url,
        timestamp: e.timestamp,
        sourceId: args.sourceId
      })
    );
  }
  return out;
}

export function toResult(posts: Post[], emptyReason: string): SourceResult {
  return posts.length > 0 ? { kind: "posts", posts } : { kind: "empty", reason: emptyReason };
}

export function profileUrl(account: string): string {
  return `https://x.com/${account}`;
}
