/** Backend ids, in the default priority order (most structured first). */
export const SOURCE_IDS = ["rss_bridge", "nitter", "syndication", "twstalker"] as const;

export type SourceId = (typeof SOURCE_IDS)[number];

export function isSourceId(s: string): s is SourceId {
  return (SOURCE_IDS as readonly string[]).includes(s);
}

/**
 * One observed post, normalized across backends.
 * `timestamp` is whatever the backend reported (RFC 822, ISO 8601, or "").
 */
export type Post = Readonly<{
  author: string;
  text: string;
  url: string;
  timestamp: string;
  sourceId?: SourceId;
}>;

export type SourceResult =
  | { kind: "posts"; posts: Post[] }
  | { kind: "empty"; reason: string };

export interface SourceAdapter {
  readonly id: SourceId;
  fetch(account: string): Promise<SourceResult>;
}

export type MonitorState = {
  // Oldest first; bounded by the configured cap.
  seenFingerprints: string[];
  lastScanTimestamp: string | null;
};

export function emptyState(): MonitorState {
  return { seenFingerprints: [], lastScanTimestamp: null };
}
