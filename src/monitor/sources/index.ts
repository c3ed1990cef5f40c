import type { MonitorConfig } from "../../config.js";
import type { SourceAdapter, SourceId } from "../types.js";
import { createNitterSource } from "./nitter.js";
import { createRssBridgeSource } from "./rssBridge.js";
import { createSyndicationSource } from "./syndication.js";
import { createTwstalkerSource } from "./twstalker.js";

export { createNitterSource } from "./nitter.js";
export { createRssBridgeSource } from "./rssBridge.js";
export { createSyndicationSource } from "./syndication.js";
export { createTwstalkerSource } from "./twstalker.js";

function createSource(id: SourceId, cfg: MonitorConfig): SourceAdapter {
  const maxPosts = cfg.fetchMaxPosts;
  switch (id) {
    case "rss_bridge":
      return createRssBridgeSource({ baseUrl: cfg.endpoints.rssBridge, maxPosts });
    case "nitter":
      return createNitterSource({ instances: cfg.endpoints.nitter, maxPosts });
    case "syndication":
      return createSyndicationSource({ baseUrl: cfg.endpoints.syndication, maxPosts });
    case "twstalker":
      return createTwstalkerSource({ baseUrl: cfg.endpoints.twstalker, maxPosts });
  }
}

/** Adapters in the configured priority order. */
export function createSources(cfg: MonitorConfig): SourceAdapter[] {
  return cfg.sources.map((id) => createSource(id, cfg));
}
