import type { MonitorConfig } from "../config.js";
import { createTelegramNotifier } from "./notifier.js";
import type { ScanDeps } from "./scan.js";
import { createSources } from "./sources/index.js";
import { createFileStateStore } from "./state.js";
import { createSummarizer } from "./summarizer.js";

export { runScan, type ScanDeps, type ScanOptions, type ScanReport, type ScanPhase } from "./scan.js";
export type { Post, MonitorState, SourceAdapter, SourceResult, SourceId } from "./types.js";

/** Production wiring: file-backed state, live adapters and HTTP clients. */
export function createScanDeps(cfg: MonitorConfig): ScanDeps {
  return {
    config: cfg,
    adapters: createSources(cfg),
    store: createFileStateStore(cfg.statePath),
    summarizer: createSummarizer(cfg.llm),
    notifier: createTelegramNotifier(cfg.telegram, { dryRun: cfg.dryRun })
  };
}
