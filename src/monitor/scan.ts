import type { MonitorConfig } from "../config.js";
import { logger } from "../logger.js";
import { safeErrorMessage } from "../redact.js";
import { truncate } from "../utils.js";
import { fetchAllAccounts } from "./fetcher.js";
import type { Notifier } from "./notifier.js";
import { evictOverflow, filterNew, type StateStore } from "./state.js";
import { isWorthNotifying, type Summarizer } from "./summarizer.js";
import type { MonitorState, Post, SourceAdapter } from "./types.js";

export type ScanPhase =
  | "fetching"
  | "deduping"
  | "skip_analysis"
  | "analyzing"
  | "skip_notify"
  | "notifying"
  | "persisting";

export type ScanDeps = {
  config: Pick<MonitorConfig, "accounts" | "interAccountDelayMs" | "seenCap">;
  adapters: readonly SourceAdapter[];
  store: StateStore;
  summarizer: Summarizer;
  notifier: Notifier;
  now?: () => Date;
  sleepFn?: (ms: number) => Promise<void>;
};

export type ScanOptions = {
  // Summarize and notify even without new posts, using the whole fetched batch.
  force?: boolean;
};

export type ScanReport = {
  phases: ScanPhase[];
  fetched: number;
  newPosts: number;
  analyzed: number;
  summary: string | null;
  // null when the notifier was not called.
  notified: boolean | null;
  state: MonitorState;
};

/**
 * One scan: fetch, dedup, summarize, notify. State is written exactly once,
 * at the end, whichever branch was taken and even if a later stage threw.
 */
export async function runScan(deps: ScanDeps, opts: ScanOptions = {}): Promise<ScanReport> {
  const now = deps.now ?? (() => new Date());
  const force = opts.force ?? false;

  logger.info("scan.start", { accounts: deps.config.accounts.length, adapters: deps.adapters.map((a) => a.id), force });

  let state = await deps.store.load();
  const report: ScanReport = {
    phases: [],
    fetched: 0,
    newPosts: 0,
    analyzed: 0,
    summary: null,
    notified: null,
    state
  };

  const advance = async (): Promise<void> => {
    report.phases.push("fetching");
    const { posts } = await fetchAllAccounts(deps.config.accounts, deps.adapters, {
      delayMs: deps.config.interAccountDelayMs,
      sleepFn: deps.sleepFn
    });
    report.fetched = posts.length;
    logger.info("scan.fetched", { posts: posts.length });

    if (posts.length === 0) {
      logger.warn("scan.no_posts", { reason: "no source returned data for any account" });
      return;
    }

    report.phases.push("deduping");
    const dedup = filterNew(posts, state);
    state = evictOverflow(dedup.state, deps.config.seenCap);
    report.newPosts = dedup.newPosts.length;
    logger.info("scan.dedup", { newPosts: dedup.newPosts.length, seen: state.seenFingerprints.length });

    if (dedup.newPosts.length === 0 && !force) {
      report.phases.push("skip_analysis");
      logger.info("scan.skip_analysis", { reason: "no new posts" });
      return;
    }

    report.phases.push("analyzing");
    const batch: readonly Post[] = dedup.newPosts.length > 0 ? dedup.newPosts : posts;
    report.analyzed = batch.length;
    const summary = await deps.summarizer.summarize(batch);
    report.summary = summary;
    logger.info("scan.summary", { chars: summary.length, preview: summary ? truncate(summary, 200) : "EMPTY" });

    if (!isWorthNotifying(summary)) {
      report.phases.push("skip_notify");
      logger.info("scan.skip_notify", { reason: "no significant highlights" });
      return;
    }

    report.phases.push("notifying");
    report.notified = await deps.notifier.notify(summary, now());
    if (!report.notified) {
      logger.warn("scan.notify_failed", {});
    }
  };

  let failed = false;
  try {
    await advance();
  } catch (err) {
    failed = true;
    throw err;
  } finally {
    report.phases.push("persisting");
    state = { ...state, lastScanTimestamp: now().toISOString() };
    try {
      await deps.store.save(state);
    } catch (saveErr) {
      // The stage error is the one the caller sees.
      if (!failed) throw saveErr;
      logger.error("scan.persist_failed", { error: safeErrorMessage(saveErr) });
    }
    report.state = state;
    logger.info("scan.done", {
      phases: report.phases,
      fetched: report.fetched,
      newPosts: report.newPosts,
      notified: report.notified
    });
  }

  return report;
}
