import { describe, it, expect, vi } from "vitest";
import { fingerprintText } from "../src/monitor/fingerprint.js";
import type { Notifier } from "../src/monitor/notifier.js";
import { runScan, type ScanDeps } from "../src/monitor/scan.js";
import type { StateStore } from "../src/monitor/state.js";
import { NO_HIGHLIGHTS, type Summarizer } from "../src/monitor/summarizer.js";
import { emptyState, type MonitorState, type Post, type SourceAdapter } from "../src/monitor/types.js";

const NOW = new Date("2026-01-30T12:00:00Z");
const SUMMARY = "🚀 *Raydium* launched LaunchLab v2 with new bonding curves and lower creator fees";

function post(account: string, i: number): Post {
  return {
    author: `@${account}`,
    text: `${account} update ${i}: something notable happened on chain today`,
    url: `https://x.com/${account}/status/${i}`,
    timestamp: "",
    sourceId: "rss_bridge"
  };
}

function memoryStore(initial: MonitorState = emptyState()) {
  let current = initial;
  const saves: MonitorState[] = [];
  const store: StateStore = {
    load: async () => ({ ...current, seenFingerprints: [...current.seenFingerprints] }),
    save: async (s) => {
      current = s;
      saves.push(s);
    }
  };
  return { store, saves, current: () => current };
}

function feedAdapter(feed: Record<string, Post[]>): SourceAdapter {
  return {
    id: "rss_bridge",
    fetch: async (account) => {
      const posts = feed[account] ?? [];
      return posts.length > 0 ? { kind: "posts", posts } : { kind: "empty", reason: "no entries" };
    }
  };
}

function setup(opts: { feed: Record<string, Post[]>; state?: MonitorState; summary?: string; seenCap?: number }) {
  const mem = memoryStore(opts.state);
  const summarize = vi.fn(async (_posts: readonly Post[]) => opts.summary ?? SUMMARY);
  const notify = vi.fn(async (_summary: string, _at: Date) => true);
  const summarizer: Summarizer = { summarize };
  const notifier: Notifier = { notify };
  const deps: ScanDeps = {
    config: { accounts: Object.keys(opts.feed), interAccountDelayMs: 0, seenCap: opts.seenCap ?? 500 },
    adapters: [feedAdapter(opts.feed)],
    store: mem.store,
    summarizer,
    notifier,
    now: () => NOW
  };
  return { deps, mem, summarize, notify };
}

describe("runScan", () => {
  it("dedups across runs: 5 new, then 1 new out of 6", async () => {
    const five = [1, 2, 3, 4, 5].map((i) => post("A", i));
    const first = setup({ feed: { A: five } });

    const r1 = await runScan(first.deps);

    expect(r1.newPosts).toBe(5);
    expect(first.mem.current().seenFingerprints).toHaveLength(5);
    expect(first.summarize).toHaveBeenCalledWith(five);

    const sixth = post("A", 6);
    const second = setup({ feed: { A: [...five, sixth] }, state: first.mem.current() });

    const r2 = await runScan(second.deps);

    expect(r2.fetched).toBe(6);
    expect(r2.newPosts).toBe(1);
    expect(second.summarize).toHaveBeenCalledWith([sixth]);
    expect(second.mem.current().seenFingerprints).toHaveLength(6);
    expect(second.mem.current().seenFingerprints[5]).toBe(fingerprintText(sixth.text));
  });

  it("notifies once with the summary when there is something worth posting", async () => {
    const { deps, notify, mem } = setup({ feed: { A: [post("A", 1)] } });

    const report = await runScan(deps);

    expect(report.phases).toEqual(["fetching", "deduping", "analyzing", "notifying", "persisting"]);
    expect(notify).toHaveBeenCalledTimes(1);
    expect(notify).toHaveBeenCalledWith(SUMMARY, NOW);
    expect(report.notified).toBe(true);
    expect(mem.saves).toHaveLength(1);
  });

  it("persists only the timestamp when nothing was fetched", async () => {
    const initial: MonitorState = { seenFingerprints: ["old"], lastScanTimestamp: "2026-01-29T12:00:00.000Z" };
    const { deps, summarize, notify, mem } = setup({ feed: { A: [], B: [] }, state: initial });

    const report = await runScan(deps);

    expect(report.phases).toEqual(["fetching", "persisting"]);
    expect(summarize).not.toHaveBeenCalled();
    expect(notify).not.toHaveBeenCalled();
    expect(mem.saves).toEqual([{ seenFingerprints: ["old"], lastScanTimestamp: "2026-01-30T12:00:00.000Z" }]);
  });

  it("skips analysis when nothing is new", async () => {
    const posts = [post("A", 1), post("A", 2)];
    const state: MonitorState = { seenFingerprints: posts.map((p) => fingerprintText(p.text)), lastScanTimestamp: null };
    const { deps, summarize, notify, mem } = setup({ feed: { A: posts }, state });

    const report = await runScan(deps);

    expect(report.phases).toEqual(["fetching", "deduping", "skip_analysis", "persisting"]);
    expect(summarize).not.toHaveBeenCalled();
    expect(notify).not.toHaveBeenCalled();
    expect(mem.current().lastScanTimestamp).toBe("2026-01-30T12:00:00.000Z");
  });

  it("summarizes the whole fetched batch in forced mode when nothing is new", async () => {
    const posts = [1, 2, 3, 4, 5].map((i) => post("A", i));
    const state: MonitorState = { seenFingerprints: posts.map((p) => fingerprintText(p.text)), lastScanTimestamp: null };
    const { deps, summarize } = setup({ feed: { A: posts }, state });

    const report = await runScan(deps, { force: true });

    expect(summarize).toHaveBeenCalledTimes(1);
    expect(summarize).toHaveBeenCalledWith(posts);
    expect(report.analyzed).toBe(5);
  });

  it("does not notify on the no-highlights sentinel", async () => {
    const { deps, notify } = setup({ feed: { A: [post("A", 1)] }, summary: NO_HIGHLIGHTS });

    const report = await runScan(deps);

    expect(notify).not.toHaveBeenCalled();
    expect(report.phases).toEqual(["fetching", "deduping", "analyzing", "skip_notify", "persisting"]);
    expect(report.notified).toBeNull();
  });

  it("does not notify on an empty summary", async () => {
    const { deps, notify } = setup({ feed: { A: [post("A", 1)] }, summary: "" });
    await runScan(deps);
    expect(notify).not.toHaveBeenCalled();
  });

  it("keeps the seen set within the cap", async () => {
    const state: MonitorState = {
      seenFingerprints: Array.from({ length: 498 }, (_, i) => `old-${i}`),
      lastScanTimestamp: null
    };
    const { deps, mem } = setup({ feed: { A: [1, 2, 3, 4, 5].map((i) => post("A", i)) }, state });

    await runScan(deps);

    const seen = mem.current().seenFingerprints;
    expect(seen).toHaveLength(500);
    expect(seen[0]).toBe("old-3");
    expect(seen[499]).toBe(fingerprintText(post("A", 5).text));
  });

  it("still persists once when a later stage throws", async () => {
    const { deps, mem } = setup({ feed: { A: [post("A", 1)] } });
    deps.summarizer = {
      summarize: async () => {
        throw new Error("boom");
      }
    };

    await expect(runScan(deps)).rejects.toThrow("boom");

    expect(mem.saves).toHaveLength(1);
    expect(mem.saves[0].seenFingerprints).toEqual([fingerprintText(post("A", 1).text)]);
    expect(mem.saves[0].lastScanTimestamp).toBe("2026-01-30T12:00:00.000Z");
  });

  it("surfaces the stage error when saving also fails", async () => {
    const { deps } = setup({ feed: { A: [post("A", 1)] } });
    deps.summarizer = {
      summarize: async () => {
        throw new Error("boom");
      }
    };
    const save = vi.fn(async (_s: MonitorState) => {
      throw new Error("disk full");
    });
    deps.store = { load: async () => emptyState(), save };

    await expect(runScan(deps)).rejects.toThrow("boom");
    expect(save).toHaveBeenCalledTimes(1);
  });

  it("surfaces the save error when every stage succeeded", async () => {
    const { deps, notify } = setup({ feed: { A: [post("A", 1)] } });
    deps.store = {
      load: async () => emptyState(),
      save: async () => {
        throw new Error("disk full");
      }
    };

    await expect(runScan(deps)).rejects.toThrow("disk full");
    expect(notify).toHaveBeenCalledTimes(1);
  });

  it("keeps account order in the analyzed batch", async () => {
    const { deps, summarize } = setup({ feed: { B: [post("B", 1)], A: [post("A", 1), post("A", 2)] } });

    await runScan(deps);

    expect(summarize).toHaveBeenCalledWith([post("B", 1), post("A", 1), post("A", 2)]);
  });
});
