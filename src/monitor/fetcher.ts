import { logger } from "../logger.js";
import { sleep } from "../utils.js";
import type { Post, SourceAdapter, SourceId } from "./types.js";

export type AccountFetch = {
  account: string;
  posts: Post[];
  // Adapter that answered; null when every adapter came back empty.
  sourceId: SourceId | null;
  attempts: Array<{ sourceId: SourceId; reason: string }>;
};

/** Try adapters in order and stop at the first one that yields posts. */
export async function fetchAccount(account: string, adapters: readonly SourceAdapter[]): Promise<AccountFetch> {
  const attempts: AccountFetch["attempts"] = [];

  for (const adapter of adapters) {
    const result = await adapter.fetch(account);
    if (result.kind === "posts" && result.posts.length > 0) {
      logger.info("fetch.account.ok", { account, source: adapter.id, posts: result.posts.length });
      return { account, posts: result.posts, sourceId: adapter.id, attempts };
    }
    const reason = result.kind === "empty" ? result.reason : "no posts";
    logger.debug("fetch.account.source_empty", { account, source: adapter.id, reason });
    attempts.push({ sourceId: adapter.id, reason });
  }

  logger.warn("fetch.account.no_data", { account, attempts });
  return { account, posts: [], sourceId: null, attempts };
}

export type FetchAllOptions = {
  delayMs: number;
  sleepFn?: (ms: number) => Promise<void>;
};

/**
 * Posts for every account, in account order then per-account fetch order.
 * The delay between accounts is a fixed courtesy pause.
 */
export async function fetchAllAccounts(
  accounts: readonly string[],
  adapters: readonly SourceAdapter[],
  opts: FetchAllOptions
): Promise<{ posts: Post[]; perAccount: AccountFetch[] }> {
  const pause = opts.sleepFn ?? sleep;
  const posts: Post[] = [];
  const perAccount: AccountFetch[] = [];

  for (let i = 0; i < accounts.length; i++) {
    if (i > 0 && opts.delayMs > 0) await pause(opts.delayMs);
    const res = await fetchAccount(accounts[i], adapters);
    perAccount.push(res);
    posts.push(...res.posts);
  }

  return { posts, perAccount };
}
