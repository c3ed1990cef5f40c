import { existsSync } from "node:fs";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { logger } from "../logger.js";
import { safeErrorMessage } from "../redact.js";
import { fingerprintPost } from "./fingerprint.js";
import { emptyState, type MonitorState, type Post } from "./types.js";

export const DEFAULT_SEEN_CAP = 500;

/** On-disk shape. Field names are part of the persisted format. */
const StateDocumentSchema = z.object({
  seen_hashes: z.array(z.string()),
  last_scan: z.string().nullable().optional()
});

type StateDocument = z.infer<typeof StateDocumentSchema>;

export interface StateStore {
  load(): Promise<MonitorState>;
  save(state: MonitorState): Promise<void>;
}

/**
 * Explicit path wins; otherwise prefer the /data volume when it exists, then
 * a per-user directory.
 */
export function resolveStatePath(
  explicit?: string,
  opts?: { dataDir?: string; homeDir?: string }
): string {
  if (explicit) return path.resolve(explicit);
  const dataDir = opts?.dataDir ?? "/data";
  if (existsSync(dataDir)) return path.join(dataDir, "x-monitor-state.json");
  const home = opts?.homeDir ?? os.homedir();
  return path.join(home, ".x-monitor", "state.json");
}

export function filterNew(posts: readonly Post[], state: MonitorState): { newPosts: Post[]; state: MonitorState } {
  const seen = new Set(state.seenFingerprints);
  const seenFingerprints = [...state.seenFingerprints];
  const newPosts: Post[] = [];

  for (const post of posts) {
    const fp = fingerprintPost(post);
    if (seen.has(fp)) continue;
    seen.add(fp);
    seenFingerprints.push(fp);
    newPosts.push(post);
  }

  return { newPosts, state: { ...state, seenFingerprints } };
}

/** Drop the oldest fingerprints so at most `cap` remain. */
export function evictOverflow(state: MonitorState, cap = DEFAULT_SEEN_CAP): MonitorState {
  if (state.seenFingerprints.length <= cap) return state;
  return { ...state, seenFingerprints: state.seenFingerprints.slice(-cap) };
}

export function toDocument(state: MonitorState): StateDocument {
  return { seen_hashes: [...state.seenFingerprints], last_scan: state.lastScanTimestamp };
}

export function fromDocument(doc: StateDocument): MonitorState {
  return { seenFingerprints: [...doc.seen_hashes], lastScanTimestamp: doc.last_scan ?? null };
}

/** Never throws: a missing or unusable document yields a fresh state. */
export async function loadState(p: string): Promise<MonitorState> {
  let raw: string;
  try {
    raw = await readFile(p, "utf8");
  } catch (err) {
    const code = err instanceof Error && "code" in err ? err.code : undefined;
    if (code === "ENOENT") {
      logger.info("state.fresh", { path: p, reason: "missing" });
    } else {
      logger.warn("state.unreadable", { path: p, error: safeErrorMessage(err) });
    }
    return emptyState();
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    logger.warn("state.corrupt", { path: p, error: safeErrorMessage(err) });
    return emptyState();
  }

  const parsed = StateDocumentSchema.safeParse(json);
  if (!parsed.success) {
    logger.warn("state.invalid", { path: p, error: parsed.error.issues[0]?.message ?? "unknown error" });
    return emptyState();
  }

  return fromDocument(parsed.data);
}

/** Write to a sibling temp file, then rename over the target. */
export async function saveState(p: string, state: MonitorState): Promise<void> {
  await mkdir(path.dirname(p), { recursive: true });
  const tmp = `${p}.${process.pid}.tmp`;
  await writeFile(tmp, JSON.stringify(toDocument(state), null, 2), "utf8");
  await rename(tmp, p);
}

export function createFileStateStore(p: string): StateStore {
  return {
    load: () => loadState(p),
    save: (state) => saveState(p, state)
  };
}
