export const FEED_USER_AGENT = "Mozilla/5.0 (compatible; x-monitor/0.1)";
export const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36";

export type TextResponse = { status: number; ok: boolean; body: string };

export async function fetchWithTimeout(url: string, init?: RequestInit, timeoutMs = 15_000): Promise<Response> {
  const controller = new AbortController();
  const t = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(t);
  }
}

/**
 * GET a text body under one timeout covering headers and body.
 * Throws on network failure or timeout; non-2xx statuses are returned.
 */
export async function getText(url: string, opts: { timeoutMs: number; headers?: Record<string, string> }): Promise<TextResponse> {
  const controller = new AbortController();
  const t = setTimeout(() => controller.abort(), opts.timeoutMs);
  try {
    const res = await fetch(url, { method: "GET", headers: opts.headers, signal: controller.signal });
    const body = await res.text();
    return { status: res.status, ok: res.ok, body };
  } finally {
    clearTimeout(t);
  }
}
