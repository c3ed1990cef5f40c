export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Sleep that can be cut short, e.g. by a signal handler during the
 * between-scan wait.
 */
export function interruptibleSleep(ms: number): {
  promise: Promise<void>;
  wake: () => void;
} {
  let wakeFn: (() => void) | null = null;
  const promise = new Promise<void>((resolve) => {
    const t = setTimeout(() => {
      wakeFn = null;
      resolve();
    }, ms);
    wakeFn = () => {
      clearTimeout(t);
      wakeFn = null;
      resolve();
    };
  });
  return {
    promise,
    wake: () => wakeFn?.()
  };
}

/** "2026-01-30 14:05" in UTC. */
export function formatUtcMinute(d: Date): string {
  const y = d.getUTCFullYear();
  const m = String(d.getUTCMonth() + 1).padStart(2, "0");
  const day = String(d.getUTCDate()).padStart(2, "0");
  const hh = String(d.getUTCHours()).padStart(2, "0");
  const mm = String(d.getUTCMinutes()).padStart(2, "0");
  return `${y}-${m}-${day} ${hh}:${mm}`;
}

/** `max` counts code points. */
export function truncate(s: string, max: number): string {
  const chars = Array.from(s);
  return chars.length > max ? `${chars.slice(0, max).join("")}…` : s;
}
