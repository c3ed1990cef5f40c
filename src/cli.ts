export type CliArgs = {
  once: boolean;
  force: boolean;
  intervalSeconds: number;
  help: boolean;
};

export type CliParse = { ok: true; args: CliArgs } | { ok: false; error: string };

export const USAGE = [
  "Usage:",
  "  x-monitor [--once] [--interval <seconds>] [--force]",
  "",
  "Options:",
  "  --once                 Run a single scan and exit",
  "  --interval <seconds>   Seconds between scans (default $SCAN_INTERVAL_SECONDS or 3600)",
  "  --force                Summarize and post even when no new posts were found (with --once)",
  "  -h, --help             Show this help"
].join("\n");

function parseInterval(raw: string | undefined): number | null {
  if (!raw || !/^\d+$/.test(raw)) return null;
  const n = Number(raw);
  return Number.isSafeInteger(n) && n > 0 ? n : null;
}

/** `argv` is the user part only (process.argv.slice(2)). */
export function parseCliArgs(argv: readonly string[], defaults: { intervalSeconds: number }): CliParse {
  const out: CliArgs = { once: false, force: false, intervalSeconds: defaults.intervalSeconds, help: false };

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === "--once") {
      out.once = true;
      continue;
    }
    if (a === "--force") {
      out.force = true;
      continue;
    }
    if (a === "-h" || a === "--help") {
      out.help = true;
      continue;
    }
    if (a === "--interval" || a.startsWith("--interval=")) {
      const raw = a === "--interval" ? argv[++i] : a.slice("--interval=".length);
      const n = parseInterval(raw);
      if (n === null) return { ok: false, error: `--interval expects a positive integer, got ${raw ?? "nothing"}` };
      out.intervalSeconds = n;
      continue;
    }
    return { ok: false, error: `unknown argument: ${a}` };
  }

  return { ok: true, args: out };
}
