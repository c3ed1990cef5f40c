#!/usr/bin/env node
import { parseCliArgs, USAGE } from "./cli.js";
import { loadConfig } from "./config.js";
import { logger } from "./logger.js";
import { createScanDeps, runScan } from "./monitor/index.js";
import { safeErrorMessage } from "./redact.js";
import { interruptibleSleep } from "./utils.js";

async function main() {
  const cfg = loadConfig();

  const parsed = parseCliArgs(process.argv.slice(2), { intervalSeconds: cfg.scanIntervalSeconds });
  if (!parsed.ok) {
    // eslint-disable-next-line no-console
    console.error(`${parsed.error}\n\n${USAGE}`);
    process.exitCode = 2;
    return;
  }
  const args = parsed.args;
  if (args.help) {
    // eslint-disable-next-line no-console
    console.log(USAGE);
    return;
  }

  const deps = createScanDeps(cfg);

  if (args.once) {
    await runScan(deps, { force: args.force });
    return;
  }

  if (args.force) {
    logger.warn("--force only applies with --once; ignoring", {});
  }

  logger.info("x-monitor starting", {
    accounts: cfg.accounts,
    sources: cfg.sources,
    intervalSeconds: args.intervalSeconds,
    statePath: cfg.statePath,
    dryRun: cfg.dryRun
  });

  let stopping = false;
  let wake: (() => void) | null = null;
  const stop = (signal: string) => {
    logger.info("shutdown requested", { signal });
    stopping = true;
    wake?.();
  };
  process.once("SIGINT", () => stop("SIGINT"));
  process.once("SIGTERM", () => stop("SIGTERM"));

  while (!stopping) {
    try {
      await runScan(deps);
    } catch (err) {
      logger.error("scan failed", { error: safeErrorMessage(err) });
    }
    if (stopping) break;

    logger.info("sleeping", { seconds: args.intervalSeconds });
    const nap = interruptibleSleep(args.intervalSeconds * 1000);
    wake = nap.wake;
    await nap.promise;
    wake = null;
  }
}

main().catch((err) => {
  logger.error("fatal", { error: safeErrorMessage(err) });
  process.exitCode = 1;
});
