import type { MonitorConfig } from "../config.js";
import { logger } from "../logger.js";
import { redactSecretIn, safeErrorMessage } from "../redact.js";
import { formatUtcMinute, truncate } from "../utils.js";
import { resolveBotToken } from "./credentials.js";
import { fetchWithTimeout } from "./sources/http.js";

const REQUEST_TIMEOUT_MS = 30_000;

export interface Notifier {
  /** true once the chat endpoint accepted the message; never rejects. */
  notify(summary: string, at: Date): Promise<boolean>;
}

export function formatScanMessage(summary: string, at: Date): string {
  return `🔍 *X Monitor Scan*\n_${formatUtcMinute(at)} UTC_\n\n${summary}`;
}

export function createTelegramNotifier(cfg: MonitorConfig["telegram"], opts?: { dryRun?: boolean }): Notifier {
  return {
    async notify(summary: string, at: Date): Promise<boolean> {
      const text = formatScanMessage(summary, at);

      if (opts?.dryRun) {
        logger.info("notifier.dry_run", { text });
        return true;
      }

      const token = await resolveBotToken({ fromEnv: cfg.botToken, configPath: cfg.configPath });
      if (!token) {
        logger.error("notifier.no_bot_token", { configPath: cfg.configPath });
        return false;
      }
      if (!cfg.chatId) {
        logger.error("notifier.no_chat_id", {});
        return false;
      }

      const url = `${cfg.apiUrl}/bot${token.value}/sendMessage`;
      try {
        const res = await fetchWithTimeout(
          url,
          {
            method: "POST",
            headers: { "Content-Type": "application/json" },
            body: JSON.stringify({ chat_id: cfg.chatId, text, parse_mode: "Markdown" })
          },
          REQUEST_TIMEOUT_MS
        );

        if (!res.ok) {
          const body = await res.text().catch(() => "");
          logger.error("notifier.http_error", {
            status: res.status,
            body: truncate(redactSecretIn(body, token.value), 500)
          });
          return false;
        }

        logger.info("notifier.sent", { chatId: cfg.chatId, chars: text.length });
        return true;
      } catch (err) {
        logger.error("notifier.failed", { error: redactSecretIn(safeErrorMessage(err), token.value) });
        return false;
      }
    }
  };
}
