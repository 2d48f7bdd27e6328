import { config } from "./config";
import { createApp } from "./app";
import { GoogleSheetsLedgerStore } from "./ledger/GoogleSheetsLedgerStore";
import type { LedgerStore } from "./ledger/LedgerStore";
import { MemoryLedgerStore } from "./ledger/MemoryLedgerStore";
import { RequestLedger } from "./ledger/RequestLedger";
import { TelegramTransport } from "./messaging/telegramAdapter";
import { AdminNotifier } from "./notifications/AdminNotifier";
import { SessionStore } from "./conversation/SessionStore";
import { Processor } from "./pipeline/processor";
import { logError, logInfo, logWarn } from "./utils/logger";

function createStore(): LedgerStore | null {
  if (config.ledgerBackend === "memory") {
    logWarn("using in-memory ledger; requests are lost on restart");
    return new MemoryLedgerStore();
  }
  if (!config.googleSheetId) {
    logError("GOOGLE_SHEET_ID not set! Check your .env file.");
    return null;
  }
  return new GoogleSheetsLedgerStore({
    spreadsheetId: config.googleSheetId,
    sheetName: config.googleSheetName,
    credentialsJson: config.googleCredentialsJson,
    keyFile: config.googleCredentialsFile
  });
}

function main() {
  if (!config.telegramBotToken) {
    logError("TELEGRAM_BOT_TOKEN not set! Check your .env file.");
    process.exitCode = 1;
    return;
  }
  const store = createStore();
  if (!store) {
    process.exitCode = 1;
    return;
  }

  const transport = new TelegramTransport(config.telegramBotToken);
  const notifier = new AdminNotifier(transport, config.adminChatId);
  const processor = new Processor({
    ledger: new RequestLedger(store),
    transport,
    notifier,
    costCenters: config.costCenters,
    sessions: new SessionStore(config.sessionTtlMinutes * 60 * 1000)
  });

  const app = createApp({
    processor,
    transport,
    webhookSecret: config.telegramWebhookSecret,
    adminApiToken: config.adminApiToken
  });

  const server = app.listen(config.port, () => {
    logInfo(`Server running on ${config.port}`, { ledger: config.ledgerBackend }, { critical: true });
    if (config.adminChatId) {
      logInfo("admin notifications enabled", { adminChatId: config.adminChatId }, { critical: true });
    }
  });

  const shutdown = () => {
    server.close(() => {
      notifier.flush().then(
        () => process.exit(0),
        () => process.exit(1)
      );
    });
  };
  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
}

main();
