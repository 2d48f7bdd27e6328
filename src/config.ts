import dotenv from "dotenv";
dotenv.config();

const DEFAULT_COST_CENTERS = ["Lager", "Stahlhalle", "Bulli", "HR", "Finanzen", "Produktion", "Andere"];

export function parseList(raw: string | undefined, fallback: string[]): string[] {
  const items = (raw || "").split(",").map(s => s.trim()).filter(Boolean);
  return items.length > 0 ? items : fallback;
}

export type LedgerBackend = "sheets" | "memory";

function ledgerBackend(raw: string | undefined): LedgerBackend {
  return raw === "memory" ? "memory" : "sheets";
}

export const config = {
  port: Number(process.env.PORT || 3000),
  telegramBotToken: process.env.TELEGRAM_BOT_TOKEN,
  telegramWebhookSecret: process.env.TELEGRAM_WEBHOOK_SECRET || undefined,
  adminChatId: process.env.ADMIN_CHAT_ID || undefined,
  adminApiToken: process.env.ADMIN_API_TOKEN || undefined,
  ledgerBackend: ledgerBackend(process.env.LEDGER_BACKEND),
  googleSheetId: process.env.GOOGLE_SHEET_ID,
  googleSheetName: process.env.GOOGLE_SHEET_NAME || "Sheet1",
  googleCredentialsJson: process.env.GOOGLE_CREDENTIALS_JSON,
  googleCredentialsFile: process.env.GOOGLE_CREDENTIALS_FILE || "credentials.json",
  costCenters: parseList(process.env.COST_CENTERS, DEFAULT_COST_CENTERS),
  sessionTtlMinutes: Number(process.env.SESSION_TTL_MINUTES || 60)
};
