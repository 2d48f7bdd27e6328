import express from "express";
import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import type { ChatTransport, ChoiceLayout } from "./ChatTransport";
import type { ChatEvent, ChoiceOption, Sender } from "../types";
import { errorMessage, logError, logWarn } from "../utils/logger";

const MAX_TEXT_LEN = 4096;
const MAX_CAPTION_LEN = 1024;

const userSchema = z.object({
  id: z.number(),
  first_name: z.string(),
  last_name: z.string().optional()
});

const chatSchema = z.object({ id: z.union([z.number(), z.string()]) });

const messageSchema = z.object({
  chat: chatSchema,
  from: userSchema.optional(),
  text: z.string().optional(),
  photo: z.array(z.object({ file_id: z.string() })).optional()
});

export const updateSchema = z.object({
  update_id: z.number(),
  message: messageSchema.optional(),
  callback_query: z
    .object({
      id: z.string(),
      from: userSchema,
      data: z.string().optional(),
      message: z.object({ chat: chatSchema }).optional()
    })
    .optional()
});

export type TelegramUpdate = z.infer<typeof updateSchema>;

export type InboundUpdate = { event: ChatEvent; callbackQueryId?: string };

function toSender(user: z.infer<typeof userSchema> | undefined): Sender {
  return { firstName: user?.first_name ?? "", lastName: user?.last_name };
}

/** "/suche@MyBot Toner A4" -> name "suche", args ["Toner", "A4"] */
export function parseCommand(text: string): { name: string; args: string[] } | null {
  if (!text.startsWith("/")) return null;
  const [head, ...args] = text.trim().split(/\s+/);
  const name = head.slice(1).split("@")[0].toLowerCase();
  if (!name) return null;
  return { name, args };
}

export function toChatEvent(update: TelegramUpdate): InboundUpdate | null {
  const query = update.callback_query;
  if (query) {
    if (query.data === undefined) return null;
    const identity = String(query.message?.chat.id ?? query.from.id);
    return {
      event: { kind: "selection", identity, sender: toSender(query.from), choiceToken: query.data },
      callbackQueryId: query.id
    };
  }

  const message = update.message;
  if (!message) return null;
  const identity = String(message.chat.id);
  const sender = toSender(message.from);

  if (message.photo && message.photo.length > 0) {
    // Telegram lists sizes ascending; the last one is the largest.
    const largest = message.photo[message.photo.length - 1];
    return { event: { kind: "photo", identity, sender, attachmentHandle: largest.file_id } };
  }
  if (message.text === undefined) return null;
  const command = parseCommand(message.text);
  if (command) return { event: { kind: "command", identity, sender, ...command } };
  return { event: { kind: "text", identity, sender, text: message.text } };
}

// Cuts on code points so a surrogate pair is never split.
export function truncate(text: string, max: number): string {
  if (text.length <= max) return text;
  const chars = Array.from(text);
  let kept = "";
  for (const ch of chars) {
    if (kept.length + ch.length > max - 1) break;
    kept += ch;
  }
  return kept + "…";
}

export class TelegramTransport implements ChatTransport {
  private http: AxiosInstance;

  constructor(botToken: string, http?: AxiosInstance) {
    this.http = http ?? axios.create({ baseURL: `https://api.telegram.org/bot${botToken}`, timeout: 15000 });
  }

  async sendText(identity: string, text: string): Promise<void> {
    await this.http.post("/sendMessage", { chat_id: identity, text: truncate(text, MAX_TEXT_LEN) });
  }

  async sendPhoto(identity: string, attachmentHandle: string, caption: string): Promise<void> {
    await this.http.post("/sendPhoto", { chat_id: identity, photo: attachmentHandle, caption: truncate(caption, MAX_CAPTION_LEN) });
  }

  async offerChoices(identity: string, prompt: string, options: ChoiceOption[], layout: ChoiceLayout = {}): Promise<void> {
    const columns = Math.max(1, layout.columns ?? 1);
    const rows: { text: string; callback_data: string }[][] = [];
    options.forEach((option, i) => {
      if (i % columns === 0) rows.push([]);
      rows[rows.length - 1].push({ text: option.label, callback_data: option.token });
    });
    await this.http.post("/sendMessage", {
      chat_id: identity,
      text: truncate(prompt, MAX_TEXT_LEN),
      reply_markup: { inline_keyboard: rows }
    });
  }

  async answerCallbackQuery(callbackQueryId: string): Promise<void> {
    await this.http.post("/answerCallbackQuery", { callback_query_id: callbackQueryId });
  }
}

export type TelegramRouterOptions = {
  /** Compared with the X-Telegram-Bot-Api-Secret-Token header when set. */
  webhookSecret?: string;
  transport?: TelegramTransport;
};

export function telegramRouter(processEvent: (event: ChatEvent) => Promise<void>, options: TelegramRouterOptions = {}) {
  const router = express.Router();

  router.post("/telegram", async (req, res) => {
    if (options.webhookSecret && req.get("x-telegram-bot-api-secret-token") !== options.webhookSecret) {
      return res.sendStatus(401);
    }
    const parsed = updateSchema.safeParse(req.body);
    if (!parsed.success) {
      logWarn("ignoring malformed telegram update", { issues: parsed.error.issues.map(i => i.path.join(".") + ": " + i.message) });
      return res.sendStatus(200);
    }
    const inbound = toChatEvent(parsed.data);
    if (!inbound) return res.sendStatus(200);

    if (inbound.callbackQueryId && options.transport) {
      options.transport.answerCallbackQuery(inbound.callbackQueryId).catch(e => {
        logWarn("answerCallbackQuery failed", { error: errorMessage(e) });
      });
    }
    try {
      await processEvent(inbound.event);
    } catch (e) {
      logError("processing telegram update failed", { updateId: parsed.data.update_id, error: errorMessage(e) });
    }
    res.sendStatus(200);
  });

  return router;
}
