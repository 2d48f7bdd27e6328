import express from "express";
import bodyParser from "body-parser";
import { errorHandler } from "./middleware/errorHandler";
import { telegramRouter, type TelegramTransport } from "./messaging/telegramAdapter";
import type { Processor } from "./pipeline/processor";

export type AppOptions = {
  processor: Processor;
  transport?: TelegramTransport;
  webhookSecret?: string;
  adminApiToken?: string;
};

export function createApp(options: AppOptions) {
  const { processor } = options;
  const app = express();
  app.use(bodyParser.json());

  app.use("/", telegramRouter(event => processor.handleEvent(event), { transport: options.transport, webhookSecret: options.webhookSecret }));

  app.get("/health", (_req, res) => res.send({ ok: true }));

  app.post("/admin/weekly-summary", async (req, res, next) => {
    if (options.adminApiToken && req.get("x-admin-token") !== options.adminApiToken) {
      return res.status(401).json({ ok: false, error: "unauthorized" });
    }
    try {
      const outcome = await processor.pushWeeklySummary();
      if (outcome === "sent") return res.json({ ok: true });
      const status = outcome === "delivery_failed" ? 502 : 503;
      return res.status(status).json({ ok: false, error: outcome });
    } catch (e) {
      next(e);
    }
  });

  app.use(errorHandler);
  return app;
}
