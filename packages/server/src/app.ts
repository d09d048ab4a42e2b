import express from "express";
import cors from "cors";
import fs from "fs";
import path from "path";
import { z } from "zod";

import type { AppConfig } from "./config.js";
import type { CollegeData } from "./data/collegeData.js";
import { err } from "./errors.js";
import type { LlmClient } from "./llm/client.js";
import { relayChat } from "./chat/relay.js";

export const ROOT_STATUS = "Chatbot server is running";

const ChatMessageSchema = z.object({
  message: z.string().nullish(),
});

export type AppDeps = {
  llm: LlmClient | null;
  loadData: () => Promise<CollegeData>;
};

function isBodyParseError(e: unknown): boolean {
  return Boolean(e && typeof e === "object" && "type" in e && e.type === "entity.parse.failed");
}

export function createApp(cfg: AppConfig, deps: AppDeps): express.Express {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "2mb" }));

  // Replies reflect live sheet data.
  app.use("/chat", (_req, res, next) => {
    res.setHeader("Cache-Control", "no-store");
    next();
  });

  // --- Liveness ---
  app.head("/", (_req, res) => {
    res.status(200).end();
  });
  app.get("/", (_req, res) => {
    res.json({ status: ROOT_STATUS });
  });

  // --- Chat ---
  app.post("/chat", async (req, res) => {
    const parsed = ChatMessageSchema.safeParse(req.body);
    if (!parsed.success) {
      return res
        .status(422)
        .json(err("INVALID_BODY", "Body must be a JSON object with a string 'message'", parsed.error.issues));
    }

    const out = await relayChat(parsed.data.message, {
      llm: deps.llm,
      mode: cfg.promptMode,
      persona: cfg.persona,
      loadData: deps.loadData,
    });
    return res.json(out);
  });

  // --- Static images ---
  const imagesDir = path.resolve(cfg.imagesDir);
  if (fs.existsSync(imagesDir)) {
    app.use("/images", express.static(imagesDir));
  } else {
    console.warn(`[server] images directory ${imagesDir} not found; /images is disabled`);
  }

  app.use((req, res) => {
    res.status(404).json(err("NOT_FOUND", `No route for ${req.method} ${req.path}`));
  });

  // Malformed JSON is a client error, reported the same way as a schema mismatch.
  app.use((e: unknown, _req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (isBodyParseError(e)) {
      return res.status(422).json(err("INVALID_BODY", "Body is not valid JSON"));
    }
    return next(e);
  });

  return app;
}
