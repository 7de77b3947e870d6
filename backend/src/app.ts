// src/app.ts
import express from "express";
import cors from "cors";
import { z } from "zod";
import type { MapAgent } from "./agent/agent";
import type { ToolRegistry } from "./agent/registry";
import { bootstrap } from "./bootstrap";
import { describeError } from "./errors";
import { logEvent } from "./logger";

export type AppDeps = {
  registry: ToolRegistry;
  /** One fresh agent per /chat request; /chat answers 503 without it. */
  newAgent?: () => MapAgent;
};

const ChatBody = z.object({ message: z.string().min(1) });

export function createApp({ registry, newAgent }: AppDeps) {
  const app = express();

  // Middleware
  app.use(cors({ origin: true }));
  app.use(express.json({ limit: "2mb" }));

  // Healthcheck
  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  // Tool schema, as the model sees it
  app.get("/tools", (_req, res) => {
    res.json({ tools: registry.schema() });
  });

  // Run one tool directly; the body is its arguments
  app.post("/tools/:name", async (req, res) => {
    const name = req.params.name;
    const result = await registry.executeTool(name, req.body);
    res.status(registry.has(name) ? 200 : 404).json(result);
  });

  // Chat (JSON request/response)
  app.post("/chat", async (req, res) => {
    const body = ChatBody.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: "Body must include { message: string }" });
      return;
    }
    if (!newAgent) {
      res.status(503).json({ error: "Chat is not configured: set OPENAI_API_KEY" });
      return;
    }
    try {
      res.json(await newAgent().chat(body.data.message));
    } catch (err) {
      logEvent("error", "chat_failed", { error: describeError(err) });
      res.status(500).json({ error: "Internal error" });
    }
  });

  return app;
}

if (require.main === module) {
  try {
    const { config, gateway, newAgent } = bootstrap();
    const app = createApp({ registry: gateway.registry, newAgent });
    app.listen(config.port, "0.0.0.0", () => {
      logEvent("info", "server_started", { url: `http://localhost:${config.port}`, tools: gateway.registry.names().length });
    });
  } catch (err) {
    logEvent("error", "startup_failed", { error: describeError(err) });
    process.exitCode = 1;
  }
}
