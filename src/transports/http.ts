import express from "express";
import type { Logger } from "pino";
import type { ToolDispatcher } from "../tools/ToolDispatcher";
import type { ToolInput } from "../tools/ToolTypes";

function isRecord(value: unknown): value is ToolInput {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// The front forwards calls untouched; it does not require a prior `validate` call.
export function createApp(dispatcher: ToolDispatcher, opts: { serverName: string; logger: Logger }) {
  const { serverName, logger } = opts;
  const app = express();
  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (req, res) => {
    res.json({ ok: true, server: serverName, tools: dispatcher.listTools().length });
  });

  app.get("/tools", (req, res) => {
    try { res.json(dispatcher.listTools()); } catch (e: unknown) {
      logger.error({ err: e }, "tool listing failed");
      res.status(500).json({ error: e instanceof Error ? e.message : "tools listing failed" });
    }
  });

  // POST /call_tool { name, arguments? }
  app.post("/call_tool", async (req, res) => {
    const body: unknown = req.body;
    if (!isRecord(body) || typeof body.name !== "string") {
      return res.status(400).json({ error: "name is required" });
    }
    const args = body.arguments ?? {};
    if (!isRecord(args)) return res.status(400).json({ error: "arguments must be an object" });
    try {
      res.json({ content: await dispatcher.callText(body.name, args) });
    } catch (e: unknown) {
      logger.error({ err: e }, "call_tool failed");
      res.status(500).json({ error: e instanceof Error ? e.message : "tool call failed" });
    }
  });

  return app;
}
