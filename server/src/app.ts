import cors from "cors";
import express from "express";
import { existsSync } from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { CycleLog, LogEntry } from "./cycle_log.js";
import type { CycleExecutor } from "./executor.js";
import type { LastResultStore } from "./result_store.js";
import { DEFAULT_MAX_ITERATIONS } from "./pipeline/orchestrator.js";
import { NO_RESULT, projectCycleResult } from "./pipeline/projection.js";
import { webDirAbs } from "./pipeline/utils.js";

export const SERVICE_NAME = "autonomous-newsroom";
export const TOPIC_MAX_CHARS = 500;
const SSE_PING_MS = 15_000;

const StartCycleBodySchema = z.object({
  topic: z.string().trim().min(1).max(TOPIC_MAX_CHARS),
  max_iterations: z.number().int().min(1).default(DEFAULT_MAX_ITERATIONS)
});

const LogsQuerySchema = z.object({
  lines: z.coerce.number().int().min(1).max(1000).default(50)
});

const LastResultQuerySchema = z.object({
  truncate: z
    .enum(["true", "false", "1", "0"])
    .optional()
    .transform((value) => value === "true" || value === "1")
});

export type AppDeps = {
  executor: CycleExecutor;
  store: LastResultStore;
  log: CycleLog;
  generationMode: string;
  model: string;
};

export type AppOptions = {
  /** Folder holding `index.html` and `static/`. The UI routes are skipped when it has no index.html. */
  webDir?: string;
};

export function createApp(deps: AppDeps, options: AppOptions = {}) {
  const { executor, store, log } = deps;
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "100kb" }));

  app.get("/health", (_req, res) => {
    res.json({
      status: "healthy",
      service: SERVICE_NAME,
      generationMode: deps.generationMode,
      model: deps.model,
      activeCycles: executor.activeCycles().length,
      queuedCycles: executor.queuedCycles().length,
      cycles: executor.activeCycles().map((cycle) => ({
        cycle_id: cycle.cycleId,
        topic: cycle.topic,
        phase: cycle.phase,
        iteration: cycle.iteration,
        max_iterations: cycle.maxIterations
      }))
    });
  });

  app.get("/api", (_req, res) => {
    res.json({
      status: "ok",
      message: "Autonomous Newsroom API. POST /start-cycle with a topic, then poll /last-result.",
      endpoints: ["/health", "/api", "/start-cycle", "/last-result", "/logs", "/events"]
    });
  });

  app.post("/start-cycle", (req, res) => {
    const parsed = StartCycleBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    const { topic, max_iterations } = parsed.data;
    log.info(`Cycle requested: "${topic}" (max iterations: ${max_iterations})`);
    const request = executor.trigger(topic, max_iterations);
    res.json({
      message: "Cycle accepted. The agents are starting work.",
      cycle_id: request.cycleId,
      topic,
      max_iterations,
      status: "processing"
    });
  });

  app.get("/last-result", (req, res) => {
    const parsed = LastResultQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    const result = store.get();
    if (!result) {
      res.json(NO_RESULT);
      return;
    }
    res.json(projectCycleResult(result, { fullBody: !parsed.data.truncate }));
  });

  app.get("/logs", async (req, res) => {
    const parsed = LogsQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    try {
      const lines = await log.tail(parsed.data.lines);
      res.type("text/plain").send(lines.join("\n"));
    } catch (err) {
      res.status(500).json({ error: err instanceof Error ? err.message : String(err) });
    }
  });

  app.get("/events", (req, res) => {
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.flushHeaders();

    const send = (type: string, payload: unknown) => {
      res.write(`event: ${type}\n`);
      res.write(`data: ${JSON.stringify(payload)}\n\n`);
    };

    const unsubscribe = log.subscribe((entry: LogEntry) => send("log", entry));
    send("hello", { message: "SSE connected" });

    const ping = setInterval(() => {
      res.write("event: ping\n");
      res.write("data: {}\n\n");
    }, SSE_PING_MS);

    req.on("close", () => {
      clearInterval(ping);
      unsubscribe();
      res.end();
    });
  });

  const webDir = options.webDir ?? webDirAbs();
  const webIndex = path.join(webDir, "index.html");
  if (existsSync(webIndex)) {
    app.use("/static", express.static(path.join(webDir, "static"), { fallthrough: false }));
    app.get("/", (_req, res) => {
      res.sendFile(webIndex);
    });
  }

  return app;
}
