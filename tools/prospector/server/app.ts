import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { emitAgentEvent } from "../pipeline/events.js";
import {
  handleBodyError,
  handleIndex,
  handleListRuns,
  handleListRunsByCategory,
  handleRunLeadPipeline,
  handleUpdateCategory,
  handleUpdateEvaluation,
  type HandlerDeps,
  type HandlerResponse,
} from "./handlers.js";

export function createApp(deps: HandlerDeps): Express {
  const app = express();

  app.use(express.json({ limit: "1mb" }));
  app.use((req, res, next) => {
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    if (req.method === "OPTIONS") {
      res.sendStatus(204);
      return;
    }
    next();
  });

  // ── Pipeline ────────────────────────────────────────────
  app.post("/run-lead-pipeline", async (req, res) => {
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) {
        controller.abort(new Error("client disconnected"));
      }
    });
    send(req, res, await handleRunLeadPipeline(deps, req.body, controller.signal));
  });

  // ── Evaluation review ───────────────────────────────────
  app.get("/evaluation/runs", async (req, res) => {
    send(req, res, await handleListRuns(deps));
  });

  app.get("/evaluation/runs/category/:category", async (req, res) => {
    send(req, res, await handleListRunsByCategory(deps, req.params.category));
  });

  app.post("/evaluation/update-category", async (req, res) => {
    send(req, res, await handleUpdateCategory(deps, req.body));
  });

  app.post("/evaluation/update-evaluation", async (req, res) => {
    send(req, res, await handleUpdateEvaluation(deps, req.body));
  });

  app.get("/", (req, res) => {
    send(req, res, handleIndex());
  });

  // Body-parser failures from express.json() arrive here.
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    send(req, res, handleBodyError(error));
  });

  return app;
}

function send(req: Request, res: Response, response: HandlerResponse): void {
  emitAgentEvent({
    level: response.status >= 500 ? "warn" : "info",
    eventType: "server.request",
    message: `${req.method} ${req.path}`,
    phase: "end",
    statusCode: response.status,
  });
  if (res.headersSent || res.destroyed) {
    return;
  }
  res.status(response.status).json(response.body);
}
