import cors from "cors";
import express from "express";
import type { Express, NextFunction, Request, Response } from "express";
import { START_POSITION } from "@movescan/shared";
import { analyzePosition } from "./analysis";
import { movesRequestSchema } from "./schemas";

// body-parser tags client failures (413, 415, ...) with their HTTP status.
const clientErrorStatus = (error: unknown): number | null => {
  if (typeof error !== "object" || error === null || !("status" in error)) return null;
  const { status } = error;
  return typeof status === "number" && status >= 400 && status < 500 ? status : null;
};

export const createApp = (): Express => {
  const app = express();
  app.use(cors());
  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.get("/api/start", (_req, res) => {
    res.json({ board: START_POSITION });
  });

  app.post("/api/moves", (req, res) => {
    const parsed = movesRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
      res.status(400).json({ error: `Invalid request payload (${where}${issue.message})` });
      return;
    }
    const result = analyzePosition(parsed.data);
    if (!result.ok) {
      res.status(result.status).json({ error: result.error });
      return;
    }
    res.json(result.value);
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: "Invalid JSON payload" });
      return;
    }
    const status = clientErrorStatus(error);
    if (status !== null) {
      res.status(status).json({ error: error instanceof Error ? error.message : "Bad request" });
      return;
    }
    console.error("Request failed", error);
    res.status(500).json({ error: "Internal error" });
  });

  return app;
};
