import express from "express";
import cors from "cors";
import fs from "fs";
import path from "path";
import { z } from "zod";
import { REPORT_CSV, REPORT_JSON, summarizeReport, writeOutputs } from "./lib/core";
import { errorMessage } from "./lib/errors";
import type { StateStore } from "./lib/state";
import type { RunReport } from "./lib/types";

export type ServerDeps = {
  // search undefined = decide by the hour gate
  run: (search?: boolean) => Promise<RunReport>;
  store: StateStore;
  outputDir: string;
  // Browser origins allowed to call the API; none by default
  corsOrigins?: string[];
};

const RunBody = z.object({ search: z.boolean().optional() }).default({});

export function createApp(deps: ServerDeps) {
  const app = express();
  app.use(cors({ origin: deps.corsOrigins?.length ? deps.corsOrigins : false }));
  app.use(express.json());

  // One run at a time; state.json has a single writer
  let running = false;

  // --- API: run job ---
  app.post("/api/run", async (req, res) => {
    const body = RunBody.safeParse(req.body ?? {});
    if (!body.success) return res.status(400).json({ error: "Bad params" });
    if (running) return res.status(409).json({ error: "A run is already in progress" });

    running = true;
    try {
      const report = await deps.run(body.data.search);
      writeOutputs(report, deps.outputDir);
      res.json({ report, summary: summarizeReport(report) });
    } catch (e) {
      console.error("Run failed:", errorMessage(e));
      res.status(500).json({ error: errorMessage(e) });
    } finally {
      running = false;
    }
  });

  app.get("/api/state", async (_req, res) => {
    try {
      res.json(await deps.store.load());
    } catch (e) {
      res.status(500).json({ error: errorMessage(e) });
    }
  });

  // --- Downloads (most recent report) ---
  const sendReport = (file: string, type: string) => (_req: express.Request, res: express.Response) => {
    const p = path.resolve(deps.outputDir, file);
    if (!fs.existsSync(p)) return res.status(404).json({ error: "No report yet" });
    res.type(type).send(fs.readFileSync(p, "utf8"));
  };
  app.get("/download/json", sendReport(REPORT_JSON, "application/json"));
  app.get("/download/csv", sendReport(REPORT_CSV, "text/csv"));

  return app;
}
