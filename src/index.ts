import express from "express";
import { closeDb } from "./db/index.js";
import { loadConfig } from "./lib/config.js";
import { createRunSchema } from "./lib/options.js";
import * as runService from "./services/run.service.js";

async function main(): Promise<void> {
  const config = loadConfig();

  const app = express();
  app.use(express.json());

  app.post("/runs", async (req, res) => {
    const parsed = createRunSchema.safeParse(req.body ?? {});

    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      res.status(400).json({
        error: issue ? `${issue.path.join(".") || "body"}: ${issue.message}` : "invalid body",
      });
      return;
    }

    const { site, ...options } = parsed.data;

    try {
      const run = await runService.createRun({ site, options });
      res.status(202).json(run);
    } catch (error) {
      console.error("Failed to create run:", error);
      res.status(500).json({ error: "Failed to create run" });
    }
  });

  app.get("/runs", async (req, res) => {
    const limit = typeof req.query.limit === "string" ? Number(req.query.limit) : undefined;

    if (limit !== undefined && (!Number.isInteger(limit) || limit <= 0)) {
      res.status(400).json({ error: "limit must be a positive integer" });
      return;
    }

    try {
      const runs = await runService.listRuns(limit);
      res.json(runs);
    } catch (error) {
      console.error("Failed to list runs:", error);
      res.status(500).json({ error: "Failed to list runs" });
    }
  });

  app.get("/runs/:id", async (req, res) => {
    try {
      const run = await runService.getRun(req.params.id);

      if (!run) {
        res.status(404).json({ error: "Run not found" });
        return;
      }

      res.json(run);
    } catch (error) {
      console.error("Failed to get run:", error);
      res.status(500).json({ error: "Failed to get run" });
    }
  });

  app.post("/runs/:id/cancel", (req, res) => {
    if (!runService.cancelRun(req.params.id)) {
      res.status(404).json({ error: "No active run with this id" });
      return;
    }
    res.status(202).json({ id: req.params.id, status: "cancelling" });
  });

  const server = app.listen(config.port, () => {
    console.log(`Discovery worker listening on port ${config.port}`);
  });

  const shutdown = async (): Promise<void> => {
    console.log("Shutting down...");
    runService.cancelAllRuns();
    server.close();
    await closeDb();
    process.exit(0);
  };

  process.on("SIGTERM", () => {
    shutdown().catch((error) => {
      console.error("Shutdown error:", error);
      process.exit(1);
    });
  });
}

main().catch((error) => {
  console.error("Worker error:", error);
  process.exit(1);
});
