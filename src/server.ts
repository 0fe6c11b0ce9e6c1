import express from "express";
import next from "next";
import { loadConfig } from "./config";
import { buildDashboard, parseYearsParam } from "./dashboard";
import { getDataset } from "./loader";

function errorMessage(err: unknown, fallback: string): string {
  return err instanceof Error && err.message ? err.message : fallback;
}

async function main(): Promise<void> {
  const config = loadConfig();
  const app = next({ dev: config.dev });
  const handle = app.getRequestHandler();

  await app.prepare();

  // Warm the memoized load so the first page view doesn't pay for it.
  const initial = getDataset(config.dataPath, config.sheetName);
  if (initial.status === "ready") {
    console.log(
      `Dataset ready: ${initial.table.records.length} records from ${initial.source.path}`
    );
  }

  const server = express();

  // GET /api/health -> dataset status
  server.get("/api/health", (_req, res) => {
    const dataset = getDataset(config.dataPath, config.sheetName);
    if (dataset.status === "unavailable") {
      return res.json({ status: dataset.status, cause: dataset.cause });
    }
    return res.json({
      status: dataset.status,
      rows: dataset.table.records.length,
      source: dataset.source,
    });
  });

  // GET /api/dashboard?years=2020,2022 -> metrics + charts for the selection
  server.get("/api/dashboard", (req, res) => {
    const dataset = getDataset(config.dataPath, config.sheetName);
    if (dataset.status === "unavailable") {
      return res
        .status(503)
        .json({ status: dataset.status, error: dataset.cause });
    }

    try {
      const years = parseYearsParam(req.query.years);
      return res.json(buildDashboard(dataset.table, years));
    } catch (err) {
      console.error("Failed to build dashboard:", err);
      return res
        .status(500)
        .json({ error: errorMessage(err, "Failed to build dashboard") });
    }
  });

  // Let Next handle everything else
  server.all("*", (req, res) => handle(req, res));

  server.listen(config.port, () => {
    console.log(
      `Server ready on http://localhost:${config.port} (dev=${config.dev}, data=${config.dataPath})`
    );
  });
}

main().catch((err) => {
  console.error("Fatal server error:", err);
  process.exit(1);
});
