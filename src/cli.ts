import { writeFileSync } from "node:fs";
import { getArgValue, loadConfig } from "./config";
import { buildDashboard, parseYearsParam } from "./dashboard";
import { getDataset } from "./loader";

/**
 * CLI entrypoint.
 *
 * Pipeline:
 * 1) Resolve configuration (data path, sheet, year selection, output file).
 * 2) Load and prepare the dataset.
 * 3) Build the dashboard for the selected years.
 * 4) Print the metrics and chart sizes.
 * 5) Optionally write the full view as JSON (`--out`).
 */
export async function runCli(): Promise<void> {
  const config = loadConfig();
  const yearsArg = getArgValue("--years");
  const outPath = getArgValue("--out");

  const dataset = getDataset(config.dataPath, config.sheetName);
  if (dataset.status === "unavailable") {
    console.error(`Awaiting data: ${dataset.cause}`);
    process.exit(1);
    return;
  }

  const view = buildDashboard(
    dataset.table,
    yearsArg === null ? null : parseYearsParam(yearsArg)
  );

  console.log(view.title);
  console.log(
    `Years: ${view.selectedYears.join(", ") || "(none)"} of ${view.availableYears.join(", ") || "(none)"}`
  );
  for (const m of view.metrics) {
    console.log(`  ${m.label}: ${m.value ?? "-"}`);
  }

  console.log("");
  for (const c of view.charts) {
    const total = c.data.reduce((acc, d) => acc + d.count, 0);
    console.log(`  [${c.kind}] ${c.title}: ${c.data.length} categories, ${total} counts`);
  }

  if (outPath) {
    writeFileSync(outPath, JSON.stringify(view, null, 2), "utf8");
    console.log(`\nWrote ${outPath}`);
  }
}

runCli().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
