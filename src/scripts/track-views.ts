import "dotenv/config";
import { loadConfig } from "../lib/config";
import { createTrackerDeps, runTracker, shouldSearch, summarizeReport, writeOutputs } from "../lib/core";

// --search / --no-search override the hour-of-day gate
function parseSearchFlag(args: string[]): boolean | undefined {
  if (args.includes("--search")) return true;
  if (args.includes("--no-search")) return false;
  return undefined;
}

async function main() {
  const config = loadConfig();
  const now = new Date();
  const forced = parseSearchFlag(process.argv.slice(2));
  const search = forced ?? shouldSearch(now, config.searchHours, config.utcOffsetHours);

  if (search) {
    console.log(`Searching YouTube for the latest MVs (${forced === undefined ? "scheduled hour" : "forced"}).`);
  } else {
    console.log("Search skipped this run; reporting cached MVs.");
  }

  const report = await runTracker(createTrackerDeps(config), { search });
  const files = writeOutputs(report, config.outputDir);

  console.log("=".repeat(60));
  for (const line of summarizeReport(report)) console.log(line);
  console.log(`Report written to ${files.jsonPath}`);
}

main().catch((e) => {
  console.error(e instanceof Error ? `${e.name}: ${e.message}` : e);
  process.exit(1);
});
