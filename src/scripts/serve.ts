import "dotenv/config";
import { loadConfig } from "../lib/config";
import { createTrackerDeps, runTracker, shouldSearch } from "../lib/core";
import { createApp } from "../server";

const config = loadConfig();
const deps = createTrackerDeps(config);
const PORT = Number(process.env.PORT || 5173);
const HOST = process.env.HOST || "127.0.0.1";
const corsOrigins = (process.env.CORS_ORIGINS ?? "")
  .split(",")
  .map((o) => o.trim())
  .filter(Boolean);

const app = createApp({
  run: (search) =>
    runTracker(deps, {
      search: search ?? shouldSearch(new Date(), config.searchHours, config.utcOffsetHours),
    }),
  store: deps.store,
  outputDir: config.outputDir,
  corsOrigins,
});

app.listen(PORT, HOST, () => {
  console.log(`Tracker server on http://${HOST}:${PORT}`);
});
