import fs from "fs";
import path from "path";
import { stringify } from "csv-stringify/sync";
import type { TrackerConfig } from "./config";
import { errorMessage, isQuotaExceeded, SinkError } from "./errors";
import { MackerelSink, metricName, type MetricSink } from "./mackerel";
import { pickLatestMv } from "./pickBest";
import { computeViewDelta, JsonFileStateStore, nextGroupState, type StateStore } from "./state";
import type {
  CacheCause,
  Group,
  GroupOutcome,
  Logger,
  ResolvedVideo,
  RunReport,
  StateMap,
} from "./types";
import { watchUrl } from "./utils";
import { type CatalogClient, makeYouTube, YouTubeCatalog } from "./youtube";

export type TrackerDeps = {
  config: Pick<TrackerConfig, "namespace" | "groups" | "rules">;
  catalog: CatalogClient;
  sink: MetricSink;
  store: StateStore;
  now?: () => Date;
  log?: Logger;
};

// Real collaborators for a loaded config
export function createTrackerDeps(config: TrackerConfig): TrackerDeps {
  return {
    config,
    catalog: new YouTubeCatalog(makeYouTube(config.youtubeApiKey, config.requestTimeoutMs)),
    sink: new MackerelSink({
      apiKey: config.mackerelApiKey,
      service: config.service,
      baseUrl: config.mackerelBaseUrl,
      timeoutMs: config.requestTimeoutMs,
    }),
    store: new JsonFileStateStore(config.stateFile),
  };
}

export type RunOptions = {
  search: boolean;
};

// Search quota is expensive, so fresh resolution only happens at a few local hours
export function shouldSearch(
  now: Date,
  searchHours: readonly number[],
  utcOffsetHours: number
): boolean {
  const local = new Date(now.getTime() + utcOffsetHours * 3_600_000);
  return searchHours.includes(local.getUTCHours());
}

type VideoChoice = { video: ResolvedVideo; cause: null } | { video: null; cause: CacheCause };

async function chooseVideo(
  deps: TrackerDeps,
  group: Group,
  search: boolean,
  log: Logger
): Promise<VideoChoice> {
  if (!search) return { video: null, cause: "searchSkipped" };
  try {
    const latest = await pickLatestMv(deps.catalog, group, deps.config.rules, log);
    if (latest) return { video: latest, cause: null };
    log.log(`[${group.id}] no MV-like video found; falling back to cache if any`);
    return { video: null, cause: "notFound" };
  } catch (e) {
    if (isQuotaExceeded(e)) throw e;
    log.warn(`[${group.id}] search failed: ${errorMessage(e)}`);
    return { video: null, cause: "searchFailed" };
  }
}

async function processGroup(
  deps: TrackerDeps,
  state: StateMap,
  group: Group,
  search: boolean,
  log: Logger
): Promise<GroupOutcome> {
  const cached = state[group.id];

  let chosen: VideoChoice;
  try {
    chosen = await chooseVideo(deps, group, search, log);
  } catch (e) {
    if (!isQuotaExceeded(e)) throw e;
    log.error(`[${group.id}] YouTube quota exhausted during search; stopping the remaining groups`);
    return { kind: "aborted", groupId: group.id, message: e.message };
  }

  let videoId: string;
  let title: string | undefined;
  if (chosen.video) {
    videoId = chosen.video.videoId;
    title = chosen.video.title;
  } else if (cached) {
    videoId = cached.video_id;
    title = cached.title;
    log.log(`[${group.id}] using cached MV`);
  } else {
    log.log(`[${group.id}] nothing resolved and no cache; skipping until the next search run`);
    return { kind: "skipped", groupId: group.id, reason: "noData" };
  }

  log.log(`[${group.id}] MV: ${title ?? "(unknown title)"} ${watchUrl(videoId)}`);

  let viewCount: number;
  try {
    const stats = await deps.catalog.fetchStatistics(videoId);
    viewCount = stats.viewCount;
    title = title || stats.title;
  } catch (e) {
    if (isQuotaExceeded(e)) {
      log.error(`[${group.id}] YouTube quota exhausted; stopping the remaining groups`);
      return { kind: "aborted", groupId: group.id, message: e.message };
    }
    log.error(`[${group.id}] statistics fetch failed: ${errorMessage(e)}`);
    return { kind: "skipped", groupId: group.id, reason: "statsFailed", message: errorMessage(e) };
  }

  const delta = computeViewDelta(cached, videoId, viewCount);
  const time = Math.floor((deps.now ?? (() => new Date()))().getTime() / 1000);
  const ns = deps.config.namespace;
  let countPosted = false;
  try {
    await deps.sink.post({ name: metricName(ns, "viewcount", group.id, videoId), time, value: viewCount });
    countPosted = true;
    await deps.sink.post({ name: metricName(ns, "viewdelta", group.id, videoId), time, value: delta });
  } catch (e) {
    if (!(e instanceof SinkError)) throw e;
    const message = countPosted ? `${e.message} (viewcount already posted)` : e.message;
    log.error(`[${group.id}] ${message}`);
    return { kind: "skipped", groupId: group.id, reason: "sinkFailed", message };
  }

  // Committed only once both points are posted, so a failed post is picked up next run
  state[group.id] = nextGroupState(cached, videoId, viewCount, title);
  log.log(`[${group.id}] views=${viewCount} delta=${delta}`);

  const video = { videoId, title: title ?? "", viewCount, delta };
  return chosen.cause === null
    ? { kind: "resolved", groupId: group.id, video }
    : { kind: "usedCache", groupId: group.id, cause: chosen.cause, video };
}

/**
 * One tracking run over every configured group, in order.
 * State is loaded once up front and saved once at the end, including after a quota abort.
 */
export async function runTracker(deps: TrackerDeps, opt: RunOptions): Promise<RunReport> {
  const log = deps.log ?? console;
  const now = deps.now ?? (() => new Date());
  const state = await deps.store.load();

  const report: RunReport = {
    startedAt: now().toISOString(),
    searched: opt.search,
    outcomes: [],
    notProcessed: [],
    aborted: false,
  };

  const groups = deps.config.groups;
  try {
    for (let i = 0; i < groups.length; i++) {
      const outcome = await processGroup(deps, state, groups[i], opt.search, log);
      report.outcomes.push(outcome);
      if (outcome.kind === "aborted") {
        report.aborted = true;
        report.notProcessed = groups.slice(i + 1).map((g) => g.id);
        break;
      }
    }
  } finally {
    await deps.store.save(state);
  }
  return report;
}

export function describeOutcome(o: GroupOutcome): string {
  switch (o.kind) {
    case "resolved":
      return `metrics posted (${o.video.videoId}, views=${o.video.viewCount}, delta=${o.video.delta})`;
    case "usedCache":
      return `metrics posted from cache [${o.cause}] (${o.video.videoId}, views=${o.video.viewCount}, delta=${o.video.delta})`;
    case "skipped":
      return `skipped [${o.reason}]${o.message ? `: ${o.message}` : ""}`;
    case "aborted":
      return `aborted: ${o.message}`;
  }
}

export function summarizeReport(report: RunReport): string[] {
  const lines = report.outcomes.map((o) => `[${o.groupId}] ${describeOutcome(o)}`);
  for (const id of report.notProcessed) lines.push(`[${id}] not processed (run aborted)`);
  const posted = report.outcomes.filter((o) => o.kind === "resolved" || o.kind === "usedCache").length;
  lines.push(
    `${posted}/${report.outcomes.length + report.notProcessed.length} groups reported` +
      (report.aborted ? " (aborted on YouTube quota)" : "")
  );
  return lines;
}

export const REPORT_JSON = "run_report.json";
export const REPORT_CSV = "run_report.csv";

export function writeOutputs(report: RunReport, dir: string) {
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  const jsonPath = path.join(dir, REPORT_JSON);
  const csvPath = path.join(dir, REPORT_CSV);

  fs.writeFileSync(jsonPath, JSON.stringify(report, null, 2), "utf8");

  const rows = report.outcomes.map((o) => {
    const video = o.kind === "resolved" || o.kind === "usedCache" ? o.video : null;
    const detail =
      o.kind === "usedCache"
        ? o.cause
        : o.kind === "skipped"
          ? o.message
            ? `${o.reason}: ${o.message}`
            : o.reason
          : o.kind === "aborted"
            ? o.message
            : "";
    return [o.groupId, o.kind, video?.videoId ?? "", video?.title ?? "", video?.viewCount ?? "", video?.delta ?? "", detail];
  });
  for (const id of report.notProcessed) rows.push([id, "notProcessed", "", "", "", "", ""]);

  const csv = stringify(rows, {
    header: true,
    columns: ["Group", "Outcome", "Video ID", "Title", "Views", "Delta", "Detail"],
  });
  fs.writeFileSync(csvPath, csv, "utf8");

  return { dir, jsonPath, csvPath };
}
