import fs from "fs";
import os from "os";
import path from "path";
import { describe, expect, it } from "vitest";
import { describeOutcome, runTracker, shouldSearch, summarizeReport, type TrackerDeps, writeOutputs } from "./core";
import { CatalogError, SinkError } from "./errors";
import { candidates, FakeCatalog, MemoryStateStore, quietLog, quota, RecordingSink } from "./__fixtures__/fakes";
import type { Group, StateMap } from "./types";
import { DEFAULT_MATCH_RULES } from "./utils";

const groups: Group[] = [
  { id: "g1", name: "Alpha", channelId: "C1" },
  { id: "g2", name: "Beta", channelId: "C1" },
  { id: "g3", name: "Gamma", channelId: "C2" },
  { id: "g4", name: "Delta", channelId: "C2" },
  { id: "g5", name: "Omega", channelId: "C3" },
];

const NOW = new Date("2026-03-01T05:00:00Z"); // 14:00 at UTC+9
const T = Math.floor(NOW.getTime() / 1000);

function deps(catalog: FakeCatalog, store: MemoryStateStore, sink = new RecordingSink(), gs = groups): TrackerDeps {
  return {
    config: { namespace: "kpop.youtube", groups: gs, rules: DEFAULT_MATCH_RULES },
    catalog,
    sink,
    store,
    now: () => NOW,
    log: quietLog(),
  };
}

describe("shouldSearch", () => {
  it("gates on the local hour", () => {
    expect(shouldSearch(NOW, [14, 19], 9)).toBe(true);
    expect(shouldSearch(new Date("2026-03-01T10:59:59Z"), [14, 19], 9)).toBe(true);
    expect(shouldSearch(new Date("2026-03-01T11:00:00Z"), [14, 19], 9)).toBe(false);
    expect(shouldSearch(new Date("2026-03-01T15:30:00Z"), [0], 9)).toBe(true);
  });
});

describe("runTracker", () => {
  it("resolves, posts both metrics and stores the new state", async () => {
    const catalog = new FakeCatalog({
      search: { "C1/Alpha": candidates(["v1", "Alpha 'One' Official MV"]) },
      durations: { v1: 200 },
      stats: { v1: { viewCount: 150, title: "Alpha 'One' Official MV" } },
    });
    const store = new MemoryStateStore({ g1: { video_id: "v1", last_view: 100 } });
    const sink = new RecordingSink();

    const report = await runTracker(deps(catalog, store, sink, groups.slice(0, 1)), { search: true });

    expect(sink.points).toEqual([
      { name: "kpop.youtube.viewcount.g1_v1", time: T, value: 150 },
      { name: "kpop.youtube.viewdelta.g1_v1", time: T, value: 50 },
    ]);
    expect(report.outcomes).toEqual([
      {
        kind: "resolved",
        groupId: "g1",
        video: { videoId: "v1", title: "Alpha 'One' Official MV", viewCount: 150, delta: 50 },
      },
    ]);
    expect(store.saved).toEqual({
      g1: { video_id: "v1", last_view: 150, title: "Alpha 'One' Official MV" },
    });
  });

  it("uses the cache without searching on a non-search run", async () => {
    const catalog = new FakeCatalog({ stats: { v1: { viewCount: 120, title: "From stats" } } });
    const store = new MemoryStateStore({ g1: { video_id: "v1", last_view: 100 } });
    const sink = new RecordingSink();

    const report = await runTracker(deps(catalog, store, sink, groups.slice(0, 1)), { search: false });

    expect(catalog.calls).toEqual(["stats:v1"]);
    expect(report.outcomes[0]).toMatchObject({ kind: "usedCache", cause: "searchSkipped" });
    expect(sink.points.map((p) => p.value)).toEqual([120, 20]);
    // title filled in from the statistics response
    expect(store.saved?.g1).toEqual({ video_id: "v1", last_view: 120, title: "From stats" });
  });

  it("falls back to the cache when resolution finds nothing", async () => {
    const catalog = new FakeCatalog({
      search: { "C1/Alpha": candidates(["x", "Alpha 'One' Dance Practice"]) },
      stats: { old: { viewCount: 10 } },
    });
    const store = new MemoryStateStore({ g1: { video_id: "old", last_view: 4, title: "Cached" } });

    const report = await runTracker(deps(catalog, store, undefined, groups.slice(0, 1)), { search: true });

    expect(report.outcomes[0]).toEqual({
      kind: "usedCache",
      groupId: "g1",
      cause: "notFound",
      video: { videoId: "old", title: "Cached", viewCount: 10, delta: 6 },
    });
  });

  it("falls back to the cache when the search call fails", async () => {
    const catalog = new FakeCatalog({
      search: { "C1/Alpha": new CatalogError("other", "timeout") },
      stats: { old: { viewCount: 10 } },
    });
    const store = new MemoryStateStore({ g1: { video_id: "old", last_view: 10 } });

    const report = await runTracker(deps(catalog, store, undefined, groups.slice(0, 1)), { search: true });

    expect(report.outcomes[0]).toMatchObject({ kind: "usedCache", cause: "searchFailed" });
  });

  it("skips a group with neither a resolution nor a cache", async () => {
    const catalog = new FakeCatalog();
    const store = new MemoryStateStore();
    const sink = new RecordingSink();

    const report = await runTracker(deps(catalog, store, sink, groups.slice(0, 1)), { search: true });

    expect(report.outcomes).toEqual([{ kind: "skipped", groupId: "g1", reason: "noData" }]);
    expect(sink.points).toEqual([]);
    expect(store.saved).toEqual({});
  });

  it("reports a changeover with a zero delta under the new video's metric names", async () => {
    const catalog = new FakeCatalog({
      search: { "C1/Alpha": candidates(["B", "Alpha 'Two' MV"]) },
      durations: { B: 180 },
      stats: { B: { viewCount: 10 } },
    });
    const store = new MemoryStateStore({ g1: { video_id: "A", last_view: 100 } });
    const sink = new RecordingSink();

    await runTracker(deps(catalog, store, sink, groups.slice(0, 1)), { search: true });

    expect(sink.points).toEqual([
      { name: "kpop.youtube.viewcount.g1_B", time: T, value: 10 },
      { name: "kpop.youtube.viewdelta.g1_B", time: T, value: 0 },
    ]);
    expect(store.saved?.g1).toEqual({ video_id: "B", last_view: 10, title: "Alpha 'Two' MV" });
  });

  it("skips only the group whose statistics fetch fails and keeps its old state", async () => {
    const initial: StateMap = {
      g1: { video_id: "a", last_view: 1 },
      g2: { video_id: "b", last_view: 2 },
    };
    const catalog = new FakeCatalog({
      stats: { a: new CatalogError("other", "HTTP 500", { status: 500 }), b: { viewCount: 5 } },
    });
    const store = new MemoryStateStore(initial);

    const report = await runTracker(deps(catalog, store, undefined, groups.slice(0, 2)), { search: false });

    expect(report.outcomes.map((o) => o.kind)).toEqual(["skipped", "usedCache"]);
    expect(report.outcomes[0]).toMatchObject({ reason: "statsFailed", message: "HTTP 500" });
    expect(store.saved).toEqual({
      g1: { video_id: "a", last_view: 1 },
      g2: { video_id: "b", last_view: 5 },
    });
  });

  it("halts on quota exhaustion at group 3 of 5 and still saves groups 1-2", async () => {
    const initial: StateMap = {
      g1: { video_id: "a", last_view: 10 },
      g2: { video_id: "b", last_view: 20 },
      g3: { video_id: "c", last_view: 30 },
      g4: { video_id: "d", last_view: 40 },
      g5: { video_id: "e", last_view: 50 },
    };
    const catalog = new FakeCatalog({
      stats: {
        a: { viewCount: 11 },
        b: { viewCount: 25 },
        c: quota(),
        d: { viewCount: 99 },
        e: { viewCount: 99 },
      },
    });
    const store = new MemoryStateStore(initial);
    const sink = new RecordingSink();

    const report = await runTracker(deps(catalog, store, sink), { search: false });

    expect(report.aborted).toBe(true);
    expect(report.outcomes.map((o) => o.kind)).toEqual(["usedCache", "usedCache", "aborted"]);
    expect(report.notProcessed).toEqual(["g4", "g5"]);
    expect(catalog.calls).toEqual(["stats:a", "stats:b", "stats:c"]);
    expect(sink.points).toHaveLength(4);
    expect(store.saveCount).toBe(1);
    expect(store.saved).toEqual({
      ...initial,
      g1: { video_id: "a", last_view: 11 },
      g2: { video_id: "b", last_view: 25 },
    });
  });

  it("aborts when the search itself hits the quota", async () => {
    const catalog = new FakeCatalog({ search: { "C1/Alpha": quota() } });
    const store = new MemoryStateStore({ g1: { video_id: "a", last_view: 1 } });

    const report = await runTracker(deps(catalog, store, undefined, groups.slice(0, 2)), { search: true });

    expect(report.outcomes).toEqual([{ kind: "aborted", groupId: "g1", message: "quota gone" }]);
    expect(report.notProcessed).toEqual(["g2"]);
    expect(store.saved).toEqual({ g1: { video_id: "a", last_view: 1 } });
  });

  it("surfaces a sink failure and does not commit the delta", async () => {
    const catalog = new FakeCatalog({ stats: { a: { viewCount: 30 } } });
    const store = new MemoryStateStore({ g1: { video_id: "a", last_view: 10 } });
    const sink = new RecordingSink((p) => (p.name.includes("viewdelta") ? new SinkError("status=500", 500) : undefined));

    const report = await runTracker(deps(catalog, store, sink, groups.slice(0, 1)), { search: false });

    expect(report.outcomes[0]).toEqual({
      kind: "skipped",
      groupId: "g1",
      reason: "sinkFailed",
      message: "status=500 (viewcount already posted)",
    });
    expect(sink.points.map((p) => p.name)).toEqual(["kpop.youtube.viewcount.g1_a"]);
    expect(store.saved).toEqual({ g1: { video_id: "a", last_view: 10 } });
  });

  it("keeps the sink message as-is when the first point fails", async () => {
    const catalog = new FakeCatalog({ stats: { a: { viewCount: 30 } } });
    const store = new MemoryStateStore({ g1: { video_id: "a", last_view: 10 } });
    const sink = new RecordingSink(() => new SinkError("status=503", 503));

    const report = await runTracker(deps(catalog, store, sink, groups.slice(0, 1)), { search: false });

    expect(report.outcomes[0]).toMatchObject({ reason: "sinkFailed", message: "status=503" });
    expect(sink.points).toEqual([]);
  });

  it("saves state even when an unexpected error escapes", async () => {
    const catalog = new FakeCatalog({ stats: { a: { viewCount: 30 }, b: { viewCount: 1 } } });
    const store = new MemoryStateStore({
      g1: { video_id: "a", last_view: 10 },
      g2: { video_id: "b", last_view: 0 },
    });
    const sink = new RecordingSink((p) => (p.name.includes("g2") ? new TypeError("bug") : undefined));

    await expect(
      runTracker(deps(catalog, store, sink, groups.slice(0, 2)), { search: false })
    ).rejects.toThrow("bug");
    expect(store.saved?.g1).toEqual({ video_id: "a", last_view: 30 });
  });
});

describe("report rendering", () => {
  it("summarizes each group and the totals", () => {
    const lines = summarizeReport({
      startedAt: NOW.toISOString(),
      searched: true,
      aborted: true,
      outcomes: [
        { kind: "resolved", groupId: "g1", video: { videoId: "v", title: "t", viewCount: 5, delta: 2 } },
        { kind: "skipped", groupId: "g2", reason: "noData" },
        { kind: "aborted", groupId: "g3", message: "quota gone" },
      ],
      notProcessed: ["g4"],
    });
    expect(lines).toEqual([
      "[g1] metrics posted (v, views=5, delta=2)",
      "[g2] skipped [noData]",
      "[g3] aborted: quota gone",
      "[g4] not processed (run aborted)",
      "1/4 groups reported (aborted on YouTube quota)",
    ]);
  });

  it("describes cache use with its cause", () => {
    expect(
      describeOutcome({
        kind: "usedCache",
        groupId: "g1",
        cause: "notFound",
        video: { videoId: "v", title: "t", viewCount: 1, delta: 0 },
      })
    ).toBe("metrics posted from cache [notFound] (v, views=1, delta=0)");
  });

  it("writes the JSON and CSV reports", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "mv-report-"));
    try {
      const { jsonPath, csvPath } = writeOutputs(
        {
          startedAt: NOW.toISOString(),
          searched: false,
          aborted: false,
          outcomes: [
            { kind: "usedCache", groupId: "g1", cause: "searchSkipped", video: { videoId: "v", title: "A, B", viewCount: 5, delta: 2 } },
            { kind: "skipped", groupId: "g2", reason: "statsFailed", message: "x" },
          ],
          notProcessed: [],
        },
        dir
      );
      expect(JSON.parse(fs.readFileSync(jsonPath, "utf8")).outcomes).toHaveLength(2);
      expect(fs.readFileSync(csvPath, "utf8")).toBe(
        [
          "Group,Outcome,Video ID,Title,Views,Delta,Detail",
          'g1,usedCache,v,"A, B",5,2,searchSkipped',
          "g2,skipped,,,,,statsFailed: x",
          "",
        ].join("\n")
      );
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
