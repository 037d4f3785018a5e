import { vi } from "vitest";
import { CatalogError } from "../errors";
import type { MetricSink } from "../mackerel";
import type { StateStore } from "../state";
import type { Logger, MetricPoint, StateMap, VideoCandidate, VideoStatistics } from "../types";
import type { CatalogClient } from "../youtube";

export const quietLog = (): Logger => ({ log: vi.fn(), warn: vi.fn(), error: vi.fn() });

export const candidates = (...titles: Array<[string, string]>): VideoCandidate[] =>
  titles.map(([videoId, title], rank) => ({ videoId, title, rank }));

type FakeCatalogSetup = {
  search?: Record<string, VideoCandidate[] | CatalogError>; // keyed by channelId/keyword
  durations?: Record<string, number | null | CatalogError>;
  stats?: Record<string, VideoStatistics | CatalogError>;
};

export class FakeCatalog implements CatalogClient {
  readonly calls: string[] = [];

  constructor(private readonly setup: FakeCatalogSetup = {}) {}

  async searchRecentVideos(channelId: string, keyword: string): Promise<VideoCandidate[]> {
    this.calls.push(`search:${channelId}/${keyword}`);
    const hit = this.setup.search?.[`${channelId}/${keyword}`] ?? [];
    if (hit instanceof CatalogError) throw hit;
    return hit;
  }

  async fetchDuration(videoId: string): Promise<number | null> {
    this.calls.push(`duration:${videoId}`);
    const d = this.setup.durations?.[videoId];
    if (d instanceof CatalogError) throw d;
    return d ?? null;
  }

  async fetchStatistics(videoId: string): Promise<VideoStatistics> {
    this.calls.push(`stats:${videoId}`);
    const s = this.setup.stats?.[videoId];
    if (s instanceof CatalogError) throw s;
    if (!s) throw new CatalogError("notFound", `Video ${videoId} not found`);
    return s;
  }
}

export class RecordingSink implements MetricSink {
  readonly points: MetricPoint[] = [];

  constructor(private readonly fail?: (point: MetricPoint) => Error | undefined) {}

  async post(point: MetricPoint): Promise<void> {
    const err = this.fail?.(point);
    if (err) throw err;
    this.points.push(point);
  }
}

export class MemoryStateStore implements StateStore {
  saved: StateMap | null = null;
  saveCount = 0;

  constructor(private initial: StateMap = {}) {}

  async load(): Promise<StateMap> {
    return structuredClone(this.initial);
  }

  async save(state: StateMap): Promise<void> {
    this.saveCount++;
    this.saved = structuredClone(state);
  }
}

export const quota = () =>
  new CatalogError("quotaExceeded", "quota gone", { status: 403, reason: "quotaExceeded" });
