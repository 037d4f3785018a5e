import { google, youtube_v3 } from "googleapis";
import { CatalogError } from "./errors";
import type { VideoCandidate, VideoStatistics } from "./types";
import { iso8601ToSeconds } from "./utils";

export interface CatalogClient {
  searchRecentVideos(channelId: string, keyword: string): Promise<VideoCandidate[]>;
  fetchDuration(videoId: string): Promise<number | null>;
  fetchStatistics(videoId: string): Promise<VideoStatistics>;
}

// Reasons YouTube reports once the daily quota is gone; every later call fails too
export const QUOTA_REASONS = new Set([
  "quotaExceeded",
  "dailyLimitExceeded",
  "dailyLimitExceededUnreg",
  "userRateLimitExceeded",
]);

const SEARCH_PAGE_SIZE = 50;

// retry: false turns off gaxios' automatic retries; a failed call is reported once
export function makeYouTube(apiKey: string, timeoutMs = 10_000, rootUrl?: string): youtube_v3.Youtube {
  return google.youtube({ version: "v3", auth: apiKey, timeout: timeoutMs, retry: false, rootUrl });
}

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === "object" && v !== null;

// Pull status / reason / message out of a gaxios error without depending on its class
export function toCatalogError(e: unknown): CatalogError {
  if (e instanceof CatalogError) return e;
  if (!isRecord(e)) return new CatalogError("other", String(e));

  const message = typeof e.message === "string" ? e.message : "YouTube request failed";
  const response = isRecord(e.response) ? e.response : undefined;
  const rawStatus = response?.status;
  const status = typeof rawStatus === "number" ? rawStatus : undefined;

  let reason: string | undefined;
  let apiMessage: string | undefined;
  const data = response?.data;
  const body = isRecord(data) ? data : undefined;
  if (body && isRecord(body.error)) {
    const errors = Array.isArray(body.error.errors) ? body.error.errors : [];
    const first: unknown = errors[0];
    if (isRecord(first) && typeof first.reason === "string") reason = first.reason;
    if (typeof body.error.message === "string") apiMessage = body.error.message;
  }

  const text = apiMessage ?? message;
  if (reason && QUOTA_REASONS.has(reason)) {
    return new CatalogError("quotaExceeded", text, { status, reason });
  }
  if (status === 404) return new CatalogError("notFound", text, { status, reason });
  return new CatalogError("other", text, { status, reason });
}

export function toCandidates(items: youtube_v3.Schema$SearchResult[]): VideoCandidate[] {
  const out: VideoCandidate[] = [];
  for (const it of items) {
    const videoId = it.id?.videoId;
    if (!videoId) continue;
    out.push({ videoId, title: it.snippet?.title ?? "", rank: out.length });
  }
  return out;
}

export class YouTubeCatalog implements CatalogClient {
  constructor(private readonly yt: youtube_v3.Youtube) {}

  async searchRecentVideos(channelId: string, keyword: string): Promise<VideoCandidate[]> {
    try {
      const { data } = await this.yt.search.list({
        part: ["snippet"],
        channelId,
        q: keyword,
        type: ["video"],
        order: "date",
        maxResults: SEARCH_PAGE_SIZE,
      });
      return toCandidates(data.items ?? []);
    } catch (e) {
      throw toCatalogError(e);
    }
  }

  async fetchDuration(videoId: string): Promise<number | null> {
    let items: youtube_v3.Schema$Video[];
    try {
      const { data } = await this.yt.videos.list({ id: [videoId], part: ["contentDetails"] });
      items = data.items ?? [];
    } catch (e) {
      throw toCatalogError(e);
    }
    const iso = items[0]?.contentDetails?.duration;
    return iso ? iso8601ToSeconds(iso) : null;
  }

  async fetchStatistics(videoId: string): Promise<VideoStatistics> {
    let items: youtube_v3.Schema$Video[];
    try {
      const { data } = await this.yt.videos.list({ id: [videoId], part: ["statistics", "snippet"] });
      items = data.items ?? [];
    } catch (e) {
      throw toCatalogError(e);
    }
    const video = items[0];
    if (!video) throw new CatalogError("notFound", `Video ${videoId} not found`);
    const viewCount = parseInt(video.statistics?.viewCount ?? "0", 10);
    return {
      viewCount: Number.isFinite(viewCount) ? viewCount : 0,
      title: video.snippet?.title ?? undefined,
    };
  }
}
