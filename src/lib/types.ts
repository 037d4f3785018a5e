export type Group = {
  id: string;
  name: string; // search keyword, also matched against titles
  channelId: string;
};

export type VideoCandidate = {
  videoId: string;
  title: string;
  rank: number; // 0 = newest
};

export type ResolvedVideo = {
  videoId: string;
  title: string;
};

export type VideoStatistics = {
  viewCount: number;
  title?: string;
};

// Persisted shape, keys kept as they are written to state.json
export type GroupState = {
  video_id: string;
  last_view: number;
  title?: string;
};

export type StateMap = Record<string, GroupState>;

export type MatchRules = {
  excludeKeywords: string[]; // lowercase
  mvSuffixes: string[]; // lowercase
  minDurationSeconds: number;
};

export type MetricPoint = {
  name: string;
  time: number; // unix seconds
  value: number;
};

export type MetricKind = "viewcount" | "viewdelta";

export type Logger = Pick<Console, "log" | "warn" | "error">;

export type ReportedVideo = ResolvedVideo & {
  viewCount: number;
  delta: number;
};

export type CacheCause = "searchSkipped" | "notFound" | "searchFailed";
export type SkipReason = "noData" | "statsFailed" | "sinkFailed";

export type GroupOutcome =
  | { kind: "resolved"; groupId: string; video: ReportedVideo }
  | { kind: "usedCache"; groupId: string; cause: CacheCause; video: ReportedVideo }
  | { kind: "skipped"; groupId: string; reason: SkipReason; message?: string }
  | { kind: "aborted"; groupId: string; message: string };

export type RunReport = {
  startedAt: string; // ISO
  searched: boolean;
  outcomes: GroupOutcome[];
  notProcessed: string[];
  aborted: boolean;
};
