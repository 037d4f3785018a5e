import fs from "fs";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors";
import type { Group, MatchRules } from "./types";
import { DEFAULT_MATCH_RULES } from "./utils";

const GroupSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  channelId: z.string().min(1),
});

const TrackerFileSchema = z.object({
  namespace: z.string().min(1).default("kpop.youtube"),
  service: z.string().min(1).default("kpop-trends"),
  mackerelBaseUrl: z.string().url().default("https://api.mackerelio.com/api/v0"),
  searchHours: z.array(z.number().int().min(0).max(23)).default([14, 19]),
  utcOffsetHours: z.number().min(-12).max(14).default(9),
  requestTimeoutMs: z.number().int().positive().default(10_000),
  groups: z
    .array(GroupSchema)
    .min(1, "at least one group is required")
    .refine((gs) => new Set(gs.map((g) => g.id)).size === gs.length, "group ids must be unique"),
  rules: z
    .object({
      excludeKeywords: z.array(z.string().min(1)),
      mvSuffixes: z.array(z.string().min(1)).min(1),
      minDurationSeconds: z.number().nonnegative(),
    })
    .partial()
    .optional(),
});

export type TrackerConfig = Readonly<{
  youtubeApiKey: string;
  mackerelApiKey: string;
  namespace: string;
  service: string;
  mackerelBaseUrl: string;
  searchHours: readonly number[];
  utcOffsetHours: number;
  requestTimeoutMs: number;
  groups: readonly Readonly<Group>[];
  rules: Readonly<MatchRules>;
  stateFile: string;
  outputDir: string;
}>;

type Env = Record<string, string | undefined>;

const requireEnv = (env: Env, key: string) => {
  const v = env[key]?.trim();
  if (!v) throw new ConfigError(`Missing ${key}`);
  return v;
};

export function parseTrackerConfig(raw: unknown, env: Env): TrackerConfig {
  const youtubeApiKey = requireEnv(env, "YOUTUBE_API_KEY");
  const mackerelApiKey = requireEnv(env, "MACKEREL_API_KEY");

  const parsed = TrackerFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid tracker config: ${issues}`);
  }
  const file = parsed.data;

  return Object.freeze({
    youtubeApiKey,
    mackerelApiKey,
    namespace: file.namespace,
    service: file.service,
    mackerelBaseUrl: file.mackerelBaseUrl,
    searchHours: Object.freeze([...file.searchHours]),
    utcOffsetHours: file.utcOffsetHours,
    requestTimeoutMs: file.requestTimeoutMs,
    groups: Object.freeze(file.groups.map((g) => Object.freeze({ ...g }))),
    rules: Object.freeze({
      excludeKeywords: (file.rules?.excludeKeywords ?? DEFAULT_MATCH_RULES.excludeKeywords).map((k) =>
        k.toLowerCase()
      ),
      mvSuffixes: (file.rules?.mvSuffixes ?? DEFAULT_MATCH_RULES.mvSuffixes).map((s) => s.toLowerCase()),
      minDurationSeconds: file.rules?.minDurationSeconds ?? DEFAULT_MATCH_RULES.minDurationSeconds,
    }),
    stateFile: env.STATE_FILE || "state.json",
    outputDir: env.OUTPUT_DIR || "output",
  });
}

export function loadConfig(env: Env = process.env): TrackerConfig {
  const configPath = env.TRACKER_CONFIG || "config/tracker.json";
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, "utf8"));
  } catch (e) {
    throw new ConfigError(`Cannot read tracker config ${configPath}: ${errorMessage(e)}`);
  }
  return parseTrackerConfig(raw, env);
}
