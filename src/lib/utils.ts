import type { MatchRules } from "./types";

// Convert an ISO 8601 duration (PT3M20S, P1DT2H) to whole seconds; null if it doesn't parse
export const iso8601ToSeconds = (iso: string): number | null => {
  const m = iso
    .trim()
    .match(/^P(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+(?:\.\d+)?)S)?)?$/i);
  if (!m || m.slice(1).every((g) => g === undefined)) return null;
  const d = parseInt(m[1] ?? "0", 10);
  const h = parseInt(m[2] ?? "0", 10);
  const min = parseInt(m[3] ?? "0", 10);
  const s = parseFloat(m[4] ?? "0");
  return ((d * 24 + h) * 60 + min) * 60 + s;
};

// Keywords that mark derivative uploads rather than the MV itself
export const baseExcludeKeywords = [
  "remix",
  "performance",
  "perf.",
  "dance",
  "choreo",
  "practice",
  "teaser",
  "highlight",
  "lyric",
  "reaction",
  "track video",
];

export const baseMvSuffixes = ["mv", "mv)", "mv]", "official mv"];

export const DEFAULT_MATCH_RULES: MatchRules = {
  excludeKeywords: baseExcludeKeywords,
  mvSuffixes: baseMvSuffixes,
  minDurationSeconds: 60,
};

// Lower-case and drop every space, so "LE SSERAFIM" matches "LESSERAFIM"
export const compact = (s: string) => s.toLowerCase().replace(/ /g, "");

export const containsGroupName = (title: string, groupName: string) =>
  compact(title).includes(compact(groupName));

export const hasExcludedKeyword = (title: string, keywords: string[]) => {
  const t = title.toLowerCase();
  return keywords.some((w) => w && t.includes(w.toLowerCase()));
};

export const hasMvSuffix = (title: string, suffixes: string[]) => {
  const t = title.toLowerCase().trim();
  return suffixes.some((s) => s && t.endsWith(s.toLowerCase()));
};

export const mentionsMv = (title: string) => title.toLowerCase().includes("mv");

// Checked in order; a candidate must pass all of them
export const officialMvChecks = (
  groupName: string,
  rules: MatchRules
): Array<(title: string) => boolean> => [
  (t) => containsGroupName(t, groupName),
  (t) => !hasExcludedKeyword(t, rules.excludeKeywords),
  (t) => hasMvSuffix(t, rules.mvSuffixes),
];

// Looser rule used when the first pick turns out to be a Short
export const looseMvCheck = (title: string, groupName: string) =>
  containsGroupName(title, groupName) && mentionsMv(title);

export const isShorts = (seconds: number, minDurationSeconds: number) =>
  seconds < minDurationSeconds;

export const watchUrl = (videoId: string) =>
  `https://www.youtube.com/watch?v=${videoId}`;
