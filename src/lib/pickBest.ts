import { isQuotaExceeded, errorMessage } from "./errors";
import type { Group, Logger, MatchRules, ResolvedVideo, VideoCandidate } from "./types";
import { DEFAULT_MATCH_RULES, isShorts, looseMvCheck, officialMvChecks } from "./utils";
import type { CatalogClient } from "./youtube";

// First candidate (newest first) that passes every official-MV check
export function filterMvCandidates(
  candidates: VideoCandidate[],
  groupName: string,
  rules: MatchRules = DEFAULT_MATCH_RULES
): VideoCandidate | null {
  const checks = officialMvChecks(groupName, rules);
  return candidates.find((c) => checks.every((check) => check(c.title))) ?? null;
}

/**
 * Resolve the group's latest official MV on its channel.
 *
 * The first strict match is rejected when it is a Short; the rescan then uses
 * the looser "group name + mv" rule over every result except the newest one.
 * Returns null when nothing qualifies.
 */
export async function pickLatestMv(
  catalog: CatalogClient,
  group: Group,
  rules: MatchRules = DEFAULT_MATCH_RULES,
  log: Logger = console
): Promise<ResolvedVideo | null> {
  const candidates = await catalog.searchRecentVideos(group.channelId, group.name);
  if (candidates.length === 0) return null;

  const pick = filterMvCandidates(candidates, group.name, rules);
  if (!pick) return null;

  const durations = new Map<string, number | null>();
  const durationOf = async (videoId: string) => {
    if (!durations.has(videoId)) durations.set(videoId, await catalog.fetchDuration(videoId));
    return durations.get(videoId) ?? null;
  };

  let pickDuration: number | null;
  try {
    pickDuration = await durationOf(pick.videoId);
  } catch (e) {
    log.warn(`[${group.id}] duration lookup failed for ${pick.videoId}, keeping it: ${errorMessage(e)}`);
    return { videoId: pick.videoId, title: pick.title };
  }

  if (pickDuration === null || !isShorts(pickDuration, rules.minDurationSeconds)) {
    return { videoId: pick.videoId, title: pick.title };
  }

  log.log(`[${group.id}] "${pick.title}" is a Short (${pickDuration}s), looking further`);
  for (const alt of candidates.slice(1)) {
    if (!looseMvCheck(alt.title, group.name)) continue;
    let d: number | null;
    try {
      d = await durationOf(alt.videoId);
    } catch (e) {
      if (isQuotaExceeded(e)) throw e;
      log.warn(`[${group.id}] duration lookup failed for ${alt.videoId}: ${errorMessage(e)}`);
      continue;
    }
    if (d !== null && !isShorts(d, rules.minDurationSeconds)) {
      return { videoId: alt.videoId, title: alt.title };
    }
  }
  return null;
}
