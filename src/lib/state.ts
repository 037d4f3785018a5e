import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import type { GroupState, StateMap } from "./types";

const GroupStateSchema = z.object({
  video_id: z.string().min(1),
  last_view: z.number().int().nonnegative(),
  title: z.string().optional(),
});

const StateMapSchema = z.record(GroupStateSchema);

export interface StateStore {
  load(): Promise<StateMap>;
  save(state: StateMap): Promise<void>;
}

const isMissingFile = (e: unknown) =>
  e instanceof Error && "code" in e && e.code === "ENOENT";

/** state.json on disk; written through a temp file + rename so readers never see half a file */
export class JsonFileStateStore implements StateStore {
  constructor(readonly filePath: string) {}

  async load(): Promise<StateMap> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, "utf8");
    } catch (e) {
      if (isMissingFile(e)) return {};
      throw e;
    }
    const parsed = StateMapSchema.safeParse(JSON.parse(text));
    if (!parsed.success) {
      throw new Error(`Invalid state file ${this.filePath}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  async save(state: StateMap): Promise<void> {
    const dir = path.dirname(this.filePath);
    await fs.mkdir(dir, { recursive: true });
    const tmp = path.join(dir, `.${path.basename(this.filePath)}.${process.pid}.tmp`);
    await fs.writeFile(tmp, JSON.stringify(state, null, 2) + "\n", "utf8");
    await fs.rename(tmp, this.filePath);
  }
}

// Growth since the last run that saw this exact video; 0 on first sight or changeover
export function computeViewDelta(
  prev: GroupState | undefined,
  videoId: string,
  currentView: number
): number {
  if (!prev || prev.video_id !== videoId) return 0;
  return Math.max(0, currentView - prev.last_view);
}

export function nextGroupState(
  prev: GroupState | undefined,
  videoId: string,
  currentView: number,
  title?: string
): GroupState {
  const next: GroupState = { video_id: videoId, last_view: currentView };
  const keptTitle = title || prev?.title;
  if (keptTitle) next.title = keptTitle;
  return next;
}

/**
 * Delta and state update in one step. The run loop calls `computeViewDelta` and
 * `nextGroupState` separately so the entry is written only after both metric points post.
 */
export function computeDeltaAndUpdate(
  state: StateMap,
  groupId: string,
  videoId: string,
  currentView: number,
  title?: string
): number {
  const prev = state[groupId];
  const delta = computeViewDelta(prev, videoId, currentView);
  state[groupId] = nextGroupState(prev, videoId, currentView, title);
  return delta;
}
