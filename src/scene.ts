import { NARRATIVE_STAGES, type NarrativeStage, type Scene } from "./types";

const DEFAULT_DURATION_SEC = 3.0;

export function isNarrativeStage(value: unknown): value is NarrativeStage {
  return typeof value === "string" && (NARRATIVE_STAGES as readonly string[]).includes(value);
}

/**
 * Builds a scene with every field filled in. Unknown stage tags fall back to "core".
 */
export function createScene(fields: { sceneId: number } & Partial<Omit<Scene, "sceneId">>): Scene {
  const duration = fields.durationSec;
  return {
    sceneId: fields.sceneId,
    stage: isNarrativeStage(fields.stage) ? fields.stage : "core",
    narration: fields.narration ?? "",
    durationSec: typeof duration === "number" && Number.isFinite(duration) && duration > 0 ? duration : DEFAULT_DURATION_SEC,
    imagePrompt: fields.imagePrompt ?? "",
    textOverlay: fields.textOverlay ?? "",
  };
}

export function totalDuration(scenes: Scene[]): number {
  return scenes.reduce((sum, s) => sum + s.durationSec, 0);
}

/**
 * Most frequent stage tag across the scenes. Ties go to the tag seen first;
 * an empty scenario yields "core".
 */
export function dominantStage(scenes: Scene[]): NarrativeStage {
  const counts = new Map<NarrativeStage, number>();
  for (const scene of scenes) {
    counts.set(scene.stage, (counts.get(scene.stage) ?? 0) + 1);
  }

  let best: NarrativeStage = "core";
  let bestCount = 0;
  for (const [stage, count] of counts) {
    if (count > bestCount) {
      best = stage;
      bestCount = count;
    }
  }
  return best;
}
