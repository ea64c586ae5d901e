import { NARRATIVE_STAGES, type ScenarioResult, type Scene } from "../types";
import { totalDuration } from "../scene";

const DURATION_TOLERANCE_SEC = 10;
const SCENE_MIN_SEC = 2.0;
const SCENE_MAX_SEC = 6.0;

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Normalizes a generated scenario:
 * - scene ids renumbered 1..N in order
 * - if the total duration falls outside target ±10s, every scene is rescaled
 *   proportionally and clamped to [2, 6] seconds
 * - a stage tag that steps back in hook→problem→core→twist→cta order is logged
 */
export function validateAndFix(result: ScenarioResult, targetDurationSec: number): ScenarioResult {
  if (result.scenes.length === 0) {
    console.warn("[validator] Scenario has no scenes, returning unchanged");
    return result;
  }

  const renumbered = result.scenes.map((scene, index) => ({ ...scene, sceneId: index + 1 }));
  const scenes = fixDurations(renumbered, targetDurationSec);
  warnOnStageOrder(scenes);

  console.log(`[validator] ${scenes.length} scenes, ${totalDuration(scenes).toFixed(1)}s total`);
  return { title: result.title, scenes };
}

function fixDurations(scenes: Scene[], target: number): Scene[] {
  const total = totalDuration(scenes);
  if (total >= target - DURATION_TOLERANCE_SEC && total <= target + DURATION_TOLERANCE_SEC) {
    return scenes;
  }

  const ratio = total > 0 ? target / total : 1;
  console.log(`[validator] Rescaling durations ${total.toFixed(1)}s -> ${target}s (ratio=${ratio.toFixed(4)})`);
  return scenes.map((scene) => ({
    ...scene,
    durationSec: round1(Math.max(SCENE_MIN_SEC, Math.min(SCENE_MAX_SEC, scene.durationSec * ratio))),
  }));
}

function warnOnStageOrder(scenes: Scene[]): void {
  let lastIndex = -1;
  for (const scene of scenes) {
    const index = NARRATIVE_STAGES.indexOf(scene.stage);
    if (index < lastIndex) {
      console.warn(
        `[validator] Stage order goes back at scene ${scene.sceneId}: "${scene.stage}" after "${NARRATIVE_STAGES[lastIndex]}"`,
      );
      return;
    }
    lastIndex = index;
  }
}
