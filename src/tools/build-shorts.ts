import { NARRATIVE_STAGES, type NarrativeStage, type Scene } from "../types";
import { totalDuration } from "../scene";

// Maximum scenes taken from each stage for the shorts cut.
const SHORTS_STAGE_BUDGET: Record<NarrativeStage, number> = {
  hook: 5,
  problem: 3,
  core: 6,
  twist: 3,
  cta: 2,
};

/**
 * Cuts a shorts scenario out of the long-form one: per stage, the shortest
 * scenes up to the stage budget, in stage order, stopping before the running
 * total exceeds maxDurationSec.
 *
 * Scenes keep their long-form sceneId; composition looks up the long-form
 * image and narration audio by that id.
 */
export function buildShortsScenario(scenes: Scene[], maxDurationSec: number): Scene[] {
  if (scenes.length === 0) {
    console.warn("[shorts] No scenes to build shorts from");
    return [];
  }

  const byStage = new Map<NarrativeStage, Scene[]>();
  for (const scene of scenes) {
    const group = byStage.get(scene.stage) ?? [];
    group.push(scene);
    byStage.set(scene.stage, group);
  }

  const selected: Scene[] = [];
  for (const stage of NARRATIVE_STAGES) {
    const candidates = [...(byStage.get(stage) ?? [])].sort((a, b) => a.durationSec - b.durationSec);
    selected.push(...candidates.slice(0, SHORTS_STAGE_BUDGET[stage]));
  }

  const capped: Scene[] = [];
  let total = 0;
  for (const scene of selected) {
    if (total + scene.durationSec > maxDurationSec) {
      break;
    }
    capped.push({ ...scene });
    total += scene.durationSec;
  }

  console.log(`[shorts] ${capped.length} scenes, ${totalDuration(capped).toFixed(1)}s`);
  return capped;
}
