import type { DurationProbe, Scene } from "../types";

export const FALLBACK_DURATION_SEC = 2.0;

/**
 * Replaces each scene's planned duration with the measured length of its
 * narration clip (audioPaths is indexed by sceneId - 1). Clips that cannot be
 * measured fall back to FALLBACK_DURATION_SEC.
 */
export async function correctDurations(
  scenes: Scene[],
  audioPaths: string[],
  probe: DurationProbe,
): Promise<Scene[]> {
  if (audioPaths.length !== scenes.length) {
    console.warn(`[durations] ${scenes.length} scenes but ${audioPaths.length} audio clips`);
  }

  const corrected: Scene[] = [];
  for (const scene of scenes) {
    const audioPath = audioPaths[scene.sceneId - 1];
    if (audioPath === undefined) {
      corrected.push({ ...scene });
      continue;
    }

    let durationSec: number;
    try {
      durationSec = await probe(audioPath);
    } catch (error) {
      console.warn(`[durations] Scene ${scene.sceneId}: could not measure ${audioPath}:`, error instanceof Error ? error.message : error);
      durationSec = FALLBACK_DURATION_SEC;
    }
    if (!Number.isFinite(durationSec) || durationSec <= 0) {
      durationSec = FALLBACK_DURATION_SEC;
    }
    corrected.push({ ...scene, durationSec: Math.round(durationSec * 1000) / 1000 });
  }
  return corrected;
}
