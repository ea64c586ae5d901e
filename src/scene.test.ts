import { describe, expect, it } from "vitest";

import { createScene, dominantStage, isNarrativeStage, totalDuration } from "./scene";
import type { NarrativeStage } from "./types";

const withStages = (stages: NarrativeStage[]) => stages.map((stage, i) => createScene({ sceneId: i + 1, stage }));

describe("createScene", () => {
  it("fills defaults", () => {
    expect(createScene({ sceneId: 4 })).toEqual({
      sceneId: 4,
      stage: "core",
      narration: "",
      durationSec: 3,
      imagePrompt: "",
      textOverlay: "",
    });
  });

  it("replaces a non-positive duration with the default", () => {
    expect(createScene({ sceneId: 1, durationSec: 0 }).durationSec).toBe(3);
    expect(createScene({ sceneId: 1, durationSec: 2.5 }).durationSec).toBe(2.5);
  });
});

describe("isNarrativeStage", () => {
  it("accepts the five stage tags only", () => {
    expect(isNarrativeStage("twist")).toBe(true);
    expect(isNarrativeStage("outro")).toBe(false);
    expect(isNarrativeStage(3)).toBe(false);
  });
});

describe("totalDuration", () => {
  it("sums scene durations", () => {
    const scenes = [createScene({ sceneId: 1, durationSec: 2 }), createScene({ sceneId: 2, durationSec: 3.5 })];
    expect(totalDuration(scenes)).toBe(5.5);
  });
});

describe("dominantStage", () => {
  it("falls back to core for an empty scenario", () => {
    expect(dominantStage([])).toBe("core");
  });

  it("picks the most frequent stage", () => {
    expect(dominantStage(withStages(["hook", "twist", "twist", "cta"]))).toBe("twist");
  });

  it("breaks ties in favour of the stage seen first", () => {
    expect(dominantStage(withStages(["problem", "hook", "hook", "problem"]))).toBe("problem");
  });
});
