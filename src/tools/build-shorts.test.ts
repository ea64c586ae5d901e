import { beforeEach, describe, expect, it, vi } from "vitest";

import { createScene } from "../scene";
import type { NarrativeStage } from "../types";
import { buildShortsScenario } from "./build-shorts";

function scene(sceneId: number, stage: NarrativeStage, durationSec: number) {
  return createScene({ sceneId, stage, durationSec, narration: `n${sceneId}` });
}

const SCENES = [
  scene(1, "hook", 4),
  scene(2, "hook", 2),
  scene(3, "problem", 3),
  scene(4, "core", 5),
  scene(5, "core", 1),
  scene(6, "cta", 2),
  scene(7, "twist", 3),
];

describe("buildShortsScenario", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    return () => vi.restoreAllMocks();
  });

  it("orders by stage, shortest scenes first, keeping long-form ids", () => {
    expect(buildShortsScenario(SCENES, 60).map((s) => s.sceneId)).toEqual([2, 1, 3, 5, 4, 7, 6]);
  });

  it("stops before the total would exceed the maximum", () => {
    expect(buildShortsScenario(SCENES, 10).map((s) => s.sceneId)).toEqual([2, 1, 3, 5]);
  });

  it("takes at most five hook scenes", () => {
    const hooks = [1, 2, 3, 4, 5, 6, 7].map((id) => scene(id, "hook", 1));
    expect(buildShortsScenario(hooks, 60)).toHaveLength(5);
  });

  it("returns copies", () => {
    const [first] = buildShortsScenario(SCENES, 60);
    first.narration = "changed";
    expect(SCENES[1].narration).toBe("n2");
  });

  it("returns nothing for an empty scenario", () => {
    expect(buildShortsScenario([], 60)).toEqual([]);
  });
});
