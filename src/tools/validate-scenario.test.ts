import { beforeEach, describe, expect, it, vi } from "vitest";

import { createScene } from "../scene";
import { validateAndFix } from "./validate-scenario";

function scenario(durations: number[], ids = durations.map((_, i) => i + 1)) {
  return {
    title: "제목",
    scenes: durations.map((durationSec, i) => createScene({ sceneId: ids[i], durationSec })),
  };
}

describe("validateAndFix", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    return () => vi.restoreAllMocks();
  });

  it("renumbers scenes and keeps durations within tolerance", () => {
    const result = validateAndFix(scenario([3, 3], [5, 9]), 10);
    expect(result.title).toBe("제목");
    expect(result.scenes.map((s) => [s.sceneId, s.durationSec])).toEqual([
      [1, 3],
      [2, 3],
    ]);
  });

  it("rescales durations toward the target and clamps the maximum", () => {
    const result = validateAndFix(scenario([1, 2, 3, 4]), 30);
    expect(result.scenes.map((s) => s.durationSec)).toEqual([3, 6, 6, 6]);
  });

  it("clamps rescaled durations to the two second minimum", () => {
    const result = validateAndFix(scenario([5, 20]), 5);
    expect(result.scenes.map((s) => s.durationSec)).toEqual([2, 4]);
  });

  it("warns when stages go backwards", () => {
    const result = validateAndFix(
      {
        title: "t",
        scenes: [createScene({ sceneId: 1, stage: "core" }), createScene({ sceneId: 2, stage: "hook" })],
      },
      6,
    );
    expect(result.scenes.map((s) => s.stage)).toEqual(["core", "hook"]);
    expect(console.warn).toHaveBeenCalledWith('[validator] Stage order goes back at scene 2: "hook" after "core"');
  });

  it("returns an empty scenario unchanged", () => {
    const input = { title: "t", scenes: [] };
    expect(validateAndFix(input, 300)).toBe(input);
  });
});
