import { describe, expect, it } from "vitest";

import { createInitialState } from "../checkpoint";
import { createScene } from "../scene";
import type { PipelineState } from "../types";
import { buildMetadata, tagsFromTitle } from "./upload-video";

const URL = "https://example.com/news/battery";
const YOUTUBE = { privacy: "private", categoryId: "22" } as const;

function stateWith(fields: Partial<PipelineState>): PipelineState {
  return { ...createInitialState(URL, ""), ...fields };
}

describe("tagsFromTitle", () => {
  it("splits on punctuation and keeps words of two or more characters", () => {
    expect(tagsFromTitle("전기차 배터리, 3배 싸진다! EV 2025 a")).toEqual(["전기차", "배터리", "3배", "싸진다", "EV", "2025"]);
  });

  it("drops repeated words", () => {
    expect(tagsFromTitle("AI AI 뉴스")).toEqual(["AI", "뉴스"]);
  });
});

describe("buildMetadata", () => {
  const state = stateWith({
    titleKo: "배터리 혁명",
    titleEn: "Battery Revolution",
    scenarioKo: ["하나", "둘", " ", "넷"].map((narration, i) => createScene({ sceneId: i + 1, narration })),
  });

  it("marks shorts in the title, description and tags", () => {
    expect(buildMetadata(state, "ko", true, YOUTUBE)).toEqual({
      title: "배터리 혁명 #Shorts",
      description: `배터리 혁명\n\n하나\n둘\n\n원문: ${URL}\n\n#Shorts`,
      tags: ["Shorts", "배터리", "혁명"],
      categoryId: "22",
      privacyStatus: "private",
    });
  });

  it("leaves out narration lines when the language has no scenario", () => {
    const metadata = buildMetadata(state, "en", false, YOUTUBE);
    expect(metadata.title).toBe("Battery Revolution");
    expect(metadata.description).toBe(`Battery Revolution\n\nSource: ${URL}`);
    expect(metadata.tags).toEqual(["Battery", "Revolution"]);
  });

  it("keeps long shorts titles within 100 characters", () => {
    const metadata = buildMetadata(stateWith({ titleEn: "x".repeat(120) }), "en", true, YOUTUBE);
    expect(metadata.title).toBe(`${"x".repeat(91)}… #Shorts`);
    expect(metadata.title).toHaveLength(100);
  });

  it("caps tags at fifteen", () => {
    const title = Array.from({ length: 20 }, (_, i) => `word${i}`).join(" ");
    const metadata = buildMetadata(stateWith({ titleEn: title }), "en", true, YOUTUBE);
    expect(metadata.tags).toHaveLength(15);
    expect(metadata.tags.slice(0, 2)).toEqual(["Shorts", "word0"]);
  });
});
