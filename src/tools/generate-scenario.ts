import { generateObject, type LanguageModel } from "ai";
import { anthropic } from "@ai-sdk/anthropic";
import { google } from "@ai-sdk/google";
import { z } from "zod";

import type { AppConfig } from "../config";
import type { CostLedger } from "../cost-ledger";
import { createScene, isNarrativeStage, totalDuration } from "../scene";
import type { ScenarioEngine, ScenarioResult, Scene } from "../types";

const MAX_ATTEMPTS = 3;
const MAX_AVERAGE_SCENE_SEC = 5;

const rawSceneSchema = z.object({
  sceneId: z.number(),
  stage: z.string(),
  narration: z.string(),
  durationSec: z.number(),
  imagePrompt: z.string(),
  textOverlay: z.string(),
});

const scenarioSchema = z.object({
  titleKo: z.string(),
  scenes: z.array(rawSceneSchema),
});

type RawScene = z.infer<typeof rawSceneSchema>;

const SYSTEM_PROMPT = `You are a YouTube content writer. Turn the article into an engaging narrated video scenario.

Rules:
1. stage is one of: hook | problem | core | twist | cta
2. Structure: hook (5-10 scenes), problem (10-15), core (40-60), twist (10-15), cta (5-10)
3. narration: Korean only, at most 15 words, punchy
4. durationSec: 2 to 4 per scene
5. imagePrompt: English only, vivid and specific, no real person names
6. textOverlay: Korean, at most 10 characters
7. titleKo: under 30 characters, creates urgency or curiosity, include numbers when possible`;

/** Coerces model output into scenes: unknown stages become "core", ids follow position when missing. */
export function normalizeScenes(raw: RawScene[]): Scene[] {
  return raw.map((scene, index) =>
    createScene({
      sceneId: Number.isInteger(scene.sceneId) && scene.sceneId > 0 ? scene.sceneId : index + 1,
      stage: isNarrativeStage(scene.stage) ? scene.stage : "core",
      narration: scene.narration,
      durationSec: Number.isFinite(scene.durationSec) && scene.durationSec > 0 ? scene.durationSec : 3,
      imagePrompt: scene.imagePrompt,
      textOverlay: scene.textOverlay,
    }),
  );
}

/** Problems worth a regeneration; empty when the scenario is acceptable. */
export function scenarioIssues(scenes: Scene[], minScenes: number): string[] {
  const issues: string[] = [];
  if (scenes.length < minScenes) {
    issues.push(`too few scenes (${scenes.length}, need at least ${minScenes})`);
  }
  if (scenes.length > 0) {
    const average = totalDuration(scenes) / scenes.length;
    if (average > MAX_AVERAGE_SCENE_SEC) {
      issues.push(`average scene length too long (${average.toFixed(1)}s, max ${MAX_AVERAGE_SCENE_SEC}s)`);
    }
  }
  return issues;
}

function buildPrompt(pageText: string, focus: string, targetDurationSec: number, minScenes: number, issues: string[]): string {
  const parts: string[] = [];
  parts.push(`Target total duration: about ${targetDurationSec} seconds, at least ${minScenes} scenes.`);
  if (focus) {
    parts.push(`Focus topic: ${focus}`);
  }
  parts.push(`Article:\n${pageText}`);
  if (issues.length > 0) {
    parts.push(`Problems with the previous attempt (fix these): ${issues.join(" | ")}`);
  }
  return parts.join("\n\n");
}

/**
 * Scenario generation through the AI SDK's structured output. Regenerates up
 * to three times when the scenario is too short or too slow, then settles for
 * the last usable attempt.
 */
export class AiScenarioEngine implements ScenarioEngine {
  constructor(
    readonly name: string,
    private readonly model: LanguageModel,
    private readonly targetDurationSec: number,
  ) {}

  get minScenes(): number {
    return Math.floor(this.targetDurationSec / MAX_AVERAGE_SCENE_SEC);
  }

  async generate(pageText: string, focus: string, ledger: CostLedger): Promise<ScenarioResult> {
    let last: ScenarioResult | null = null;
    let issues: string[] = [];

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      console.log(`[scenario] ${this.name} attempt ${attempt}/${MAX_ATTEMPTS}`);
      let object: z.infer<typeof scenarioSchema>;
      try {
        const result = await generateObject({
          model: this.model,
          schema: scenarioSchema,
          system: SYSTEM_PROMPT,
          prompt: buildPrompt(pageText, focus, this.targetDurationSec, this.minScenes, issues),
          temperature: 0.8,
        });
        ledger.addText(result.usage.inputTokens ?? 0, result.usage.outputTokens ?? 0);
        object = result.object;
      } catch (error) {
        console.error(`[scenario] Attempt ${attempt} failed:`, error instanceof Error ? error.message : error);
        if (attempt === MAX_ATTEMPTS && last === null) throw error;
        continue;
      }

      last = { title: object.titleKo.trim() || "untitled", scenes: normalizeScenes(object.scenes) };
      issues = scenarioIssues(last.scenes, this.minScenes);
      if (issues.length === 0) {
        return last;
      }
      console.warn(`[scenario] Attempt ${attempt} rejected: ${issues.join(" / ")}`);
    }

    if (!last) {
      throw new Error("Scenario generation produced no result");
    }
    console.warn(`[scenario] Giving up on regeneration, using last result (${last.scenes.length} scenes)`);
    return last;
  }
}

export function createScenarioEngine(config: AppConfig): ScenarioEngine {
  if (config.scenarioEngine === "gemini") {
    return new AiScenarioEngine(`gemini:${config.models.geminiText}`, google(config.models.geminiText), config.targetDurationSec);
  }
  return new AiScenarioEngine(`claude:${config.models.claude}`, anthropic(config.models.claude), config.targetDurationSec);
}
