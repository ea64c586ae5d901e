import { z } from "zod";
import { createHash } from "crypto";
import * as fs from "fs";
import * as path from "path";

import type { PipelineState } from "./types";

const sceneSchema = z.object({
  sceneId: z.number().int().positive(),
  stage: z.enum(["hook", "problem", "core", "twist", "cta"]),
  narration: z.string(),
  durationSec: z.number(),
  imagePrompt: z.string(),
  textOverlay: z.string(),
});

const labelRecord = z.object({
  landscape_ko: z.string().optional(),
  landscape_en: z.string().optional(),
  shorts_ko: z.string().optional(),
  shorts_en: z.string().optional(),
});

const stateSchema = z.object({
  jobId: z.string(),
  url: z.string(),
  focus: z.string(),
  pageText: z.string().nullable(),
  pageLang: z.string().nullable(),
  scenarioKo: z.array(sceneSchema).nullable(),
  scenarioEn: z.array(sceneSchema).nullable(),
  shortsScenarioKo: z.array(sceneSchema).nullable(),
  shortsScenarioEn: z.array(sceneSchema).nullable(),
  titleKo: z.string().nullable(),
  titleEn: z.string().nullable(),
  imagePaths: z.array(z.string().nullable()),
  reusedImageCount: z.number().int().nonnegative().default(0),
  audioKoPaths: z.array(z.string()),
  audioEnPaths: z.array(z.string()),
  bgmPath: z.string().nullable(),
  videos: labelRecord,
  thumbnailPaths: labelRecord,
  uploadedVideoIds: labelRecord.default({}),
  historyId: z.number().int().nullable().default(null),
  outputDir: z.string().nullable(),
  errors: z.array(z.object({ step: z.number(), error: z.string(), timestamp: z.string() })).default([]),
  lastSavedAt: z.string(),
});

const checkpointSchema = z.object({
  lastCompletedStep: z.number().int().min(0),
  state: stateSchema,
});

type CheckpointRecord = z.infer<typeof checkpointSchema>;

/**
 * Stable job identifier for a source URL: the first 12 hex chars of its MD5.
 */
export function jobIdForUrl(url: string): string {
  return createHash("md5").update(url, "utf8").digest("hex").slice(0, 12);
}

export function createInitialState(url: string, focus: string): PipelineState {
  return {
    jobId: jobIdForUrl(url),
    url,
    focus,
    pageText: null,
    pageLang: null,
    scenarioKo: null,
    scenarioEn: null,
    shortsScenarioKo: null,
    shortsScenarioEn: null,
    titleKo: null,
    titleEn: null,
    imagePaths: [],
    reusedImageCount: 0,
    audioKoPaths: [],
    audioEnPaths: [],
    bgmPath: null,
    videos: {},
    thumbnailPaths: {},
    uploadedVideoIds: {},
    historyId: null,
    outputDir: null,
    errors: [],
    lastSavedAt: new Date().toISOString(),
  };
}

/**
 * One checkpoint file per job. Reads and writes never throw: a missing or
 * corrupt checkpoint reads as "nothing saved yet", and a failed write only
 * costs resumability.
 */
export class CheckpointStore {
  readonly jobId: string;
  readonly path: string;

  constructor(url: string, checkpointDir: string) {
    this.jobId = jobIdForUrl(url);
    this.path = path.join(checkpointDir, `${this.jobId}.json`);
  }

  save(state: PipelineState, lastCompletedStep: number): void {
    const record = {
      lastCompletedStep,
      state: { ...state, lastSavedAt: new Date().toISOString() },
    };
    const tmpPath = `${this.path}.tmp`;
    try {
      fs.mkdirSync(path.dirname(this.path), { recursive: true });
      fs.writeFileSync(tmpPath, JSON.stringify(record, null, 2), "utf-8");
      fs.renameSync(tmpPath, this.path);
    } catch (error) {
      console.warn(`[checkpoint] Failed to save step ${lastCompletedStep} to ${this.path}:`, error instanceof Error ? error.message : error);
    }
  }

  load(): PipelineState | null {
    const record = this.read();
    if (!record) {
      return null;
    }
    console.log(`[checkpoint] Restored job ${this.jobId}: steps 1-${record.lastCompletedStep} completed`);
    return record.state;
  }

  lastCompletedStep(): number {
    return this.read()?.lastCompletedStep ?? 0;
  }

  exists(): boolean {
    return fs.existsSync(this.path);
  }

  delete(): void {
    if (fs.existsSync(this.path)) {
      fs.unlinkSync(this.path);
      console.log(`[checkpoint] Deleted ${this.path}`);
    }
  }

  private read(): CheckpointRecord | null {
    if (!fs.existsSync(this.path)) {
      return null;
    }
    try {
      const content = fs.readFileSync(this.path, "utf-8");
      const parsed = checkpointSchema.safeParse(JSON.parse(content));
      if (!parsed.success) {
        console.warn(`[checkpoint] Ignoring malformed checkpoint ${this.path}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
        return null;
      }
      return parsed.data;
    } catch (error) {
      console.warn(`[checkpoint] Ignoring unreadable checkpoint ${this.path}:`, error instanceof Error ? error.message : error);
      return null;
    }
  }
}
