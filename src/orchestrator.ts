import * as fs from "fs";
import * as path from "path";

import type { AppConfig } from "./config";
import { generateAll, type ReuseDecision } from "./batch-scheduler";
import { CheckpointStore, createInitialState } from "./checkpoint";
import type { ConfirmHandler } from "./confirm-channel";
import { CostLedger, type CostCategory, type CostObserver } from "./cost-ledger";
import { AssetMappingError, PipelineAbortedError, StageFailedError } from "./errors";
import type { HistoryStore } from "./history";
import type { ImageCacheIndex } from "./image-cache";
import { resolveOutputDir } from "./output-dir";
import { dominantStage } from "./scene";
import { stopRequested } from "./signals";
import { correctDurations } from "./tools/correct-durations";
import { buildMetadata } from "./tools/upload-video";
import {
  VIDEO_LABELS,
  type BgmSource,
  type Composer,
  type DurationProbe,
  type ImageEngine,
  type Lang,
  type PipelineState,
  type ScenarioEngine,
  type ScenarioResult,
  type Scene,
  type Scraper,
  type SpeechEngine,
  type ThumbnailMaker,
  type Translator,
  type Uploader,
  type VideoLabel,
} from "./types";

// ---------------------------------------------------------------------------
// Steps
// ---------------------------------------------------------------------------

export type StepName =
  | "scrape"
  | "scenario"
  | "shorts"
  | "translate"
  | "images"
  | "speech"
  | "bgm"
  | "compose"
  | "thumbnails"
  | "save"
  | "upload";

export const STEP_ORDER: readonly StepName[] = [
  "scrape",
  "scenario",
  "shorts",
  "translate",
  "images",
  "speech",
  "bgm",
  "compose",
  "thumbnails",
  "save",
  "upload",
];

export const TOTAL_STEPS = STEP_ORDER.length;

export const STEP_LABELS: Record<StepName, string> = {
  scrape: "Fetch article",
  scenario: "Generate scenario",
  shorts: "Build shorts scenario",
  translate: "Translate to English",
  images: "Generate scene images",
  speech: "Synthesize narration",
  bgm: "Select background music",
  compose: "Compose videos",
  thumbnails: "Generate thumbnails",
  save: "Save results",
  upload: "Upload to YouTube",
};

export function stepNumber(name: StepName): number {
  return STEP_ORDER.indexOf(name) + 1;
}

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ProgressEvent {
  step: number;
  total: number;
  label: string;
  fraction: number;
}

export type ProgressObserver = (event: ProgressEvent) => void;

export interface PipelineDeps {
  scraper: Scraper;
  scenarioEngine: ScenarioEngine;
  validator: (result: ScenarioResult) => ScenarioResult;
  shortsBuilder: (scenes: Scene[]) => Scene[];
  translator: Translator;
  imageEngine: ImageEngine;
  speechEngine: SpeechEngine;
  durationProbe: DurationProbe;
  bgm: BgmSource;
  composer: Composer;
  thumbnails: ThumbnailMaker;
  uploader: Uploader;
  imageCache: ImageCacheIndex;
  history: HistoryStore;
}

export type PipelineSettings = Pick<
  AppConfig,
  | "outputRoot"
  | "checkpointDir"
  | "bgmCacheDir"
  | "imageBatchSize"
  | "imageMaxWorkers"
  | "similarityThreshold"
  | "imageStyle"
  | "prices"
  | "youtube"
>;

export interface PipelineOptions {
  url: string;
  focus?: string;
  /** Explicit start step; omitted means resume after the last checkpointed step. */
  fromStep?: number;
  settings: PipelineSettings;
  confirm: ConfirmHandler;
  reuseDecision?: ReuseDecision;
  onProgress?: ProgressObserver;
  onCost?: CostObserver;
  isStopRequested?: () => boolean;
  verbose?: boolean;
}

export interface PipelineOutcome {
  status: "completed" | "aborted";
  jobId: string;
  state: PipelineState;
  lastCompletedStep: number;
  costUsd: number;
  costBreakdown: Record<CostCategory, number>;
}

interface StageContext {
  state: PipelineState;
  deps: PipelineDeps;
  options: PipelineOptions;
  ledger: CostLedger;
}

type StageRunner = (ctx: StageContext) => Promise<void>;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function need<T>(value: T | null | undefined, what: string): T {
  if (value === null || value === undefined) {
    throw new Error(`Missing ${what} in pipeline state; re-run the step that produces it`);
  }
  return value;
}

function outputSubdir(ctx: StageContext, name: string): string {
  return path.join(resolveOutputDir(ctx.state, ctx.options.settings.outputRoot), name);
}

/**
 * Lines up per-scene assets with a scenario by sceneId (index = sceneId - 1).
 * Shorts scenes carry long-form ids, so this is also how a shorts cut finds
 * its narration. A scene with no narration audio is an error.
 */
export function alignSceneAssets(
  scenes: Scene[],
  imagePaths: Array<string | null>,
  audioPaths: string[],
  label: string,
): { imagePaths: Array<string | null>; audioPaths: string[] } {
  const images: Array<string | null> = [];
  const audio: string[] = [];
  for (const scene of scenes) {
    const index = scene.sceneId - 1;
    const audioPath = index >= 0 ? audioPaths[index] : undefined;
    if (audioPath === undefined) {
      throw new AssetMappingError(
        `${label}: scene ${scene.sceneId} has no narration audio (${audioPaths.length} long-form clips)`,
      );
    }
    images.push(imagePaths[index] ?? null);
    audio.push(audioPath);
  }
  return { imagePaths: images, audioPaths: audio };
}

function syncDurationsById(target: Scene[], source: Scene[]): Scene[] {
  const byId = new Map(source.map((scene) => [scene.sceneId, scene.durationSec]));
  return target.map((scene) => ({ ...scene, durationSec: byId.get(scene.sceneId) ?? scene.durationSec }));
}

// ---------------------------------------------------------------------------
// Stage 1: Scrape
// ---------------------------------------------------------------------------

async function runScrapeStage(ctx: StageContext): Promise<void> {
  const { state, deps } = ctx;
  const text = await deps.scraper.fetch(state.url, state.focus);
  if (!text.trim()) {
    throw new Error(`No readable text found at ${state.url}`);
  }
  state.pageText = text;
  state.pageLang = deps.scraper.detectLanguage(text);
  console.log(`[step 1] Language: ${state.pageLang}, ${text.length} characters`);
}

// ---------------------------------------------------------------------------
// Stage 2: Scenario (confirm-gate)
// ---------------------------------------------------------------------------

async function runScenarioStage(ctx: StageContext): Promise<void> {
  const { state, deps, options, ledger } = ctx;
  const pageText = need(state.pageText, "page text");

  const generated = await deps.scenarioEngine.generate(pageText, state.focus, ledger);
  const result = deps.validator(generated);
  console.log(`[step 2] ${deps.scenarioEngine.name}: "${result.title}" with ${result.scenes.length} scenes`);

  const confirmed = await options.confirm({
    gate: "scenario",
    message: "Scenario generated. Review it before continuing.",
    data: {
      title: result.title,
      sceneCount: result.scenes.length,
      preview: result.scenes.slice(0, 3),
    },
  });
  if (!confirmed) {
    throw new PipelineAbortedError("Scenario was not approved");
  }

  state.scenarioKo = result.scenes;
  state.titleKo = result.title;
}

// ---------------------------------------------------------------------------
// Stage 3: Shorts scenario
// ---------------------------------------------------------------------------

async function runShortsStage(ctx: StageContext): Promise<void> {
  const { state, deps } = ctx;
  state.shortsScenarioKo = deps.shortsBuilder(need(state.scenarioKo, "Korean scenario"));
}

// ---------------------------------------------------------------------------
// Stage 4: Translate
// ---------------------------------------------------------------------------

async function runTranslateStage(ctx: StageContext): Promise<void> {
  const { state, deps, ledger } = ctx;
  const scenarioKo = need(state.scenarioKo, "Korean scenario");
  const shortsKo = need(state.shortsScenarioKo, "Korean shorts scenario");

  const translated = await deps.translator.translate(scenarioKo, need(state.titleKo, "Korean title"), ledger);
  if (translated.scenes.length !== scenarioKo.length) {
    throw new Error(`Translation returned ${translated.scenes.length} scenes for ${scenarioKo.length}`);
  }

  const enById = new Map(translated.scenes.map((scene) => [scene.sceneId, scene]));
  for (const scene of scenarioKo) {
    if (!enById.has(scene.sceneId)) {
      throw new AssetMappingError(`Translation lost scene ${scene.sceneId}`);
    }
  }

  state.scenarioEn = translated.scenes;
  state.titleEn = translated.title;
  state.shortsScenarioEn = shortsKo.map((scene) => {
    const en = enById.get(scene.sceneId);
    if (!en) {
      throw new AssetMappingError(`Shorts scene ${scene.sceneId} has no long-form translation`);
    }
    return { ...scene, narration: en.narration, textOverlay: en.textOverlay };
  });
}

// ---------------------------------------------------------------------------
// Stage 5: Images
// ---------------------------------------------------------------------------

async function runImagesStage(ctx: StageContext): Promise<void> {
  const { state, deps, options, ledger } = ctx;
  const scenes = need(state.scenarioKo, "Korean scenario");   // image prompts are shared by both languages
  const { settings } = options;

  const result = await generateAll(
    scenes.map((scene) => ({ sceneId: scene.sceneId, prompt: scene.imagePrompt })),
    {
      outputDir: outputSubdir(ctx, "scenes"),
      engine: deps.imageEngine,
      cache: deps.imageCache,
      ledger,
      similarityThreshold: settings.similarityThreshold,
      reuseDecision: options.reuseDecision,
      batchSize: settings.imageBatchSize,
      maxWorkers: settings.imageMaxWorkers,
      styleAnchor: settings.imageStyle,
      jobId: state.jobId,
      verbose: options.verbose,
      onProgress: (completed, total) => {
        options.onProgress?.({
          step: stepNumber("images"),
          total: TOTAL_STEPS,
          label: `${STEP_LABELS.images} (${completed}/${total})`,
          fraction: total === 0 ? 1 : completed / total,
        });
      },
    },
  );

  const slots = Math.max(0, ...scenes.map((scene) => scene.sceneId));
  const imagePaths: Array<string | null> = new Array<string | null>(slots).fill(null);
  for (const [sceneId, imagePath] of result.paths) {
    imagePaths[sceneId - 1] = imagePath;
  }
  const missing = scenes.length - result.paths.size;
  if (missing > 0) {
    console.warn(`[step 5] ${missing} scene(s) have no image and will use a plain background`);
  }

  state.imagePaths = imagePaths;
  state.reusedImageCount = result.reused.length;
}

// ---------------------------------------------------------------------------
// Stage 6: Speech
// ---------------------------------------------------------------------------

async function runSpeechStage(ctx: StageContext): Promise<void> {
  const { state, deps, ledger } = ctx;
  const scenarioKo = need(state.scenarioKo, "Korean scenario");
  const scenarioEn = need(state.scenarioEn, "English scenario");
  const audioDir = outputSubdir(ctx, "audio");

  const koPaths = await deps.speechEngine.synthesize(scenarioKo, "ko", path.join(audioDir, "ko"), ledger);
  const enPaths = await deps.speechEngine.synthesize(scenarioEn, "en", path.join(audioDir, "en"), ledger);

  state.scenarioKo = await correctDurations(scenarioKo, koPaths, deps.durationProbe);
  state.scenarioEn = await correctDurations(scenarioEn, enPaths, deps.durationProbe);
  state.shortsScenarioKo = syncDurationsById(need(state.shortsScenarioKo, "Korean shorts scenario"), state.scenarioKo);
  state.shortsScenarioEn = syncDurationsById(need(state.shortsScenarioEn, "English shorts scenario"), state.scenarioEn);
  state.audioKoPaths = koPaths;
  state.audioEnPaths = enPaths;
}

// ---------------------------------------------------------------------------
// Stage 7: BGM
// ---------------------------------------------------------------------------

async function runBgmStage(ctx: StageContext): Promise<void> {
  const { state, deps } = ctx;
  const stage = dominantStage(state.scenarioKo ?? []);
  const url = await deps.bgm.select(stage);
  state.bgmPath = await deps.bgm.fetch(url, ctx.options.settings.bgmCacheDir);
  console.log(`[step 7] Dominant stage "${stage}", BGM ${state.bgmPath}`);
}

// ---------------------------------------------------------------------------
// Stage 8: Compose
// ---------------------------------------------------------------------------

async function runComposeStage(ctx: StageContext): Promise<void> {
  const { state, deps } = ctx;
  const videoDir = outputSubdir(ctx, "videos");

  const plans: Array<{ label: VideoLabel; kind: "landscape" | "shorts"; lang: Lang; scenes: Scene[]; audio: string[]; title: string }> = [
    { label: "landscape_ko", kind: "landscape", lang: "ko", scenes: need(state.scenarioKo, "Korean scenario"), audio: state.audioKoPaths, title: need(state.titleKo, "Korean title") },
    { label: "landscape_en", kind: "landscape", lang: "en", scenes: need(state.scenarioEn, "English scenario"), audio: state.audioEnPaths, title: need(state.titleEn, "English title") },
    { label: "shorts_ko", kind: "shorts", lang: "ko", scenes: need(state.shortsScenarioKo, "Korean shorts scenario"), audio: state.audioKoPaths, title: need(state.titleKo, "Korean title") },
    { label: "shorts_en", kind: "shorts", lang: "en", scenes: need(state.shortsScenarioEn, "English shorts scenario"), audio: state.audioEnPaths, title: need(state.titleEn, "English title") },
  ];

  for (const plan of plans) {
    const assets = alignSceneAssets(plan.scenes, state.imagePaths, plan.audio, plan.label);
    state.videos[plan.label] = await deps.composer.compose({
      kind: plan.kind,
      scenes: plan.scenes,
      imagePaths: assets.imagePaths,
      audioPaths: assets.audioPaths,
      bgmPath: state.bgmPath,
      outputPath: path.join(videoDir, `${plan.label}.mp4`),
      title: plan.title,
      lang: plan.lang,
    });
    console.log(`[step 8] ${plan.label}: ${state.videos[plan.label]}`);
  }
}

// ---------------------------------------------------------------------------
// Stage 9: Thumbnails
// ---------------------------------------------------------------------------

async function runThumbnailsStage(ctx: StageContext): Promise<void> {
  const { state, deps, ledger } = ctx;
  state.thumbnailPaths = await deps.thumbnails.make(
    {
      titleKo: need(state.titleKo, "Korean title"),
      titleEn: need(state.titleEn, "English title"),
      scenes: need(state.scenarioKo, "Korean scenario"),
      outputDir: outputSubdir(ctx, "thumbnails"),
    },
    ledger,
  );
}

// ---------------------------------------------------------------------------
// Stage 10: Save
// ---------------------------------------------------------------------------

async function runSaveStage(ctx: StageContext): Promise<void> {
  const { state, deps, ledger } = ctx;
  const outputDir = resolveOutputDir(state, ctx.options.settings.outputRoot);

  if (state.historyId === null) {
    const record = deps.history.add({
      jobId: state.jobId,
      url: state.url,
      titleKo: state.titleKo ?? "",
      titleEn: state.titleEn ?? "",
      pageLang: state.pageLang ?? "",
      sceneCount: state.scenarioKo?.length ?? 0,
      imageCount: state.imagePaths.filter((p) => p !== null).length,
      reusedImages: state.reusedImageCount,
      costUsd: ledger.total(),
      costBreakdown: ledger.breakdown(),
      outputDir,
    });
    state.historyId = record.id;
  }

  const summary = {
    jobId: state.jobId,
    url: state.url,
    titleKo: state.titleKo,
    titleEn: state.titleEn,
    videos: state.videos,
    thumbnails: state.thumbnailPaths,
    scenes: state.scenarioKo?.length ?? 0,
    shortsScenes: state.shortsScenarioKo?.length ?? 0,
    cost: ledger.breakdown(),
  };
  fs.writeFileSync(path.join(outputDir, "summary.json"), JSON.stringify(summary, null, 2));
  console.log(`[step 10] Results saved in ${outputDir}`);
}

// ---------------------------------------------------------------------------
// Stage 11: Upload (confirm-gate)
// ---------------------------------------------------------------------------

async function runUploadStage(ctx: StageContext): Promise<void> {
  const { state, deps, options } = ctx;

  const confirmed = await options.confirm({
    gate: "upload",
    message: "Final check before upload: four videos will be published to YouTube.",
    data: { videos: { ...state.videos }, thumbnails: { ...state.thumbnailPaths } },
  });
  if (!confirmed) {
    throw new PipelineAbortedError("Upload was not approved");
  }

  try {
    for (const label of VIDEO_LABELS) {
      if (state.uploadedVideoIds[label]) {
        console.log(`[step 11] ${label} already uploaded as ${state.uploadedVideoIds[label]}, skipping`);
        continue;
      }
      const lang: Lang = label.endsWith("_ko") ? "ko" : "en";
      const metadata = buildMetadata(state, lang, label.startsWith("shorts"), options.settings.youtube);
      const videoId = await deps.uploader.upload(
        need(state.videos[label], `${label} video`),
        state.thumbnailPaths[label] ?? null,
        metadata,
        lang,
      );
      state.uploadedVideoIds[label] = videoId;
      console.log(`[step 11] ${label} uploaded: ${videoId}`);
    }
  } catch (error) {
    if (state.historyId !== null && Object.keys(state.uploadedVideoIds).length > 0) {
      deps.history.updateUploadStatus(state.historyId, "partial", { ...state.uploadedVideoIds });
    }
    throw error;
  }

  if (state.historyId !== null) {
    deps.history.updateUploadStatus(state.historyId, "uploaded", { ...state.uploadedVideoIds });
  }
}

const STAGE_RUNNERS: Record<StepName, StageRunner> = {
  scrape: runScrapeStage,
  scenario: runScenarioStage,
  shorts: runShortsStage,
  translate: runTranslateStage,
  images: runImagesStage,
  speech: runSpeechStage,
  bgm: runBgmStage,
  compose: runComposeStage,
  thumbnails: runThumbnailsStage,
  save: runSaveStage,
  upload: runUploadStage,
};

// ---------------------------------------------------------------------------
// Main pipeline entry point
// ---------------------------------------------------------------------------

/**
 * Runs the job for options.url from its resume point through step 11.
 *
 * After each step the checkpoint records it as completed. A declined
 * confirm-gate or a stop request between steps ends the run with status
 * "aborted" and leaves the checkpoint as it was. Any other error rolls the
 * checkpoint back to the step before the failing one and is rethrown as a
 * StageFailedError, so the next run starts again at the failed step.
 */
export async function runPipeline(options: PipelineOptions, deps: PipelineDeps): Promise<PipelineOutcome> {
  const { settings } = options;
  const checkpoint = new CheckpointStore(options.url, settings.checkpointDir);
  const ledger = new CostLedger(settings.prices, options.onCost ?? null);
  const isStopRequested = options.isStopRequested ?? (() => stopRequested);

  const state = checkpoint.load() ?? createInitialState(options.url, options.focus ?? "");

  let fromStep: number;
  if (options.fromStep === undefined) {
    fromStep = checkpoint.lastCompletedStep() + 1;
  } else {
    if (!Number.isInteger(options.fromStep) || options.fromStep < 1 || options.fromStep > TOTAL_STEPS) {
      throw new RangeError(`fromStep must be between 1 and ${TOTAL_STEPS}, got ${options.fromStep}`);
    }
    fromStep = options.fromStep;
  }

  let lastCompletedStep = fromStep - 1;
  const outcome = (status: PipelineOutcome["status"]): PipelineOutcome => ({
    status,
    jobId: state.jobId,
    state,
    lastCompletedStep,
    costUsd: ledger.total(),
    costBreakdown: ledger.breakdown(),
  });

  console.log(`[pipeline] Job ${state.jobId} (${options.url}) starting at step ${fromStep}`);

  for (const [index, name] of STEP_ORDER.entries()) {
    const step = index + 1;
    if (step < fromStep) {
      continue;
    }

    if (isStopRequested()) {
      console.log(`[pipeline] Stop requested before step ${step}. Resume later to continue.`);
      return outcome("aborted");
    }

    const label = STEP_LABELS[name];
    options.onProgress?.({ step, total: TOTAL_STEPS, label, fraction: 0 });
    console.log(`\n=== Step ${step}/${TOTAL_STEPS}: ${label} ===`);

    try {
      await STAGE_RUNNERS[name]({ state, deps, options, ledger });
    } catch (error) {
      if (error instanceof PipelineAbortedError) {
        console.log(`[pipeline] Aborted at step ${step}: ${error.message}`);
        return outcome("aborted");
      }

      const message = error instanceof Error ? error.message : String(error);
      console.error(`[pipeline] Step ${step} (${label}) failed: ${message}`);
      state.errors.push({ step, error: message, timestamp: new Date().toISOString() });
      checkpoint.save(state, step - 1);
      throw new StageFailedError(step, label, error);
    }

    checkpoint.save(state, step);
    lastCompletedStep = step;
    options.onProgress?.({ step, total: TOTAL_STEPS, label, fraction: 1 });
  }

  console.log(`\n=== Pipeline Complete ===\n${ledger.summary()}`);
  return outcome("completed");
}
