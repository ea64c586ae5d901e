import { anthropic } from "@ai-sdk/anthropic";
import { google } from "@ai-sdk/google";

import { ComfyClient } from "./comfy-client";
import type { AppConfig } from "./config";
import type { HistoryStore } from "./history";
import type { ImageCacheIndex } from "./image-cache";
import type { PipelineDeps } from "./orchestrator";
import type { ImageEngine } from "./types";
import { PixabayBgmSource } from "./tools/bgm";
import { buildShortsScenario } from "./tools/build-shorts";
import { FfmpegComposer } from "./tools/compose-video";
import { probeDuration } from "./tools/ffmpeg";
import { createScenarioEngine } from "./tools/generate-scenario";
import { ComfyImageEngine, GeminiImageEngine } from "./tools/generate-image";
import { FfmpegThumbnailMaker } from "./tools/generate-thumbnails";
import { HttpScraper } from "./tools/scrape";
import { GeminiSpeechEngine } from "./tools/synthesize-speech";
import { AiTranslator } from "./tools/translate-scenario";
import { YouTubeUploader } from "./tools/upload-video";
import { validateAndFix } from "./tools/validate-scenario";

export function createImageEngine(config: AppConfig): ImageEngine {
  if (config.imageEngine === "comfy") {
    return new ComfyImageEngine(new ComfyClient(config.comfy.baseUrl, config.comfy.token));
  }
  return new GeminiImageEngine(config.models.geminiImage);
}

/**
 * Wires the production collaborators for a pipeline run from configuration.
 * The stores are opened by the caller, which also closes them.
 */
export function createDefaultDeps(
  config: AppConfig,
  stores: { imageCache: ImageCacheIndex; history: HistoryStore },
): PipelineDeps {
  const imageEngine = createImageEngine(config);
  const translationModel =
    config.scenarioEngine === "gemini" ? google(config.models.geminiText) : anthropic(config.models.claude);

  return {
    scraper: new HttpScraper(),
    scenarioEngine: createScenarioEngine(config),
    validator: (result) => validateAndFix(result, config.targetDurationSec),
    shortsBuilder: (scenes) => buildShortsScenario(scenes, config.shortsDurationSec),
    translator: new AiTranslator(translationModel),
    imageEngine,
    speechEngine: new GeminiSpeechEngine(config.models.geminiTts, config.voices),
    durationProbe: probeDuration,
    bgm: new PixabayBgmSource(config.pixabayApiKey),
    composer: new FfmpegComposer(config.bgmVolumeRatio, config.fontPath),
    thumbnails: new FfmpegThumbnailMaker(imageEngine, config.fontPath),
    uploader: new YouTubeUploader(config.youtube.accessTokens),
    imageCache: stores.imageCache,
    history: stores.history,
  };
}
