import type { CostLedger } from "./cost-ledger";

export type NarrativeStage = "hook" | "problem" | "core" | "twist" | "cta";

export const NARRATIVE_STAGES: readonly NarrativeStage[] = ["hook", "problem", "core", "twist", "cta"];

export type Lang = "ko" | "en";

export interface Scene {
  sceneId: number;             // 1-based; shorts scenes keep the long-form id
  stage: NarrativeStage;
  narration: string;
  durationSec: number;
  imagePrompt: string;         // always English
  textOverlay: string;
}

export interface ScenarioResult {
  title: string;
  scenes: Scene[];
}

export type VideoLabel = "landscape_ko" | "landscape_en" | "shorts_ko" | "shorts_en";

export const VIDEO_LABELS: readonly VideoLabel[] = ["landscape_ko", "landscape_en", "shorts_ko", "shorts_en"];

export interface PipelineState {
  jobId: string;
  url: string;
  focus: string;
  pageText: string | null;
  pageLang: string | null;
  scenarioKo: Scene[] | null;
  scenarioEn: Scene[] | null;
  shortsScenarioKo: Scene[] | null;
  shortsScenarioEn: Scene[] | null;
  titleKo: string | null;
  titleEn: string | null;
  imagePaths: Array<string | null>;                 // index = sceneId - 1
  reusedImageCount: number;
  audioKoPaths: string[];                           // index = sceneId - 1
  audioEnPaths: string[];
  bgmPath: string | null;
  videos: Partial<Record<VideoLabel, string>>;
  thumbnailPaths: Partial<Record<VideoLabel, string>>;
  uploadedVideoIds: Partial<Record<VideoLabel, string>>;
  historyId: number | null;
  outputDir: string | null;                         // fixed once set
  errors: Array<{ step: number; error: string; timestamp: string }>;
  lastSavedAt: string;
}

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

export interface Scraper {
  fetch(url: string, focus: string): Promise<string>;
  detectLanguage(text: string): string;
}

export interface ScenarioEngine {
  readonly name: string;
  generate(pageText: string, focus: string, ledger: CostLedger): Promise<ScenarioResult>;
}

export interface Translator {
  translate(scenes: Scene[], title: string, ledger: CostLedger): Promise<ScenarioResult>;
}

export type ImageEngineMode = "remote-parallel" | "local-sequential";

export interface ImageEngine {
  readonly name: string;
  readonly mode: ImageEngineMode;
  generate(prompt: string, sceneId: number, outputDir: string, ledger: CostLedger): Promise<string | null>;
}

export interface SpeechEngine {
  synthesize(scenes: Scene[], lang: Lang, outputDir: string, ledger: CostLedger): Promise<string[]>;
}

export type DurationProbe = (filePath: string) => Promise<number>;

export interface BgmSource {
  select(stage: NarrativeStage): Promise<string>;
  fetch(url: string, cacheDir: string): Promise<string>;
}

export interface ComposeRequest {
  kind: "landscape" | "shorts";
  scenes: Scene[];
  imagePaths: Array<string | null>;   // aligned with scenes
  audioPaths: string[];               // aligned with scenes
  bgmPath: string | null;
  outputPath: string;
  title: string;
  lang: Lang;
}

export interface Composer {
  compose(request: ComposeRequest): Promise<string>;
}

export interface ThumbnailRequest {
  titleKo: string;
  titleEn: string;
  scenes: Scene[];
  outputDir: string;
}

export interface ThumbnailMaker {
  make(request: ThumbnailRequest, ledger: CostLedger): Promise<Partial<Record<VideoLabel, string>>>;
}

export interface VideoMetadata {
  title: string;
  description: string;
  tags: string[];
  categoryId: string;
  privacyStatus: "public" | "unlisted" | "private";
}

export interface Uploader {
  upload(videoPath: string, thumbnailPath: string | null, metadata: VideoMetadata, lang: Lang): Promise<string>;
}
