import { z } from "zod";
import { join, resolve } from "path";

import { ConfigError } from "./errors";
import type { PriceTable } from "./cost-ledger";

const DEFAULT_IMAGE_STYLE =
  "clean cartoon illustration style, minimal and modern design, " +
  "black and white line art with selective color accent, " +
  "only the most important element highlighted in a single bold accent color, " +
  "flat design, simple shapes, white background, high contrast, editorial style";

const envSchema = z.object({
  OUTPUT_DIR: z.string().default("./output"),
  DATABASE_DIR: z.string().default("./database"),

  SCENARIO_ENGINE: z.enum(["claude", "gemini"]).default("claude"),
  IMAGE_ENGINE: z.enum(["gemini", "comfy"]).default("gemini"),
  CLAUDE_MODEL: z.string().default("claude-sonnet-4-5"),
  GEMINI_TEXT_MODEL: z.string().default("gemini-2.5-flash"),
  GEMINI_IMAGE_MODEL: z.string().default("gemini-2.5-flash-image"),
  GEMINI_TTS_MODEL: z.string().default("gemini-2.5-flash-preview-tts"),

  IMAGE_BATCH_SIZE: z.coerce.number().int().positive().default(10),
  IMAGE_MAX_WORKERS: z.coerce.number().int().positive().default(5),
  IMAGE_SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.8),
  IMAGE_STYLE: z.string().default(DEFAULT_IMAGE_STYLE),

  TARGET_DURATION_SEC: z.coerce.number().positive().default(300),
  SHORTS_DURATION_SEC: z.coerce.number().positive().default(60),

  TTS_KO_VOICE: z.string().default("Kore"),
  TTS_EN_VOICE: z.string().default("Puck"),

  BGM_VOLUME_RATIO: z.coerce.number().min(0).max(1).default(0.15),
  PIXABAY_API_KEY: z.string().default(""),
  COMFYUI_API_URL: z.string().default("http://127.0.0.1:8188"),
  COMFYUI_API_TOKEN: z.string().default(""),
  FONT_PATH: z.string().default(""),

  YOUTUBE_PRIVACY: z.enum(["public", "unlisted", "private"]).default("private"),
  YOUTUBE_CATEGORY_ID: z.string().default("22"),
  YOUTUBE_KO_ACCESS_TOKEN: z.string().default(""),
  YOUTUBE_EN_ACCESS_TOKEN: z.string().default(""),

  COST_TEXT_INPUT_PER_1K: z.coerce.number().nonnegative().default(0.003),
  COST_TEXT_OUTPUT_PER_1K: z.coerce.number().nonnegative().default(0.015),
  COST_IMAGE_PER_ITEM: z.coerce.number().nonnegative().default(0.039),
  COST_SPEECH_PER_1K_CHARS: z.coerce.number().nonnegative().default(0.015),
});

export interface AppConfig {
  outputRoot: string;
  checkpointDir: string;
  imageCachePath: string;
  historyPath: string;
  bgmCacheDir: string;
  scenarioEngine: "claude" | "gemini";
  imageEngine: "gemini" | "comfy";
  models: {
    claude: string;
    geminiText: string;
    geminiImage: string;
    geminiTts: string;
  };
  imageBatchSize: number;
  imageMaxWorkers: number;
  similarityThreshold: number;
  imageStyle: string;
  targetDurationSec: number;
  shortsDurationSec: number;
  voices: { ko: string; en: string };
  bgmVolumeRatio: number;
  pixabayApiKey: string;
  comfy: { baseUrl: string; token: string };
  fontPath: string;
  youtube: {
    privacy: "public" | "unlisted" | "private";
    categoryId: string;
    accessTokens: { ko: string; en: string };
  };
  prices: PriceTable;
}

/**
 * Reads the application configuration from environment variables.
 * Every value has a default; malformed values raise a ConfigError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const e = parsed.data;
  const outputRoot = resolve(e.OUTPUT_DIR);
  const databaseDir = resolve(e.DATABASE_DIR);

  return {
    outputRoot,
    checkpointDir: join(outputRoot, ".checkpoints"),
    imageCachePath: join(databaseDir, "image_cache.json"),
    historyPath: join(databaseDir, "history.json"),
    bgmCacheDir: join(outputRoot, ".bgm-cache"),
    scenarioEngine: e.SCENARIO_ENGINE,
    imageEngine: e.IMAGE_ENGINE,
    models: {
      claude: e.CLAUDE_MODEL,
      geminiText: e.GEMINI_TEXT_MODEL,
      geminiImage: e.GEMINI_IMAGE_MODEL,
      geminiTts: e.GEMINI_TTS_MODEL,
    },
    imageBatchSize: e.IMAGE_BATCH_SIZE,
    imageMaxWorkers: e.IMAGE_MAX_WORKERS,
    similarityThreshold: e.IMAGE_SIMILARITY_THRESHOLD,
    imageStyle: e.IMAGE_STYLE,
    targetDurationSec: e.TARGET_DURATION_SEC,
    shortsDurationSec: e.SHORTS_DURATION_SEC,
    voices: { ko: e.TTS_KO_VOICE, en: e.TTS_EN_VOICE },
    bgmVolumeRatio: e.BGM_VOLUME_RATIO,
    pixabayApiKey: e.PIXABAY_API_KEY,
    comfy: { baseUrl: e.COMFYUI_API_URL.replace(/\/+$/, ""), token: e.COMFYUI_API_TOKEN },
    fontPath: e.FONT_PATH,
    youtube: {
      privacy: e.YOUTUBE_PRIVACY,
      categoryId: e.YOUTUBE_CATEGORY_ID,
      accessTokens: { ko: e.YOUTUBE_KO_ACCESS_TOKEN, en: e.YOUTUBE_EN_ACCESS_TOKEN },
    },
    prices: {
      textInputPer1k: e.COST_TEXT_INPUT_PER_1K,
      textOutputPer1k: e.COST_TEXT_OUTPUT_PER_1K,
      imagePerItem: e.COST_IMAGE_PER_ITEM,
      speechPer1kChars: e.COST_SPEECH_PER_1K_CHARS,
    },
  };
}
