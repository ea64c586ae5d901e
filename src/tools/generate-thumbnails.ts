import * as fs from "fs";
import * as path from "path";

import type { CostLedger } from "../cost-ledger";
import { VIDEO_LABELS, type ImageEngine, type Scene, type ThumbnailMaker, type ThumbnailRequest, type VideoLabel } from "../types";
import { escapeFilterValue, runFfmpeg } from "./ffmpeg";

export const THUMBNAIL_SIZES: Record<VideoLabel, { width: number; height: number }> = {
  landscape_ko: { width: 1280, height: 720 },
  landscape_en: { width: 1280, height: 720 },
  shorts_ko: { width: 1080, height: 1920 },
  shorts_en: { width: 1080, height: 1920 },
};

const BASE_SCENE_ID = 0;

/** Background prompt from the opening hook scene (or the first scene). */
export function thumbnailPrompt(scenes: Scene[]): string {
  const anchor = scenes.find((scene) => scene.stage === "hook") ?? scenes[0];
  const subject = anchor?.imagePrompt.trim() || "a bold abstract news illustration";
  return `${subject}, eye-catching YouTube thumbnail background, strong focal point, empty space for a headline`;
}

export function thumbnailArgs(
  basePath: string | null,
  titleFile: string,
  size: { width: number; height: number },
  fontPath: string,
  outputPath: string,
): string[] {
  const { width, height } = size;
  const input = basePath ? ["-i", basePath] : ["-f", "lavfi", "-i", `color=c=0x1e1e1e:s=${width}x${height}`];
  const font = fontPath ? `fontfile='${escapeFilterValue(fontPath)}':` : "";
  const fontSize = Math.round(Math.min(width, height) / 9);
  const filter = [
    `scale=${width}:${height}:force_original_aspect_ratio=increase`,
    `crop=${width}:${height}`,
    `drawtext=${font}textfile='${escapeFilterValue(titleFile)}':fontsize=${fontSize}:fontcolor=yellow:` +
      `borderw=6:bordercolor=black:x=(w-text_w)/2:y=(h-text_h)/2`,
  ].join(",");
  return [...input, "-vf", filter, "-frames:v", "1", "-q:v", "2", "-y", outputPath];
}

/**
 * One generated background, cropped to each video's frame with the title
 * drawn on top. Falls back to a dark plain background when the image engine
 * returns nothing.
 */
export class FfmpegThumbnailMaker implements ThumbnailMaker {
  constructor(
    private readonly imageEngine: ImageEngine,
    private readonly fontPath = "",
  ) {}

  async make(request: ThumbnailRequest, ledger: CostLedger): Promise<Partial<Record<VideoLabel, string>>> {
    fs.mkdirSync(request.outputDir, { recursive: true });

    let basePath: string | null = null;
    try {
      basePath = await this.imageEngine.generate(thumbnailPrompt(request.scenes), BASE_SCENE_ID, request.outputDir, ledger);
    } catch (error) {
      console.warn("[thumbnail] Background generation failed, using plain background:", error instanceof Error ? error.message : error);
    }

    const thumbnails: Partial<Record<VideoLabel, string>> = {};
    for (const label of VIDEO_LABELS) {
      const title = label.endsWith("_ko") ? request.titleKo : request.titleEn;
      const titleFile = path.join(request.outputDir, `${label}_title.txt`);
      fs.writeFileSync(titleFile, title);

      const outputPath = path.join(request.outputDir, `${label}.jpg`);
      await runFfmpeg(thumbnailArgs(basePath, titleFile, THUMBNAIL_SIZES[label], this.fontPath, outputPath));
      fs.rmSync(titleFile, { force: true });
      thumbnails[label] = outputPath;
    }

    console.log(`[thumbnail] ${Object.keys(thumbnails).length} thumbnails in ${request.outputDir}`);
    return thumbnails;
  }
}
