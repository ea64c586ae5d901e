import * as fs from "fs";
import * as path from "path";

import type { ComposeRequest, Composer } from "../types";
import { escapeFilterValue, probeDuration, runFfmpeg } from "./ffmpeg";

export const FRAME_SIZES = {
  landscape: { width: 1920, height: 1080 },
  shorts: { width: 1080, height: 1920 },
} as const;

const FPS = 30;
const BGM_FADE_OUT_SEC = 3;

export interface ClipSpec {
  imagePath: string | null;
  audioPath: string;
  durationSec: number;
  overlayTextFile: string | null;
  outputPath: string;
  kind: ComposeRequest["kind"];
  fontPath: string;
}

/**
 * ffmpeg arguments for one scene clip: the still image (or a white frame)
 * fitted to the frame, the text overlay near the bottom, and the narration
 * padded with silence to the scene length.
 */
export function clipArgs(clip: ClipSpec): string[] {
  const { width, height } = FRAME_SIZES[clip.kind];
  const duration = clip.durationSec.toFixed(3);

  const videoInput = clip.imagePath
    ? ["-loop", "1", "-t", duration, "-i", clip.imagePath]
    : ["-f", "lavfi", "-t", duration, "-i", `color=c=white:s=${width}x${height}:r=${FPS}`];

  const filters = [
    `scale=${width}:${height}:force_original_aspect_ratio=decrease`,
    `pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2:color=white`,
  ];
  if (clip.overlayTextFile) {
    const fontSize = clip.kind === "shorts" ? 72 : 56;
    const font = clip.fontPath ? `fontfile='${escapeFilterValue(clip.fontPath)}':` : "";
    filters.push(
      `drawtext=${font}textfile='${escapeFilterValue(clip.overlayTextFile)}':fontsize=${fontSize}:fontcolor=white:` +
        `box=1:boxcolor=black@0.6:boxborderw=16:x=(w-text_w)/2:y=h-text_h-${Math.round(height * 0.12)}`,
    );
  }
  filters.push("format=yuv420p");

  return [
    ...videoInput,
    "-i", clip.audioPath,
    "-filter_complex", `[0:v]${filters.join(",")}[v];[1:a]apad[a]`,
    "-map", "[v]",
    "-map", "[a]",
    "-t", duration,
    "-r", String(FPS),
    "-c:v", "libx264",
    "-preset", "veryfast",
    "-c:a", "aac",
    "-ar", "44100",
    "-ac", "2",
    "-y", clip.outputPath,
  ];
}

export function concatListContent(clipPaths: string[]): string {
  return clipPaths.map((clipPath) => `file '${path.resolve(clipPath).replace(/'/g, "'\\''")}'`).join("\n");
}

/**
 * ffmpeg arguments that loop the background track under the narration at
 * `volumeRatio`, fading it out over the last three seconds.
 */
export function bgmMixArgs(videoPath: string, bgmPath: string, totalSec: number, volumeRatio: number, outputPath: string): string[] {
  const fadeStart = Math.max(0, totalSec - BGM_FADE_OUT_SEC).toFixed(3);
  return [
    "-i", videoPath,
    "-stream_loop", "-1",
    "-i", bgmPath,
    "-filter_complex",
    `[1:a]volume=${volumeRatio},afade=t=out:st=${fadeStart}:d=${BGM_FADE_OUT_SEC}[bgm];` +
      `[0:a][bgm]amix=inputs=2:duration=first:dropout_transition=0:normalize=0[a]`,
    "-map", "0:v",
    "-map", "[a]",
    "-c:v", "copy",
    "-c:a", "aac",
    "-t", totalSec.toFixed(3),
    "-y", outputPath,
  ];
}

/**
 * Builds a video scene by scene with ffmpeg: one clip per scene, joined with
 * the concat demuxer, then mixed with background music.
 */
export class FfmpegComposer implements Composer {
  constructor(
    private readonly volumeRatio: number,
    private readonly fontPath = "",
  ) {}

  async compose(request: ComposeRequest): Promise<string> {
    const { scenes, kind } = request;
    if (scenes.length === 0) {
      throw new Error(`Cannot compose ${path.basename(request.outputPath)}: no scenes`);
    }

    const workDir = `${request.outputPath}.parts`;
    fs.mkdirSync(workDir, { recursive: true });

    const clipPaths: string[] = [];
    for (const [index, scene] of scenes.entries()) {
      const clipPath = path.join(workDir, `clip_${String(index + 1).padStart(3, "0")}.mp4`);
      let overlayTextFile: string | null = null;
      if (scene.textOverlay.trim()) {
        overlayTextFile = path.join(workDir, `overlay_${String(index + 1).padStart(3, "0")}.txt`);
        fs.writeFileSync(overlayTextFile, scene.textOverlay.trim());
      }

      await runFfmpeg(
        clipArgs({
          imagePath: request.imagePaths[index] ?? null,
          audioPath: request.audioPaths[index],
          durationSec: scene.durationSec,
          overlayTextFile,
          outputPath: clipPath,
          kind,
          fontPath: this.fontPath,
        }),
      );
      clipPaths.push(clipPath);
    }

    const listPath = path.join(workDir, "concat.txt");
    const joinedPath = path.join(workDir, "joined.mp4");
    fs.writeFileSync(listPath, concatListContent(clipPaths));
    await runFfmpeg(["-f", "concat", "-safe", "0", "-i", listPath, "-c", "copy", "-y", joinedPath]);

    fs.mkdirSync(path.dirname(request.outputPath), { recursive: true });
    if (request.bgmPath && fs.existsSync(request.bgmPath) && fs.statSync(request.bgmPath).size > 0) {
      const totalSec = await probeDuration(joinedPath);
      await runFfmpeg(bgmMixArgs(joinedPath, request.bgmPath, totalSec, this.volumeRatio, request.outputPath));
    } else {
      fs.renameSync(joinedPath, request.outputPath);
    }

    fs.rmSync(workDir, { recursive: true, force: true });
    console.log(`[compose] ${kind} ${request.lang}: ${scenes.length} scenes -> ${request.outputPath}`);
    return request.outputPath;
  }
}
