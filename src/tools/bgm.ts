import { createHash } from "crypto";
import * as fs from "fs";
import * as path from "path";
import { z } from "zod";

import type { BgmSource, NarrativeStage } from "../types";
import { runFfmpeg } from "./ffmpeg";

const PIXABAY_MUSIC_API = "https://pixabay.com/api/music/";
const REQUEST_TIMEOUT_MS = 20_000;
const DOWNLOAD_TIMEOUT_MS = 60_000;
const TOP_CANDIDATES = 5;
export const SILENT_BGM_SEC = 330;

export const STAGE_KEYWORDS: Record<NarrativeStage, string> = {
  hook: "dramatic intense",
  problem: "dramatic intense",
  core: "energetic upbeat",
  twist: "dramatic intense",
  cta: "motivational",
};

const searchResponseSchema = z.object({
  hits: z.array(z.record(z.string(), z.unknown())).default([]),
});

type Track = Record<string, unknown>;

const URL_KEYS = ["audio", "preview_url", "download_url", "url"];
const NESTED_URL_KEYS = ["url", "download_url", "preview_url"];

function isHttpUrl(value: unknown): value is string {
  return typeof value === "string" && value.startsWith("http");
}

/** The first http(s) audio URL in a track, looking one level into nested objects. */
export function extractAudioUrl(track: Track): string {
  for (const key of URL_KEYS) {
    const value = track[key];
    if (isHttpUrl(value)) {
      return value;
    }
    if (typeof value === "object" && value !== null) {
      for (const nestedKey of NESTED_URL_KEYS) {
        const nested: unknown = Reflect.get(value, nestedKey);
        if (isHttpUrl(nested)) {
          return nested;
        }
      }
    }
  }
  return "";
}

export function bgmCacheFileName(url: string): string {
  return `bgm_${createHash("md5").update(url).digest("hex").slice(0, 16)}.mp3`;
}

/**
 * Background music from Pixabay's music search, keyed by the scenario's
 * dominant narrative stage. Without an API key, or when nothing can be
 * found or downloaded, a silent track stands in.
 */
export class PixabayBgmSource implements BgmSource {
  constructor(
    private readonly apiKey: string,
    private readonly random: () => number = Math.random,
  ) {}

  async select(stage: NarrativeStage): Promise<string> {
    const keyword = STAGE_KEYWORDS[stage];
    let tracks = await this.search(keyword);
    if (tracks.length === 0) {
      const fallback = keyword.split(" ")[0];
      console.warn(`[bgm] No tracks for "${keyword}", retrying with "${fallback}"`);
      tracks = await this.search(fallback);
    }

    const urls = tracks.map(extractAudioUrl).filter(Boolean).slice(0, TOP_CANDIDATES);
    if (urls.length === 0) {
      console.warn(`[bgm] No usable track for stage "${stage}"`);
      return "";
    }
    return urls[Math.floor(this.random() * urls.length)];
  }

  async fetch(url: string, cacheDir: string): Promise<string> {
    fs.mkdirSync(cacheDir, { recursive: true });
    if (!url) {
      return this.silentTrack(cacheDir);
    }

    const cachePath = path.join(cacheDir, bgmCacheFileName(url));
    if (fs.existsSync(cachePath) && fs.statSync(cachePath).size > 0) {
      return cachePath;
    }

    try {
      const response = await fetch(url, { signal: AbortSignal.timeout(DOWNLOAD_TIMEOUT_MS) });
      if (!response.ok) {
        throw new Error(`${response.status} ${response.statusText}`);
      }
      fs.writeFileSync(cachePath, Buffer.from(await response.arrayBuffer()));
      console.log(`[bgm] Downloaded ${path.basename(cachePath)}`);
      return cachePath;
    } catch (error) {
      console.error(`[bgm] Download failed, using silence:`, error instanceof Error ? error.message : error);
      return this.silentTrack(cacheDir);
    }
  }

  private async search(keyword: string): Promise<Track[]> {
    if (!this.apiKey) {
      console.warn("[bgm] PIXABAY_API_KEY is not set, skipping music search");
      return [];
    }

    const params = new URLSearchParams({ key: this.apiKey, q: keyword, per_page: "10" });
    try {
      const response = await fetch(`${PIXABAY_MUSIC_API}?${params.toString()}`, {
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });
      if (!response.ok) {
        throw new Error(`${response.status} ${response.statusText}`);
      }
      return searchResponseSchema.parse(await response.json()).hits;
    } catch (error) {
      console.error(`[bgm] Search "${keyword}" failed:`, error instanceof Error ? error.message : error);
      return [];
    }
  }

  private async silentTrack(cacheDir: string): Promise<string> {
    const silentPath = path.join(cacheDir, "silent_bgm.mp3");
    if (!fs.existsSync(silentPath) || fs.statSync(silentPath).size === 0) {
      await runFfmpeg([
        "-f", "lavfi",
        "-i", "anullsrc=r=44100:cl=stereo",
        "-t", String(SILENT_BGM_SEC),
        "-q:a", "9",
        "-y", silentPath,
      ]);
    }
    return silentPath;
  }
}
