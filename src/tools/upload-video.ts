import * as fs from "fs";
import { z } from "zod";

import type { AppConfig } from "../config";
import { ConfigError } from "../errors";
import type { Lang, PipelineState, Uploader, VideoMetadata } from "../types";

const UPLOAD_URL = "https://www.googleapis.com/upload/youtube/v3/videos";
const THUMBNAIL_URL = "https://www.googleapis.com/upload/youtube/v3/thumbnails/set";
const RETRY_STATUSES = new Set([500, 502, 503, 504]);
const MAX_RETRIES = 5;

const MAX_TITLE_LENGTH = 100;
const MAX_TAGS = 15;
const DESCRIPTION_NARRATIONS = 3;

const uploadResponseSchema = z.object({ id: z.string().min(1) });

function truncate(text: string, max: number): string {
  return text.length <= max ? text : text.slice(0, max - 1).trimEnd() + "…";
}

/** Distinct words of two or more characters, in order of appearance. */
export function tagsFromTitle(title: string): string[] {
  const words = title
    .replace(/[^\p{L}\p{N}\s]/gu, " ")
    .split(/\s+/)
    .filter((word) => word.length >= 2);
  return [...new Set(words)];
}

/**
 * YouTube metadata for one of the four videos. Shorts get "#Shorts" in the
 * title and description; the description opens with the first narration
 * lines and ends with the source article.
 */
export function buildMetadata(
  state: PipelineState,
  lang: Lang,
  isShorts: boolean,
  youtube: Pick<AppConfig["youtube"], "privacy" | "categoryId">,
): VideoMetadata {
  const baseTitle = (lang === "ko" ? state.titleKo : state.titleEn) ?? "";
  const scenes = (lang === "ko" ? state.scenarioKo : state.scenarioEn) ?? [];
  const suffix = isShorts ? " #Shorts" : "";
  const title = truncate(baseTitle, MAX_TITLE_LENGTH - suffix.length) + suffix;

  const lines = scenes
    .slice(0, DESCRIPTION_NARRATIONS)
    .map((scene) => scene.narration.trim())
    .filter(Boolean);
  const sourceLabel = lang === "ko" ? "원문" : "Source";
  const description = [
    baseTitle,
    lines.join("\n"),
    `${sourceLabel}: ${state.url}`,
    isShorts ? "#Shorts" : "",
  ]
    .filter(Boolean)
    .join("\n\n");

  const tags = [...(isShorts ? ["Shorts"] : []), ...tagsFromTitle(baseTitle)].slice(0, MAX_TAGS);

  return {
    title,
    description,
    tags,
    categoryId: youtube.categoryId,
    privacyStatus: youtube.privacy,
  };
}

/**
 * YouTube Data API v3 uploads through the resumable protocol, one OAuth
 * access token per language channel. Server errors retry with exponential
 * backoff. A failed thumbnail upload does not fail the video.
 */
export class YouTubeUploader implements Uploader {
  constructor(
    private readonly accessTokens: Record<Lang, string>,
    private readonly sleep: (ms: number) => Promise<void> = (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
  ) {}

  async upload(videoPath: string, thumbnailPath: string | null, metadata: VideoMetadata, lang: Lang): Promise<string> {
    const token = this.accessTokens[lang];
    if (!token) {
      throw new ConfigError(`No YouTube access token for the ${lang} channel (YOUTUBE_${lang.toUpperCase()}_ACCESS_TOKEN)`);
    }
    if (!fs.existsSync(videoPath)) {
      throw new Error(`Video file not found: ${videoPath}`);
    }

    const videoId = await this.uploadVideo(videoPath, metadata, token);
    if (thumbnailPath && fs.existsSync(thumbnailPath)) {
      await this.setThumbnail(videoId, thumbnailPath, token);
    } else {
      console.warn(`[upload] ${lang}: no thumbnail for ${videoId}`);
    }
    return videoId;
  }

  private async uploadVideo(videoPath: string, metadata: VideoMetadata, token: string): Promise<string> {
    const video = fs.readFileSync(videoPath);
    const body = {
      snippet: {
        title: metadata.title,
        description: metadata.description,
        tags: metadata.tags,
        categoryId: metadata.categoryId,
      },
      status: { privacyStatus: metadata.privacyStatus, selfDeclaredMadeForKids: false },
    };

    for (let attempt = 0; ; attempt++) {
      const session = await fetch(`${UPLOAD_URL}?uploadType=resumable&part=snippet,status`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${token}`,
          "Content-Type": "application/json; charset=UTF-8",
          "X-Upload-Content-Type": "video/mp4",
          "X-Upload-Content-Length": String(video.length),
        },
        body: JSON.stringify(body),
      });
      const location = session.headers.get("location");
      if (session.ok && location) {
        const response = await fetch(location, {
          method: "PUT",
          headers: { Authorization: `Bearer ${token}`, "Content-Type": "video/mp4" },
          body: video,
        });
        if (response.ok) {
          return uploadResponseSchema.parse(await response.json()).id;
        }
        if (!RETRY_STATUSES.has(response.status) || attempt >= MAX_RETRIES) {
          throw new Error(`YouTube upload failed: ${response.status} ${await response.text()}`);
        }
      } else if (!RETRY_STATUSES.has(session.status) || attempt >= MAX_RETRIES) {
        throw new Error(`YouTube upload session failed: ${session.status} ${await session.text()}`);
      }

      const waitMs = 1000 * 2 ** (attempt + 1);
      console.warn(`[upload] Server error, retrying in ${waitMs / 1000}s (${attempt + 1}/${MAX_RETRIES})`);
      await this.sleep(waitMs);
    }
  }

  private async setThumbnail(videoId: string, thumbnailPath: string, token: string): Promise<void> {
    try {
      const response = await fetch(`${THUMBNAIL_URL}?videoId=${encodeURIComponent(videoId)}`, {
        method: "POST",
        headers: { Authorization: `Bearer ${token}`, "Content-Type": "image/jpeg" },
        body: fs.readFileSync(thumbnailPath),
      });
      if (!response.ok) {
        throw new Error(`${response.status} ${await response.text()}`);
      }
    } catch (error) {
      console.warn(`[upload] Thumbnail for ${videoId} not set:`, error instanceof Error ? error.message : error);
    }
  }
}
