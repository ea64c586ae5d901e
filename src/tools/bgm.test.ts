import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { PixabayBgmSource, bgmCacheFileName, extractAudioUrl } from "./bgm";

describe("extractAudioUrl", () => {
  it("reads a top-level URL", () => {
    expect(extractAudioUrl({ audio: "https://cdn.example/a.mp3" })).toBe("https://cdn.example/a.mp3");
  });

  it("looks one level into nested objects", () => {
    expect(extractAudioUrl({ audio: { download_url: "https://cdn.example/n.mp3" } })).toBe("https://cdn.example/n.mp3");
  });

  it("skips values that are not http URLs", () => {
    expect(extractAudioUrl({ preview_url: "ftp://cdn.example/p.mp3", url: "https://cdn.example/u.mp3" })).toBe(
      "https://cdn.example/u.mp3",
    );
  });

  it("returns an empty string when there is no URL", () => {
    expect(extractAudioUrl({ title: "calm" })).toBe("");
  });
});

describe("bgmCacheFileName", () => {
  it("names the file by URL hash", () => {
    expect(bgmCacheFileName("https://cdn.example/music/calm.mp3")).toBe("bgm_35bdb8fede65443b.mp3");
  });
});

describe("PixabayBgmSource", () => {
  let cacheDir: string;

  beforeEach(() => {
    cacheDir = fs.mkdtempSync(path.join(os.tmpdir(), "bgm-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    fs.rmSync(cacheDir, { recursive: true, force: true });
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("retries with the first keyword and picks among the results", async () => {
    const fetchMock = vi.fn(async (url: string) => {
      const hits = url.includes("q=energetic+upbeat")
        ? []
        : [{ audio: "https://cdn.example/1.mp3" }, { audio: "https://cdn.example/2.mp3" }, { audio: "https://cdn.example/3.mp3" }];
      return new Response(JSON.stringify({ hits }));
    });
    vi.stubGlobal("fetch", fetchMock);

    const source = new PixabayBgmSource("test-key", () => 0.5);
    await expect(source.select("core")).resolves.toBe("https://cdn.example/2.mp3");
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(fetchMock.mock.calls[1][0]).toContain("q=energetic&");
  });

  it("returns no track without an API key", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);

    await expect(new PixabayBgmSource("").select("hook")).resolves.toBe("");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("downloads a track once and serves it from the cache", async () => {
    const url = "https://cdn.example/music/calm.mp3";
    const fetchMock = vi.fn(async () => new Response("mp3-bytes"));
    vi.stubGlobal("fetch", fetchMock);
    const source = new PixabayBgmSource("test-key");

    const first = await source.fetch(url, cacheDir);
    const second = await source.fetch(url, cacheDir);

    expect(first).toBe(path.join(cacheDir, "bgm_35bdb8fede65443b.mp3"));
    expect(second).toBe(first);
    expect(fs.readFileSync(first, "utf-8")).toBe("mp3-bytes");
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});
