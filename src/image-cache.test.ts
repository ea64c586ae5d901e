import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ImageCacheIndex, jaccard, promptSimilarity, tokenize } from "./image-cache";

describe("tokenize", () => {
  it("lower-cases, strips punctuation and drops words of two characters or fewer", () => {
    expect(tokenize('A Red, bicycle (in) "the" park.')).toEqual(new Set(["red", "bicycle", "the", "park"]));
  });
});

describe("jaccard", () => {
  it("is 0 when either set is empty", () => {
    expect(jaccard(new Set(), new Set(["cat"]))).toBe(0);
    expect(jaccard(new Set(["cat"]), new Set())).toBe(0);
  });

  it("is intersection over union", () => {
    expect(promptSimilarity("red bicycle park", "red bicycle street")).toBe(0.5);
    expect(promptSimilarity("red bicycle park", "park bicycle red")).toBe(1);
  });
});

describe("ImageCacheIndex", () => {
  let dir: string;
  let indexPath: string;

  const image = (name: string, content = "png"): string => {
    const filePath = path.join(dir, name);
    fs.writeFileSync(filePath, content);
    return filePath;
  };

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "image-cache-"));
    indexPath = path.join(dir, "db", "image_cache.json");
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("finds prompts at or above the threshold", async () => {
    const cache = await ImageCacheIndex.open(indexPath);
    const artifact = image("a.png");
    await cache.save("red bicycle park", artifact);

    expect(cache.findSimilar("red bicycle street", { threshold: 0.5 })).toEqual([
      { similarity: 0.5, artifactPath: artifact, prompt: "red bicycle park" },
    ]);
    expect(cache.findSimilar("red bicycle street", { threshold: 0.6 })).toEqual([]);
    await cache.close();
  });

  it("orders matches by similarity and applies the limit", async () => {
    const cache = await ImageCacheIndex.open(indexPath);
    const weak = image("weak.png");
    const strong = image("strong.png");
    await cache.save("red bicycle street", weak);
    await cache.save("red bicycle park", strong);

    const matches = cache.findSimilar("red bicycle park", { threshold: 0.4 });
    expect(matches.map((m) => m.artifactPath)).toEqual([strong, weak]);
    expect(cache.findSimilar("red bicycle park", { threshold: 0.4, limit: 1 })).toHaveLength(1);
    await cache.close();
  });

  it("skips entries whose file is gone until they are swept", async () => {
    const cache = await ImageCacheIndex.open(indexPath);
    const artifact = image("gone.png");
    await cache.save("blue ocean waves", artifact);
    fs.unlinkSync(artifact);

    expect(cache.findSimilar("blue ocean waves", { threshold: 0.1 })).toEqual([]);
    expect(cache.list()).toHaveLength(1);
    expect(await cache.clearMissing()).toBe(1);
    expect(cache.list()).toHaveLength(0);
    await cache.close();
  });

  it("persists entries and continues numbering after reopening", async () => {
    const first = await ImageCacheIndex.open(indexPath);
    await first.save("  mountain sunrise  ", image("m.png"), { jobId: "job-1" });
    await first.close();

    const second = await ImageCacheIndex.open(indexPath);
    const [entry] = second.list();
    expect(entry.id).toBe(1);
    expect(entry.prompt).toBe("mountain sunrise");
    expect(entry.jobId).toBe("job-1");
    const next = await second.save("city night", image("c.png"));
    expect(next.id).toBe(2);
    await second.close();
  });

  it("keeps every entry when saves run concurrently", async () => {
    const cache = await ImageCacheIndex.open(indexPath);
    await Promise.all(Array.from({ length: 10 }, (_, i) => cache.save(`prompt number ${i}`, image(`${i}.png`))));
    await cache.close();

    const reopened = await ImageCacheIndex.open(indexPath);
    const ids = reopened.list().map((entry) => entry.id).sort((a, b) => a - b);
    expect(ids).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    await reopened.close();
  });

  it("moves an unreadable index aside and starts empty", async () => {
    fs.mkdirSync(path.dirname(indexPath), { recursive: true });
    fs.writeFileSync(indexPath, "not json");

    const cache = await ImageCacheIndex.open(indexPath);
    expect(cache.list()).toEqual([]);
    const backups = fs.readdirSync(path.dirname(indexPath)).filter((name) => name.startsWith("image_cache.json.corrupt-"));
    expect(backups).toHaveLength(1);
    await cache.close();
  });

  it("lists newest first and searches prompts case-insensitively", async () => {
    const cache = await ImageCacheIndex.open(indexPath);
    await cache.save("Solar panel roof", image("1.png"));
    await cache.save("wind turbine field", image("2.png"));
    await cache.save("solar farm desert", image("3.png"));

    expect(cache.list().map((e) => e.id)).toEqual([3, 2, 1]);
    expect(cache.list({ limit: 1, offset: 1 }).map((e) => e.id)).toEqual([2]);
    expect(cache.search("SOLAR").map((e) => e.id)).toEqual([3, 1]);
    await cache.close();
  });

  it("links, looks up and deletes entries by job", async () => {
    const cache = await ImageCacheIndex.open(indexPath);
    const a = await cache.save("first image", image("1.png"));
    const b = await cache.save("second image", image("2.png"));
    await cache.save("third image", image("3.png"), { jobId: "other" });

    await cache.linkToJob([a.id, b.id], "job-9");
    expect(cache.byJob("job-9").map((e) => e.id)).toEqual([1, 2]);
    expect(await cache.deleteByJob("job-9")).toBe(2);
    expect(cache.list().map((e) => e.id)).toEqual([3]);
    expect(await cache.clearAll()).toBe(1);
    await cache.close();
  });

  it("reports stats", async () => {
    const cache = await ImageCacheIndex.open(indexPath);
    await cache.save("same prompt here", image("1.png", "abc"));
    await cache.save("same prompt here", image("2.png", "abc"));
    expect(cache.stats()).toEqual({ totalCached: 2, uniquePrompts: 1, reusable: 1, diskBytes: 6 });
    await cache.close();
  });

  it("refuses use after close", async () => {
    const cache = await ImageCacheIndex.open(indexPath);
    await cache.close();
    expect(() => cache.list()).toThrow("is closed");
  });
});
