import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { HistoryStore, type NewHistoryRecord } from "./history";

function record(overrides: Partial<NewHistoryRecord> = {}): NewHistoryRecord {
  return {
    jobId: "abc123def456",
    url: "https://example.com/a",
    titleKo: "전기차 배터리",
    titleEn: "EV batteries",
    pageLang: "ko",
    sceneCount: 80,
    imageCount: 78,
    reusedImages: 3,
    costUsd: 1.25,
    costBreakdown: { text: 0.25, image: 0.75, speech: 0.25 },
    outputDir: "/tmp/out",
    ...overrides,
  };
}

describe("HistoryStore", () => {
  let dir: string;
  let filePath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "history-"));
    filePath = path.join(dir, "history.json");
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("adds records with ids and a not-uploaded status", () => {
    const history = HistoryStore.open(filePath);
    const added = history.add(record());
    expect(added.id).toBe(1);
    expect(added.uploadStatus).toBe("not_uploaded");
    expect(added.videoIds).toEqual({});
    expect(history.get(1)).toEqual(added);
    expect(history.get(2)).toBeNull();
  });

  it("persists across reopen", () => {
    HistoryStore.open(filePath).add(record());
    const reopened = HistoryStore.open(filePath);
    expect(reopened.list()).toHaveLength(1);
    expect(reopened.add(record({ url: "https://example.com/b" })).id).toBe(2);
  });

  it("lists newest first and searches titles and URLs", () => {
    const history = HistoryStore.open(filePath);
    history.add(record({ titleEn: "Solar power" }));
    history.add(record({ titleEn: "Wind power", url: "https://example.com/wind" }));
    expect(history.list().map((r) => r.id)).toEqual([2, 1]);
    expect(history.search("WIND").map((r) => r.id)).toEqual([2]);
    expect(history.search("power").map((r) => r.id)).toEqual([2, 1]);
  });

  it("updates the upload status and video ids", () => {
    const history = HistoryStore.open(filePath);
    history.add(record());
    history.updateUploadStatus(1, "uploaded", { landscape_ko: "vid-1" });
    const updated = HistoryStore.open(filePath).get(1);
    expect(updated?.uploadStatus).toBe("uploaded");
    expect(updated?.videoIds).toEqual({ landscape_ko: "vid-1" });
  });

  it("throws when updating an unknown record", () => {
    expect(() => HistoryStore.open(filePath).updateUploadStatus(7, "uploaded")).toThrow("History record 7 not found");
  });

  it("deletes records", () => {
    const history = HistoryStore.open(filePath);
    history.add(record());
    expect(history.delete(1)).toBe(true);
    expect(history.delete(1)).toBe(false);
    expect(history.list()).toEqual([]);
  });

  describe("cost report", () => {
    function seed(history: HistoryStore): void {
      const jobs: Array<[string, Partial<NewHistoryRecord>]> = [
        ["2025-12-20T09:00:00Z", { costUsd: 9, imageCount: 20, reusedImages: 2 }],
        ["2026-01-10T09:00:00Z", { costUsd: 1.25, imageCount: 78, reusedImages: 3 }],
        ["2026-01-25T09:00:00Z", { costUsd: 2.5, imageCount: 40, reusedImages: 5 }],
        ["2026-03-02T09:00:00Z", { costUsd: 0.5, imageCount: 10, reusedImages: 0 }],
      ];
      for (const [createdAt, overrides] of jobs) {
        vi.setSystemTime(new Date(createdAt));
        history.add(record(overrides));
      }
    }

    beforeEach(() => {
      vi.useFakeTimers({ toFake: ["Date"] });
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("sums cost per month of the requested year", () => {
      const history = HistoryStore.open(filePath);
      seed(history);
      expect(history.monthlySummary(2026)).toEqual([
        { year: 2026, month: 1, totalCostUsd: 3.75, videoCount: 2, avgCostUsd: 1.875, imageCount: 118, reusedImages: 8 },
        { year: 2026, month: 3, totalCostUsd: 0.5, videoCount: 1, avgCostUsd: 0.5, imageCount: 10, reusedImages: 0 },
      ]);
      expect(history.monthlySummary(2024)).toEqual([]);
    });

    it("defaults to the current year", () => {
      const history = HistoryStore.open(filePath);
      seed(history);
      vi.setSystemTime(new Date("2025-06-01T00:00:00Z"));
      expect(history.monthlySummary().map((m) => [m.month, m.totalCostUsd])).toEqual([[12, 9]]);
    });

    it("prices reused images as savings", () => {
      const history = HistoryStore.open(filePath);
      seed(history);
      expect(history.reuseSavings(0.25)).toEqual({
        totalImages: 148,
        reusedImages: 10,
        reuseRate: 6.8,
        savedUsd: 2.5,
        savedKrw: 3450,
      });
    });

    it("reports no savings for an empty history", () => {
      expect(HistoryStore.open(filePath).reuseSavings(0.25)).toEqual({
        totalImages: 0,
        reusedImages: 0,
        reuseRate: 0,
        savedUsd: 0,
        savedKrw: 0,
      });
    });
  });

  it("refuses a malformed file", () => {
    fs.writeFileSync(filePath, JSON.stringify({ nextId: 0, records: [] }));
    expect(() => HistoryStore.open(filePath)).toThrow("is malformed");
  });
});
