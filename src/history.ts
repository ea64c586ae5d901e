import { z } from "zod";
import * as fs from "fs";
import * as path from "path";

import { KRW_PER_USD, type CostCategory } from "./cost-ledger";

const uploadStatusSchema = z.enum(["not_uploaded", "partial", "uploaded"]);

const recordSchema = z.object({
  id: z.number().int().positive(),
  jobId: z.string(),
  url: z.string(),
  titleKo: z.string(),
  titleEn: z.string(),
  pageLang: z.string(),
  sceneCount: z.number().int().nonnegative(),
  imageCount: z.number().int().nonnegative(),
  reusedImages: z.number().int().nonnegative(),
  costUsd: z.number().nonnegative(),
  costBreakdown: z.record(z.string(), z.number()),
  outputDir: z.string(),
  uploadStatus: uploadStatusSchema,
  videoIds: z.record(z.string(), z.string()),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const historyFileSchema = z.object({
  nextId: z.number().int().positive(),
  records: z.array(recordSchema),
});

export type UploadStatus = z.infer<typeof uploadStatusSchema>;
export type HistoryRecord = z.infer<typeof recordSchema>;

export type NewHistoryRecord = Omit<HistoryRecord, "id" | "uploadStatus" | "videoIds" | "createdAt" | "updatedAt" | "costBreakdown"> & {
  costBreakdown: Record<CostCategory, number>;
};

export interface MonthlyCost {
  year: number;
  month: number;
  totalCostUsd: number;
  videoCount: number;
  avgCostUsd: number;
  imageCount: number;
  reusedImages: number;
}

export interface ReuseSavings {
  totalImages: number;
  reusedImages: number;
  /** Percentage, one decimal place. */
  reuseRate: number;
  savedUsd: number;
  savedKrw: number;
}

const round = (value: number, digits: number) => Math.round(value * 10 ** digits) / 10 ** digits;

/**
 * Completed-job history, one JSON file. Written synchronously; the pipeline
 * touches it from a single stage at a time.
 */
export class HistoryStore {
  private constructor(
    readonly filePath: string,
    private records: HistoryRecord[],
    private nextId: number,
  ) {}

  static open(filePath: string): HistoryStore {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    if (!fs.existsSync(filePath)) {
      return new HistoryStore(filePath, [], 1);
    }
    const parsed = historyFileSchema.safeParse(JSON.parse(fs.readFileSync(filePath, "utf-8")));
    if (!parsed.success) {
      throw new Error(`History file ${filePath} is malformed: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    return new HistoryStore(filePath, parsed.data.records, parsed.data.nextId);
  }

  add(input: NewHistoryRecord): HistoryRecord {
    const now = new Date().toISOString();
    const record: HistoryRecord = {
      ...input,
      id: this.nextId++,
      uploadStatus: "not_uploaded",
      videoIds: {},
      createdAt: now,
      updatedAt: now,
    };
    this.records.push(record);
    this.write();
    console.log(`[history] Added record ${record.id}: ${record.titleKo}`);
    return record;
  }

  get(id: number): HistoryRecord | null {
    return this.records.find((record) => record.id === id) ?? null;
  }

  /** Newest first. */
  list(limit = 100, offset = 0): HistoryRecord[] {
    return [...this.records].reverse().slice(offset, offset + limit);
  }

  search(keyword: string, limit = 50): HistoryRecord[] {
    const needle = keyword.toLowerCase();
    return this.list(Number.MAX_SAFE_INTEGER)
      .filter((r) => [r.titleKo, r.titleEn, r.url].some((field) => field.toLowerCase().includes(needle)))
      .slice(0, limit);
  }

  /** Spend per calendar month (UTC, by creation time) of the given year; months without jobs are omitted. */
  monthlySummary(year = new Date().getUTCFullYear()): MonthlyCost[] {
    const months = new Map<number, HistoryRecord[]>();
    for (const record of this.records) {
      const created = new Date(record.createdAt);
      if (created.getUTCFullYear() !== year) continue;
      const month = created.getUTCMonth() + 1;
      months.set(month, [...(months.get(month) ?? []), record]);
    }

    return [...months.entries()]
      .sort(([a], [b]) => a - b)
      .map(([month, records]) => {
        const total = records.reduce((sum, r) => sum + r.costUsd, 0);
        return {
          year,
          month,
          totalCostUsd: round(total, 4),
          videoCount: records.length,
          avgCostUsd: round(total / records.length, 4),
          imageCount: records.reduce((sum, r) => sum + r.imageCount, 0),
          reusedImages: records.reduce((sum, r) => sum + r.reusedImages, 0),
        };
      });
  }

  /** What cache reuse saved over every recorded job, at imagePerItem USD per image. */
  reuseSavings(imagePerItem: number): ReuseSavings {
    const totalImages = this.records.reduce((sum, r) => sum + r.imageCount, 0);
    const reusedImages = this.records.reduce((sum, r) => sum + r.reusedImages, 0);
    const saved = reusedImages * imagePerItem;
    return {
      totalImages,
      reusedImages,
      reuseRate: totalImages > 0 ? round((reusedImages / totalImages) * 100, 1) : 0,
      savedUsd: round(saved, 4),
      savedKrw: Math.floor(saved * KRW_PER_USD),
    };
  }

  updateUploadStatus(id: number, status: UploadStatus, videoIds?: Record<string, string>): void {
    const record = this.require(id);
    record.uploadStatus = status;
    if (videoIds) {
      record.videoIds = { ...videoIds };
    }
    record.updatedAt = new Date().toISOString();
    this.write();
    console.log(`[history] Record ${id} upload status -> ${status}`);
  }

  delete(id: number): boolean {
    const before = this.records.length;
    this.records = this.records.filter((record) => record.id !== id);
    if (this.records.length === before) return false;
    this.write();
    return true;
  }

  private require(id: number): HistoryRecord {
    const record = this.get(id);
    if (!record) {
      throw new Error(`History record ${id} not found`);
    }
    return record;
  }

  private write(): void {
    const tmpPath = `${this.filePath}.tmp`;
    fs.writeFileSync(tmpPath, JSON.stringify({ nextId: this.nextId, records: this.records }, null, 2), "utf-8");
    fs.renameSync(tmpPath, this.filePath);
  }
}
