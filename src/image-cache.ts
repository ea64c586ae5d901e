import { z } from "zod";
import * as fs from "fs";
import * as path from "path";

const STRIPPED_CHARS = /[.,;:()[\]"']/g;

/**
 * Lower-cased word set of a prompt. Punctuation is stripped before splitting
 * and words of two characters or fewer are dropped.
 */
export function tokenize(text: string): Set<string> {
  const words = text.replace(STRIPPED_CHARS, "").split(/\s+/);
  const tokens = new Set<string>();
  for (const word of words) {
    if (word.length > 2) {
      tokens.add(word.toLowerCase());
    }
  }
  return tokens;
}

/** Jaccard index of two token sets; 0 when either is empty. */
export function jaccard(a: Set<string>, b: Set<string>): number {
  if (a.size === 0 || b.size === 0) {
    return 0;
  }
  let intersection = 0;
  for (const token of a) {
    if (b.has(token)) intersection++;
  }
  return intersection / (a.size + b.size - intersection);
}

export function promptSimilarity(a: string, b: string): number {
  return jaccard(tokenize(a), tokenize(b));
}

const entrySchema = z.object({
  id: z.number().int().positive(),
  prompt: z.string(),
  artifactPath: z.string(),
  createdAt: z.string(),
  jobId: z.string().nullable(),
});

const storeSchema = z.object({
  version: z.literal(1),
  nextId: z.number().int().positive(),
  entries: z.array(entrySchema),
});

export type CacheEntry = z.infer<typeof entrySchema>;

export interface SimilarImage {
  similarity: number;
  artifactPath: string;
  prompt: string;
}

export interface CacheStats {
  totalCached: number;
  uniquePrompts: number;
  reusable: number;
  diskBytes: number;
}

/**
 * Append-only log of generated images, persisted as a JSON file.
 *
 * Every generation is a new entry, even for a prompt seen before. Entries whose
 * file has disappeared stay in the log and are skipped by findSimilar() until
 * clearMissing() sweeps them. Mutations are applied in memory first and the
 * file writes are chained, so concurrent callers never interleave writes.
 */
export class ImageCacheIndex {
  private entries: CacheEntry[];
  private nextId: number;
  private writeChain: Promise<void> = Promise.resolve();
  private closed = false;

  private constructor(readonly filePath: string, entries: CacheEntry[], nextId: number) {
    this.entries = entries;
    this.nextId = nextId;
  }

  static async open(filePath: string): Promise<ImageCacheIndex> {
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    if (!fs.existsSync(filePath)) {
      return new ImageCacheIndex(filePath, [], 1);
    }

    try {
      const content = await fs.promises.readFile(filePath, "utf-8");
      const parsed = storeSchema.parse(JSON.parse(content));
      return new ImageCacheIndex(filePath, parsed.entries, parsed.nextId);
    } catch (error) {
      const backup = `${filePath}.corrupt-${Date.now()}`;
      console.warn(`[image-cache] Unreadable index ${filePath}, moved to ${backup}:`, error instanceof Error ? error.message : error);
      await fs.promises.rename(filePath, backup);
      return new ImageCacheIndex(filePath, [], 1);
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    await this.flush();
    this.closed = true;
  }

  /** Resolves once every write queued so far has reached disk. */
  flush(): Promise<void> {
    return this.writeChain;
  }

  async save(prompt: string, artifactPath: string, options: { jobId?: string } = {}): Promise<CacheEntry> {
    this.assertOpen();
    const entry: CacheEntry = {
      id: this.nextId++,
      prompt: prompt.trim(),
      artifactPath,
      createdAt: new Date().toISOString(),
      jobId: options.jobId ?? null,
    };
    this.entries.push(entry);
    await this.persist();
    return entry;
  }

  findSimilar(prompt: string, options: { threshold: number; limit?: number }): SimilarImage[] {
    this.assertOpen();
    const { threshold, limit = 5 } = options;
    const queryTokens = tokenize(prompt);

    const matches: SimilarImage[] = [];
    for (const entry of this.entries) {
      if (!fs.existsSync(entry.artifactPath)) {
        continue;
      }
      const similarity = jaccard(queryTokens, tokenize(entry.prompt));
      if (similarity >= threshold) {
        matches.push({ similarity, artifactPath: entry.artifactPath, prompt: entry.prompt });
      }
    }

    // Array.prototype.sort is stable, so equal scores keep insertion order.
    matches.sort((a, b) => b.similarity - a.similarity);
    const top = matches.slice(0, limit);
    if (top.length > 0) {
      console.log(`[image-cache] ${top.length} similar image(s), best ${(top[0].similarity * 100).toFixed(1)}%`);
    }
    return top;
  }

  async clearMissing(): Promise<number> {
    this.assertOpen();
    const before = this.entries.length;
    this.entries = this.entries.filter((entry) => fs.existsSync(entry.artifactPath));
    const removed = before - this.entries.length;
    if (removed > 0) {
      await this.persist();
      console.log(`[image-cache] Removed ${removed} entries with missing files`);
    }
    return removed;
  }

  // -------------------------------------------------------------------------
  // Management
  // -------------------------------------------------------------------------

  list(options: { limit?: number; offset?: number } = {}): CacheEntry[] {
    this.assertOpen();
    const { limit = 200, offset = 0 } = options;
    return [...this.entries].reverse().slice(offset, offset + limit);
  }

  search(keyword: string, limit = 50): CacheEntry[] {
    this.assertOpen();
    const needle = keyword.toLowerCase();
    return [...this.entries]
      .reverse()
      .filter((entry) => entry.prompt.toLowerCase().includes(needle))
      .slice(0, limit);
  }

  byJob(jobId: string): CacheEntry[] {
    this.assertOpen();
    return this.entries.filter((entry) => entry.jobId === jobId);
  }

  async linkToJob(ids: number[], jobId: string): Promise<void> {
    this.assertOpen();
    if (ids.length === 0) return;
    const wanted = new Set(ids);
    for (const entry of this.entries) {
      if (wanted.has(entry.id)) {
        entry.jobId = jobId;
      }
    }
    await this.persist();
  }

  stats(): CacheStats {
    this.assertOpen();
    const uniquePrompts = new Set(this.entries.map((entry) => entry.prompt)).size;
    let diskBytes = 0;
    for (const entry of this.entries) {
      if (fs.existsSync(entry.artifactPath)) {
        diskBytes += fs.statSync(entry.artifactPath).size;
      }
    }
    return {
      totalCached: this.entries.length,
      uniquePrompts,
      reusable: Math.max(0, this.entries.length - uniquePrompts),
      diskBytes,
    };
  }

  /** Drops entries linked to a job. Image files are left on disk. */
  async deleteByJob(jobId: string): Promise<number> {
    this.assertOpen();
    const before = this.entries.length;
    this.entries = this.entries.filter((entry) => entry.jobId !== jobId);
    const removed = before - this.entries.length;
    if (removed > 0) await this.persist();
    return removed;
  }

  /** Empties the index. Image files are left on disk. */
  async clearAll(): Promise<number> {
    this.assertOpen();
    const removed = this.entries.length;
    this.entries = [];
    await this.persist();
    return removed;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error(`Image cache index ${this.filePath} is closed`);
    }
  }

  private persist(): Promise<void> {
    const write = async (): Promise<void> => {
      const snapshot = JSON.stringify({ version: 1, nextId: this.nextId, entries: this.entries }, null, 2);
      const tmpPath = `${this.filePath}.tmp`;
      await fs.promises.writeFile(tmpPath, snapshot, "utf-8");
      await fs.promises.rename(tmpPath, this.filePath);
    };
    const next = this.writeChain.then(write);
    this.writeChain = next.catch((error: unknown) => {
      console.error(`[image-cache] Failed to write ${this.filePath}:`, error instanceof Error ? error.message : error);
    });
    return next;
  }
}
