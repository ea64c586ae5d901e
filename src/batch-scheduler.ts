import type { CostLedger } from "./cost-ledger";
import type { ImageCacheIndex, SimilarImage } from "./image-cache";
import { applyStyleAnchor } from "./tools/style-anchor";
import type { ImageEngine } from "./types";
import { WorkerPool } from "./worker-pool";

export const DEFAULT_BATCH_SIZE = 10;
// Remote engine rate limit sits around five images a minute.
export const DEFAULT_MAX_WORKERS = 5;

export interface ImageRequest {
  sceneId: number;
  prompt: string;
}

export interface ReuseQuestion {
  sceneId: number;
  prompt: string;
  match: SimilarImage;
}

/** Approves (true) or rejects (false) substituting a cached image. */
export type ReuseDecision = (question: ReuseQuestion) => Promise<boolean>;

export type BatchProgress = (completed: number, total: number) => void;

export interface GenerateAllOptions {
  outputDir: string;
  engine: ImageEngine;
  cache: ImageCacheIndex;
  similarityThreshold: number;
  ledger: CostLedger;
  reuseDecision?: ReuseDecision;
  onProgress?: BatchProgress;
  batchSize?: number;
  maxWorkers?: number;
  styleAnchor?: string;
  jobId?: string;
  verbose?: boolean;
}

export interface BatchResult {
  paths: Map<number, string>;   // only scenes that succeeded
  reused: number[];
}

type ItemOutcome = { path: string; reused: boolean };

export function partition<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Batch size must be a positive integer, got ${size}`);
  }
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

/**
 * Generates an image per request, batch by batch. Remote engines run each
 * batch on its own bounded worker pool; local engines run one item at a time.
 * Failed items are logged and left out of the result.
 */
export async function generateAll(requests: ImageRequest[], options: GenerateAllOptions): Promise<BatchResult> {
  const {
    engine,
    batchSize = DEFAULT_BATCH_SIZE,
    maxWorkers = DEFAULT_MAX_WORKERS,
    onProgress,
  } = options;

  const result: BatchResult = { paths: new Map(), reused: [] };
  const total = requests.length;
  const batches = partition(requests, batchSize);
  let completed = 0;

  console.log(`[batch] Generating ${total} images in ${batches.length} batches (engine=${engine.name}, mode=${engine.mode})`);

  for (const [batchIndex, batch] of batches.entries()) {
    console.log(`[batch] Batch ${batchIndex + 1}/${batches.length} (${batch.length} items)`);

    const outcomes =
      engine.mode === "remote-parallel"
        ? await processParallel(batch, Math.min(maxWorkers, batch.length), options)
        : await processSequential(batch, options);

    for (const [sceneId, outcome] of outcomes) {
      result.paths.set(sceneId, outcome.path);
      if (outcome.reused) result.reused.push(sceneId);
    }

    completed += batch.length;
    onProgress?.(completed, total);
  }

  console.log(`[batch] Done: ${result.paths.size}/${total} succeeded, ${result.reused.length} reused`);
  return result;
}

async function processParallel(
  batch: ImageRequest[],
  workers: number,
  options: GenerateAllOptions,
): Promise<Map<number, ItemOutcome>> {
  const outcomes = new Map<number, ItemOutcome>();
  const pool = new WorkerPool(workers);
  try {
    await pool.run(
      batch.map((request) => () => generateOne(request, options)),
      (settled) => {
        const sceneId = batch[settled.index].sceneId;
        if (settled.status === "rejected") {
          console.error(`[batch] Scene ${sceneId} failed:`, errorMessage(settled.reason));
        } else if (settled.value === null) {
          console.warn(`[batch] Scene ${sceneId} produced no image`);
        } else {
          outcomes.set(sceneId, settled.value);
        }
      },
    );
  } finally {
    pool.shutdown();
  }
  return outcomes;
}

async function processSequential(
  batch: ImageRequest[],
  options: GenerateAllOptions,
): Promise<Map<number, ItemOutcome>> {
  const outcomes = new Map<number, ItemOutcome>();
  for (const request of batch) {
    try {
      const outcome = await generateOne(request, options);
      if (outcome === null) {
        console.warn(`[batch] Scene ${request.sceneId} produced no image`);
      } else {
        outcomes.set(request.sceneId, outcome);
      }
    } catch (error) {
      console.error(`[batch] Scene ${request.sceneId} failed:`, errorMessage(error));
    }
  }
  return outcomes;
}

async function generateOne(request: ImageRequest, options: GenerateAllOptions): Promise<ItemOutcome | null> {
  const { engine, cache, ledger, reuseDecision, outputDir, similarityThreshold, styleAnchor, jobId, verbose } = options;
  const prompt = styleAnchor ? applyStyleAnchor(request.prompt, styleAnchor) : request.prompt;

  const similar = cache.findSimilar(prompt, { threshold: similarityThreshold });
  if (similar.length > 0 && reuseDecision) {
    const best = similar[0];
    console.log(`[batch] Scene ${request.sceneId}: cached image at ${(best.similarity * 100).toFixed(1)}% similarity`);
    if (await reuseDecision({ sceneId: request.sceneId, prompt, match: best })) {
      console.log(`[batch] Scene ${request.sceneId}: reusing ${best.artifactPath}`);
      return { path: best.artifactPath, reused: true };
    }
  }

  const path = await engine.generate(prompt, request.sceneId, outputDir, ledger);
  if (path === null) {
    return null;
  }

  try {
    await cache.save(prompt, path, { jobId });
  } catch (error) {
    console.warn(`[batch] Scene ${request.sceneId}: could not register image in cache:`, errorMessage(error));
  }
  if (verbose) {
    console.log(`[batch] Scene ${request.sceneId}: ${path}`);
  }
  return { path, reused: false };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
