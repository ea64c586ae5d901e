#!/usr/bin/env node
import "dotenv/config";
import { Command, InvalidArgumentError } from "commander";
import * as readline from "readline";

import { CheckpointStore } from "./checkpoint";
import { loadConfig } from "./config";
import { createDefaultDeps } from "./engines";
import { PipelineAbortedError, StageFailedError } from "./errors";
import { HistoryStore } from "./history";
import { ImageCacheIndex } from "./image-cache";
import { STEP_LABELS, STEP_ORDER, TOTAL_STEPS, runPipeline } from "./orchestrator";
import { describeConfirmRequest, formatProgress } from "./progress";
import { clearStopRequest, requestStop, stopRequested } from "./signals";
import { createTerminalConfirmChannel } from "./terminal-confirm";

interface RunCommandOptions {
  focus: string;
  step?: number;
  reuseCached: boolean;
  verbose: boolean;
}

function parseStep(value: string): number {
  const step = Number(value);
  if (!Number.isInteger(step) || step < 1 || step > TOTAL_STEPS) {
    throw new InvalidArgumentError(`must be an integer from 1 to ${TOTAL_STEPS}`);
  }
  return step;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("must be a positive integer");
  }
  return n;
}

function fail(error: unknown): never {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
}

const program = new Command();

program
  .name("article2shorts")
  .description("Turn a web article into narrated Korean and English YouTube videos and Shorts")
  .version("0.1.0");

program
  .command("run")
  .description("Run the pipeline for an article, resuming from its checkpoint")
  .argument("<url>", "Article URL")
  .option("--focus <keywords>", "Keywords to emphasise in the scenario", "")
  .option("--step <n>", `Start at step n (1-${TOTAL_STEPS}) instead of resuming`, parseStep)
  .option("--reuse-cached", "Reuse cached images with similar prompts without asking", false)
  .option("--verbose", "Show detailed logs", false)
  .action(async (url: string, options: RunCommandOptions) => {
    const config = loadConfig();
    const imageCache = await ImageCacheIndex.open(config.imageCachePath);
    const history = HistoryStore.open(config.historyPath);

    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    const channel = createTerminalConfirmChannel(rl, describeConfirmRequest);

    // First Ctrl+C stops after the current step; a second one exits immediately.
    // readline holds the terminal in raw mode, so Ctrl+C reaches it rather than the process.
    clearStopRequest();
    const onInterrupt = (): void => {
      if (stopRequested) {
        process.exit(130);
      }
      console.log("\nStopping after the current step. Press Ctrl+C again to quit now.");
      requestStop();
      channel.cancel();
    };
    process.on("SIGINT", onInterrupt);
    rl.on("SIGINT", onInterrupt);

    let costUsd = 0;
    try {
      const outcome = await runPipeline(
        {
          url,
          focus: options.focus,
          fromStep: options.step,
          settings: config,
          confirm: channel.handler,
          reuseDecision: options.reuseCached ? async () => true : undefined,
          verbose: options.verbose,
          onCost: (total) => {
            costUsd = total;
          },
          onProgress: (event) => {
            console.log(formatProgress(event, costUsd));
          },
        },
        createDefaultDeps(config, { imageCache, history }),
      );

      if (outcome.status === "aborted") {
        console.log(`\nStopped after step ${outcome.lastCompletedStep}. Run the same command to resume.`);
      } else {
        console.log(`\nDone. Output: ${outcome.state.outputDir ?? "(none)"}`);
        for (const [label, videoId] of Object.entries(outcome.state.uploadedVideoIds)) {
          console.log(`  ${label}: https://youtu.be/${videoId}`);
        }
      }
    } catch (error) {
      if (error instanceof StageFailedError) {
        console.error(`\nError: ${error.message}`);
        console.error(`Fix the problem and run the same command to resume at step ${error.step}.`);
        process.exitCode = 1;
      } else if (error instanceof PipelineAbortedError) {
        console.log(error.message);
      } else {
        throw error;
      }
    } finally {
      rl.close();
      await imageCache.close();
    }
  });

program
  .command("status")
  .description("Show the checkpoint for an article")
  .argument("<url>", "Article URL")
  .action((url: string) => {
    const config = loadConfig();
    const checkpoint = new CheckpointStore(url, config.checkpointDir);
    const state = checkpoint.load();
    if (!state) {
      console.log(`No checkpoint for ${url}`);
      return;
    }

    const last = checkpoint.lastCompletedStep();
    const next = STEP_ORDER[last];
    console.log(`Job:        ${state.jobId}`);
    console.log(`Title:      ${state.titleKo ?? "(not yet generated)"}`);
    console.log(`Completed:  ${last}/${TOTAL_STEPS}`);
    console.log(`Next step:  ${next ? `${last + 1} ${STEP_LABELS[next]}` : "(finished)"}`);
    console.log(`Output:     ${state.outputDir ?? "(not yet created)"}`);
    console.log(`Saved at:   ${state.lastSavedAt}`);
    for (const entry of state.errors) {
      console.log(`Error:      step ${entry.step} at ${entry.timestamp}: ${entry.error}`);
    }
  });

program
  .command("discard")
  .description("Delete the checkpoint for an article so the next run starts over")
  .argument("<url>", "Article URL")
  .action((url: string) => {
    const config = loadConfig();
    const checkpoint = new CheckpointStore(url, config.checkpointDir);
    if (!checkpoint.exists()) {
      console.log(`No checkpoint for ${url}`);
      return;
    }
    checkpoint.delete();
    console.log(`Discarded checkpoint ${checkpoint.jobId}`);
  });

const cache = program.command("cache").description("Inspect and maintain the image cache");

async function withCache(action: (index: ImageCacheIndex) => Promise<void>): Promise<void> {
  const index = await ImageCacheIndex.open(loadConfig().imageCachePath);
  try {
    await action(index);
  } finally {
    await index.close();
  }
}

cache
  .command("stats")
  .description("Show cache size and reuse potential")
  .action(() =>
    withCache(async (index) => {
      const stats = index.stats();
      console.log(`Entries:        ${stats.totalCached}`);
      console.log(`Unique prompts: ${stats.uniquePrompts}`);
      console.log(`Reusable:       ${stats.reusable}`);
      console.log(`Disk usage:     ${(stats.diskBytes / 1024 / 1024).toFixed(1)} MB`);
    }),
  );

cache
  .command("search")
  .description("List cached images whose prompt contains a keyword")
  .argument("<keyword>", "Keyword")
  .option("--limit <n>", "Maximum results", parsePositiveInt, 20)
  .action((keyword: string, options: { limit: number }) =>
    withCache(async (index) => {
      for (const entry of index.search(keyword, options.limit)) {
        console.log(`#${entry.id} ${entry.createdAt} ${entry.artifactPath}\n    ${entry.prompt}`);
      }
    }),
  );

cache
  .command("sweep")
  .description("Remove entries whose image file no longer exists")
  .action(() =>
    withCache(async (index) => {
      const removed = await index.clearMissing();
      console.log(`Removed ${removed} missing entries`);
    }),
  );

cache
  .command("clear")
  .description("Remove every entry (image files stay on disk)")
  .option("--yes", "Do not ask for confirmation", false)
  .action((options: { yes: boolean }) =>
    withCache(async (index) => {
      if (!options.yes) {
        console.log("Refusing to clear the cache without --yes");
        return;
      }
      const removed = await index.clearAll();
      console.log(`Removed ${removed} entries`);
    }),
  );

function printCostReport(history: HistoryStore, year: number | undefined, imagePerItem: number): void {
  const months = history.monthlySummary(year);
  if (months.length === 0) {
    console.log(`No jobs in ${year ?? new Date().getUTCFullYear()}`);
  }
  for (const m of months) {
    console.log(
      `${m.year}-${String(m.month).padStart(2, "0")}  $${m.totalCostUsd.toFixed(2)} over ${m.videoCount} videos ` +
        `(avg $${m.avgCostUsd.toFixed(2)}, ${m.imageCount} images, ${m.reusedImages} reused)`,
    );
  }

  const savings = history.reuseSavings(imagePerItem);
  console.log(
    `Image reuse: ${savings.reusedImages}/${savings.totalImages} (${savings.reuseRate}%), ` +
      `saved $${savings.savedUsd.toFixed(2)} (~${savings.savedKrw.toLocaleString("en-US")} KRW)`,
  );
}

program
  .command("history")
  .description("List completed jobs, newest first")
  .option("--limit <n>", "Maximum records", parsePositiveInt, 20)
  .option("--search <keyword>", "Filter by title or URL")
  .option("--report", "Show monthly spend and image reuse savings instead of records", false)
  .option("--year <year>", "Year for --report (default: this year)", parsePositiveInt)
  .action((options: { limit: number; search?: string; report: boolean; year?: number }) => {
    const config = loadConfig();
    const history = HistoryStore.open(config.historyPath);
    if (options.report) {
      printCostReport(history, options.year, config.prices.imagePerItem);
      return;
    }
    const records = options.search ? history.search(options.search, options.limit) : history.list(options.limit);
    if (records.length === 0) {
      console.log("No history yet");
      return;
    }
    for (const record of records) {
      console.log(
        `#${record.id} ${record.createdAt.slice(0, 10)} [${record.uploadStatus}] ${record.titleKo} ` +
          `($${record.costUsd.toFixed(2)}, ${record.sceneCount} scenes, ${record.reusedImages} reused)`,
      );
      console.log(`    ${record.url}`);
    }
  });

program.parseAsync(process.argv).catch(fail);
