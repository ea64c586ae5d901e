import * as fs from "fs";
import * as path from "path";

import type { PipelineState } from "./types";

const UNSAFE_FILENAME_CHARS = /[\\/:*?"<>|]/g;
const MAX_DIR_NAME_LENGTH = 80;
const UNTITLED = "untitled";

/**
 * A single path segment safe to create under the output root. Trailing dots
 * and spaces are dropped; a name left empty or made only of dots becomes "untitled".
 */
export function sanitizeDirName(title: string): string {
  const name = title
    .replace(UNSAFE_FILENAME_CHARS, "_")
    .slice(0, MAX_DIR_NAME_LENGTH)
    .trim()
    .replace(/[.\s]+$/, "");
  return /^[.\s]*$/.test(name) ? UNTITLED : name;
}

/**
 * Returns the job's output directory, deriving it from the Korean title the
 * first time and reusing the stored path on every later call and resumed run.
 */
export function resolveOutputDir(state: PipelineState, outputRoot: string): string {
  if (state.outputDir) {
    fs.mkdirSync(state.outputDir, { recursive: true });
    return state.outputDir;
  }

  const dirName = sanitizeDirName(state.titleKo ?? "");
  const outputDir = path.join(outputRoot, dirName);
  fs.mkdirSync(outputDir, { recursive: true });
  state.outputDir = outputDir;
  return outputDir;
}
