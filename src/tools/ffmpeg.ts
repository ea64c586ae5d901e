import { execFile } from "child_process";
import { promisify } from "util";

const execFileAsync = promisify(execFile);

// Composed videos can produce a lot of ffmpeg stderr.
const MAX_BUFFER = 64 * 1024 * 1024;

export async function runFfmpeg(args: string[]): Promise<void> {
  try {
    await execFileAsync("ffmpeg", ["-hide_banner", "-loglevel", "error", ...args], { maxBuffer: MAX_BUFFER });
  } catch (error) {
    const stderr = typeof error === "object" && error !== null && "stderr" in error ? String(error.stderr) : "";
    throw new Error(`ffmpeg failed: ${stderr.trim() || (error instanceof Error ? error.message : String(error))}`);
  }
}

/**
 * Get the duration of a media file in seconds using ffprobe.
 */
export async function probeDuration(filePath: string): Promise<number> {
  const { stdout } = await execFileAsync("ffprobe", [
    "-v", "error",
    "-show_entries", "format=duration",
    "-of", "default=noprint_wrappers=1:nokey=1",
    filePath,
  ]);
  const duration = parseFloat(stdout.trim());
  if (!Number.isFinite(duration)) {
    throw new Error(`ffprobe returned no duration for ${filePath}`);
  }
  return duration;
}

/**
 * Escapes a value for use inside an ffmpeg filter argument. execFile bypasses
 * the shell, so only filter-level escaping is needed.
 */
export function escapeFilterValue(value: string): string {
  return value
    .replace(/\\/g, "\\\\")
    .replace(/:/g, "\\:")
    .replace(/'/g, "\\'")
    .replace(/,/g, "\\,")
    .replace(/%/g, "\\%");
}
