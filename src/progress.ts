import type { ConfirmRequest } from "./confirm-channel";
import type { ProgressEvent } from "./orchestrator";

const BAR_WIDTH = 20;

/**
 * One status line: overall bar across all steps, the current step and the
 * spend so far. A step at fraction 0 counts as started, not done.
 */
export function formatProgress(event: ProgressEvent, costUsd: number): string {
  const done = event.step - 1 + event.fraction;
  const filled = Math.round((done / event.total) * BAR_WIDTH);
  const bar = "#".repeat(filled) + "-".repeat(BAR_WIDTH - filled);
  return `[${bar}] ${event.step}/${event.total} ${event.label} | $${costUsd.toFixed(4)}`;
}

export function describeConfirmRequest(request: ConfirmRequest): string {
  const lines = [request.message];
  if (request.gate === "scenario") {
    lines.push(`  Title: ${request.data.title}`);
    lines.push(`  Scenes: ${request.data.sceneCount}`);
    for (const scene of request.data.preview) {
      lines.push(`  #${scene.sceneId} [${scene.stage}] ${scene.narration}`);
    }
  } else {
    for (const [label, videoPath] of Object.entries(request.data.videos)) {
      lines.push(`  ${label}: ${videoPath}`);
    }
    const thumbnails = Object.keys(request.data.thumbnails).length;
    lines.push(`  Thumbnails: ${thumbnails}`);
  }
  return lines.join("\n");
}
