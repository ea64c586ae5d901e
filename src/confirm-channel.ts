import type { Scene, VideoLabel } from "./types";

export type ConfirmGate = "scenario" | "upload";

export interface ScenarioGateData {
  title: string;
  sceneCount: number;
  preview: Scene[];
}

export interface UploadGateData {
  videos: Partial<Record<VideoLabel, string>>;
  thumbnails: Partial<Record<VideoLabel, string>>;
}

export type ConfirmRequest =
  | { gate: "scenario"; message: string; data: ScenarioGateData }
  | { gate: "upload"; message: string; data: UploadGateData };

/** Resolves true to proceed, false to abort the run. */
export type ConfirmHandler = (request: ConfirmRequest) => Promise<boolean>;

/**
 * Only "y" or "yes" (any case, surrounding whitespace ignored) mean yes.
 * Everything else, including an empty answer, is a decline.
 */
export function parseConfirmAnswer(answer: string | null | undefined): boolean {
  const normalized = (answer ?? "").trim().toLowerCase();
  return normalized === "y" || normalized === "yes";
}

/**
 * Single-slot rendezvous between the pipeline and whoever answers confirm
 * prompts. The pipeline blocks on request() until respond() or cancel().
 * After cancel() every request, pending or future, resolves false.
 */
export class ConfirmChannel {
  private pending: { request: ConfirmRequest; resolve: (answer: boolean) => void } | null = null;
  private cancelled = false;

  constructor(private readonly onRequest?: (request: ConfirmRequest) => void) {}

  get pendingRequest(): ConfirmRequest | null {
    return this.pending?.request ?? null;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  readonly handler: ConfirmHandler = (request) => this.request(request);

  request(request: ConfirmRequest): Promise<boolean> {
    if (this.cancelled) {
      return Promise.resolve(false);
    }
    if (this.pending) {
      return Promise.reject(new Error(`A confirmation for "${this.pending.request.gate}" is already pending`));
    }
    return new Promise<boolean>((resolve) => {
      this.pending = { request, resolve };
      this.onRequest?.(request);
    });
  }

  /** Delivers the answer to the pending request. Returns false if nothing was pending. */
  respond(answer: boolean): boolean {
    const pending = this.pending;
    if (!pending) {
      return false;
    }
    this.pending = null;
    pending.resolve(answer);
    return true;
  }

  cancel(): void {
    this.cancelled = true;
    this.respond(false);
  }
}
