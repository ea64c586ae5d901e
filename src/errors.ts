/**
 * Raised when the user declines a confirm-gate or a stop is requested.
 * Not a failure: the orchestrator ends the run cleanly.
 */
export class PipelineAbortedError extends Error {
  constructor(reason: string) {
    super(reason);
    this.name = "PipelineAbortedError";
  }
}

export class StageFailedError extends Error {
  readonly step: number;
  readonly label: string;

  constructor(step: number, label: string, cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(`Step ${step} (${label}) failed: ${message}`, { cause });
    this.name = "StageFailedError";
    this.step = step;
    this.label = label;
  }
}

/** A shorts scene points at a long-form scene that has no matching asset. */
export class AssetMappingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AssetMappingError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
