import * as fs from "fs";
import * as path from "path";
import { z } from "zod";

const runResponseSchema = z.object({ job_id: z.string().min(1) });

const jobResponseSchema = z.object({
  status: z.string(),
  output_asset_ids: z.array(z.string()).optional(),
});

export interface ComfyJob {
  status: string;
  outputAssetIds: string[];
}

export interface PollOptions {
  intervalMs?: number;
  timeoutMs?: number;
}

/**
 * Minimal client for a ComfyUI workflow server: start a named workflow,
 * poll the job, download its output asset.
 */
export class ComfyClient {
  constructor(
    readonly baseUrl: string,
    private readonly token = "",
  ) {}

  private authHeaders(): Record<string, string> {
    return this.token ? { Authorization: `Bearer ${this.token}` } : {};
  }

  /**
   * Run a workflow on ComfyUI
   * @param workflow - Workflow name (e.g., "text_to_image")
   * @returns Job ID
   */
  async runWorkflow(workflow: string, params: Record<string, unknown>): Promise<string> {
    const response = await fetch(`${this.baseUrl}/workflows/${workflow}/run`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        ...this.authHeaders(),
      },
      body: JSON.stringify(params),
    });

    if (!response.ok) {
      throw new Error(`Failed to run workflow: ${response.status} ${response.statusText}`);
    }

    return runResponseSchema.parse(await response.json()).job_id;
  }

  /**
   * Poll a job until it completes, fails or runs past the timeout.
   */
  async pollJob(jobId: string, options: PollOptions = {}): Promise<ComfyJob> {
    const { intervalMs = 2000, timeoutMs = 300_000 } = options;
    const deadline = Date.now() + timeoutMs;

    while (Date.now() < deadline) {
      const response = await fetch(`${this.baseUrl}/jobs/${jobId}`, {
        method: "GET",
        headers: this.authHeaders(),
      });

      if (!response.ok) {
        throw new Error(`Failed to poll job: ${response.status} ${response.statusText}`);
      }

      const data = jobResponseSchema.parse(await response.json());

      if (data.status === "completed") {
        return { status: data.status, outputAssetIds: data.output_asset_ids ?? [] };
      }
      if (data.status === "failed") {
        throw new Error(`Job ${jobId} failed`);
      }

      await new Promise((resolve) => setTimeout(resolve, intervalMs));
    }

    throw new Error(`Job ${jobId} did not finish within ${Math.round(timeoutMs / 1000)}s`);
  }

  /**
   * Download an asset from ComfyUI and write to disk
   */
  async downloadAsset(assetId: string, outputPath: string): Promise<void> {
    const response = await fetch(`${this.baseUrl}/assets/${assetId}/file`, {
      method: "GET",
      headers: this.authHeaders(),
    });

    if (!response.ok) {
      throw new Error(`Failed to download asset: ${response.status} ${response.statusText}`);
    }

    const buffer = await response.arrayBuffer();
    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    fs.writeFileSync(outputPath, Buffer.from(buffer));
  }
}
