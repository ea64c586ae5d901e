import * as fs from "fs";
import * as path from "path";
import { Modality } from "@google/genai";

import type { ComfyClient } from "../comfy-client";
import type { CostLedger } from "../cost-ledger";
import { extractInlineData, getGoogleClient } from "../google-client";
import type { ImageEngine, ImageEngineMode } from "../types";

const MAX_ATTEMPTS = 3;

export function sceneImagePath(outputDir: string, sceneId: number): string {
  return path.join(outputDir, `scene_${String(sceneId).padStart(3, "0")}.png`);
}

/**
 * Scene images from Gemini's image model. Remote and rate limited, so the
 * batch scheduler runs it on a worker pool.
 */
export class GeminiImageEngine implements ImageEngine {
  readonly mode: ImageEngineMode = "remote-parallel";
  readonly name: string;

  constructor(private readonly model: string) {
    this.name = `gemini:${model}`;
  }

  async generate(prompt: string, sceneId: number, outputDir: string, ledger: CostLedger): Promise<string | null> {
    let lastError: unknown = null;
    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      try {
        const response = await getGoogleClient().models.generateContent({
          model: this.model,
          contents: [{ role: "user", parts: [{ text: `${prompt}. Wide 16:9 landscape composition.` }] }],
          config: { responseModalities: [Modality.IMAGE] },
        });

        const image = extractInlineData(response, "image/");
        if (!image) {
          throw new Error("No image data in response");
        }
        ledger.addImage(1);

        const filePath = sceneImagePath(outputDir, sceneId);
        fs.mkdirSync(outputDir, { recursive: true });
        fs.writeFileSync(filePath, image.data);
        return filePath;
      } catch (error) {
        lastError = error;
        if (attempt < MAX_ATTEMPTS) {
          await new Promise((resolve) => setTimeout(resolve, 1000 * attempt));
        }
      }
    }

    console.error(
      `[image] Scene ${sceneId}: failed after ${MAX_ATTEMPTS} attempts:`,
      lastError instanceof Error ? lastError.message : lastError,
    );
    return null;
  }
}

/**
 * Scene images from a ComfyUI text_to_image workflow. The GPU server handles
 * one job at a time, so items run sequentially. Local generation is free and
 * is not charged to the ledger.
 */
export class ComfyImageEngine implements ImageEngine {
  readonly mode: ImageEngineMode = "local-sequential";
  readonly name = "comfy";

  constructor(
    private readonly client: ComfyClient,
    private readonly size = { width: 1280, height: 720 },
  ) {}

  async generate(prompt: string, sceneId: number, outputDir: string, _ledger: CostLedger): Promise<string | null> {
    const jobId = await this.client.runWorkflow("text_to_image", {
      prompt,
      width: this.size.width,
      height: this.size.height,
    });
    const job = await this.client.pollJob(jobId);
    const assetId = job.outputAssetIds[0];
    if (!assetId) {
      console.warn(`[image] Scene ${sceneId}: ComfyUI job ${jobId} returned no output`);
      return null;
    }

    const filePath = sceneImagePath(outputDir, sceneId);
    await this.client.downloadAsset(assetId, filePath);
    return filePath;
  }
}
