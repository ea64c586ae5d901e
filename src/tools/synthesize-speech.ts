import * as fs from "fs";
import * as path from "path";
import { Modality } from "@google/genai";

import type { CostLedger } from "../cost-ledger";
import { extractInlineData, getGoogleClient } from "../google-client";
import type { Lang, Scene, SpeechEngine } from "../types";
import { WorkerPool } from "../worker-pool";

const DEFAULT_SAMPLE_RATE = 24_000;
const MAX_ATTEMPTS = 3;
const CONCURRENCY = 3;

/**
 * Wraps raw little-endian PCM in a 44-byte RIFF/WAVE header.
 */
export function pcmToWav(pcm: Buffer, sampleRate = DEFAULT_SAMPLE_RATE, channels = 1, bitsPerSample = 16): Buffer {
  const blockAlign = (channels * bitsPerSample) / 8;
  const header = Buffer.alloc(44);
  header.write("RIFF", 0, "ascii");
  header.writeUInt32LE(36 + pcm.length, 4);
  header.write("WAVE", 8, "ascii");
  header.write("fmt ", 12, "ascii");
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(sampleRate * blockAlign, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(bitsPerSample, 34);
  header.write("data", 36, "ascii");
  header.writeUInt32LE(pcm.length, 40);
  return Buffer.concat([header, pcm]);
}

/** Reads the sample rate from a MIME type like "audio/L16;codec=pcm;rate=24000". */
export function sampleRateFromMime(mimeType: string): number {
  const match = /rate=(\d+)/.exec(mimeType);
  return match ? parseInt(match[1], 10) : DEFAULT_SAMPLE_RATE;
}

export function narrationPath(outputDir: string, sceneId: number): string {
  return path.join(outputDir, `scene_${String(sceneId).padStart(3, "0")}.wav`);
}

/**
 * Narration through Gemini's TTS model, one WAV clip per scene in scene order.
 * A scene with empty narration gets one second of silence.
 */
export class GeminiSpeechEngine implements SpeechEngine {
  constructor(
    private readonly model: string,
    private readonly voices: Record<Lang, string>,
  ) {}

  async synthesize(scenes: Scene[], lang: Lang, outputDir: string, ledger: CostLedger): Promise<string[]> {
    fs.mkdirSync(outputDir, { recursive: true });
    const pool = new WorkerPool(CONCURRENCY);
    try {
      const settled = await pool.run(scenes.map((scene) => () => this.synthesizeScene(scene, lang, outputDir, ledger)));
      const paths = new Array<string>(scenes.length);
      for (const result of settled) {
        if (result.status === "rejected") {
          throw result.reason;
        }
        paths[result.index] = result.value;
      }
      console.log(`[speech] ${lang}: ${paths.length} clips in ${outputDir}`);
      return paths;
    } finally {
      pool.shutdown();
    }
  }

  private async synthesizeScene(scene: Scene, lang: Lang, outputDir: string, ledger: CostLedger): Promise<string> {
    const filePath = narrationPath(outputDir, scene.sceneId);
    const text = scene.narration.trim();
    if (!text) {
      fs.writeFileSync(filePath, pcmToWav(Buffer.alloc(DEFAULT_SAMPLE_RATE * 2)));
      return filePath;
    }

    let lastError: unknown = null;
    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      try {
        const response = await getGoogleClient().models.generateContent({
          model: this.model,
          contents: [{ role: "user", parts: [{ text }] }],
          config: {
            responseModalities: [Modality.AUDIO],
            speechConfig: { voiceConfig: { prebuiltVoiceConfig: { voiceName: this.voices[lang] } } },
          },
        });
        const audio = extractInlineData(response, "audio/");
        if (!audio) {
          throw new Error("No audio data in response");
        }
        ledger.addSpeech(text.length);
        fs.writeFileSync(filePath, pcmToWav(audio.data, sampleRateFromMime(audio.mimeType)));
        return filePath;
      } catch (error) {
        lastError = error;
        if (attempt < MAX_ATTEMPTS) {
          await new Promise((resolve) => setTimeout(resolve, 1000 * attempt));
        }
      }
    }

    const message = lastError instanceof Error ? lastError.message : String(lastError);
    throw new Error(`Speech for scene ${scene.sceneId} (${lang}) failed after ${MAX_ATTEMPTS} attempts: ${message}`);
  }
}
