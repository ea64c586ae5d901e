import { generateObject, type LanguageModel } from "ai";
import { z } from "zod";

import type { CostLedger } from "../cost-ledger";
import type { ScenarioResult, Scene, Translator } from "../types";

export const TRANSLATION_CHUNK_SIZE = 20;

const translationSchema = z.object({
  title: z.string(),
  scenes: z.array(
    z.object({
      sceneId: z.number(),
      narration: z.string(),
      textOverlay: z.string(),
    }),
  ),
});

export type TranslatedChunk = z.infer<typeof translationSchema>;

const SYSTEM_PROMPT = `Translate Korean YouTube narration into natural, punchy English.
Keep every sceneId exactly as given. Narration stays under 20 words; textOverlay under 25 characters.
The title should read like an English YouTube title, under 60 characters.`;

/**
 * Applies translated text onto copies of the source scenes. Image prompts,
 * stages and durations are left alone; a scene missing from the translation
 * keeps its original text.
 */
export function mergeTranslation(scenes: Scene[], translated: TranslatedChunk["scenes"]): Scene[] {
  const byId = new Map(translated.map((item) => [item.sceneId, item]));
  return scenes.map((scene) => {
    const item = byId.get(scene.sceneId);
    if (!item) {
      console.warn(`[translate] Scene ${scene.sceneId} missing from translation, keeping source text`);
      return { ...scene };
    }
    return { ...scene, narration: item.narration, textOverlay: item.textOverlay };
  });
}

export class AiTranslator implements Translator {
  constructor(private readonly model: LanguageModel) {}

  async translate(scenes: Scene[], title: string, ledger: CostLedger): Promise<ScenarioResult> {
    let titleEn = "";
    const translated: Scene[] = [];

    for (let offset = 0; offset < scenes.length || offset === 0; offset += TRANSLATION_CHUNK_SIZE) {
      const chunk = scenes.slice(offset, offset + TRANSLATION_CHUNK_SIZE);
      const payload = {
        title: offset === 0 ? title : "",
        scenes: chunk.map((s) => ({ sceneId: s.sceneId, narration: s.narration, textOverlay: s.textOverlay })),
      };

      const { object, usage } = await generateObject({
        model: this.model,
        schema: translationSchema,
        system: SYSTEM_PROMPT,
        prompt: JSON.stringify(payload),
        temperature: 0.3,
      });
      ledger.addText(usage.inputTokens ?? 0, usage.outputTokens ?? 0);

      if (offset === 0) {
        titleEn = object.title.trim();
      }
      translated.push(...mergeTranslation(chunk, object.scenes));
      console.log(`[translate] ${Math.min(offset + chunk.length, scenes.length)}/${scenes.length} scenes`);
    }

    return { title: titleEn || title, scenes: translated };
  }
}
