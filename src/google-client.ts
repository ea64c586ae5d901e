import { GoogleGenAI } from "@google/genai";

let googleClient: GoogleGenAI | null = null;

export function getGoogleClient(): GoogleGenAI {
  if (!googleClient) {
    const apiKey = process.env.GEMINI_API_KEY ?? process.env.GOOGLE_GENERATIVE_AI_API_KEY;
    if (!apiKey) {
      throw new Error("GEMINI_API_KEY environment variable is not set");
    }
    googleClient = new GoogleGenAI({ apiKey });
  }
  return googleClient;
}

interface InlinePart {
  inlineData?: { mimeType?: string; data?: string };
}

interface ContentResponse {
  candidates?: Array<{ content?: { parts?: InlinePart[] } }>;
}

/**
 * Returns the first inline payload whose MIME type starts with `mimePrefix`
 * ("image/", "audio/"), decoded from base64.
 */
export function extractInlineData(
  response: ContentResponse,
  mimePrefix: string,
): { mimeType: string; data: Buffer } | null {
  const parts = response.candidates?.[0]?.content?.parts ?? [];
  for (const part of parts) {
    const inline = part.inlineData;
    if (inline?.data && (inline.mimeType ?? "").startsWith(mimePrefix)) {
      return { mimeType: inline.mimeType ?? mimePrefix, data: Buffer.from(inline.data, "base64") };
    }
  }
  return null;
}
