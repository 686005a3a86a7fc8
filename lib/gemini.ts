// ═══════════════════════════════════════════════════════════════════════════
// AgroPulse: Gemini text generation
// Failures come back as { ok: false } so callers never render them as content
// ═══════════════════════════════════════════════════════════════════════════

import { GoogleGenerativeAI } from "@google/generative-ai";

export const NO_INSIGHTS_TEXT = "No insights available right now.";

export type AIResult = { ok: true; text: string } | { ok: false; error: string };

export interface InsightsGenerator {
  generate(prompt: string): Promise<AIResult>;
}

export interface GeminiOptions {
  apiKey?: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
}

export function createGeminiClient({
  apiKey,
  model,
  temperature = 0.4,
  maxTokens = 4096,
}: GeminiOptions): InsightsGenerator {
  const genAI = apiKey ? new GoogleGenerativeAI(apiKey) : null;

  return {
    async generate(prompt: string): Promise<AIResult> {
      if (!genAI) {
        return { ok: false, error: "Gemini API error: GEMINI_API_KEY is not configured" };
      }

      try {
        const generative = genAI.getGenerativeModel({
          model,
          generationConfig: { temperature, maxOutputTokens: maxTokens, topP: 0.95 },
        });
        const result = await generative.generateContent(prompt.trim());
        const text = result.response.text().trim();
        return { ok: true, text: text || NO_INSIGHTS_TEXT };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error("[Gemini] exception:", message.substring(0, 200));
        return { ok: false, error: `Gemini API error: ${message}` };
      }
    },
  };
}
