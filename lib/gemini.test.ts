import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const { generateContent, getGenerativeModel } = vi.hoisted(() => {
  const generateContent = vi.fn();
  const getGenerativeModel = vi.fn(() => ({ generateContent }));
  return { generateContent, getGenerativeModel };
});

vi.mock("@google/generative-ai", () => ({
  GoogleGenerativeAI: class {
    getGenerativeModel = getGenerativeModel;
  },
}));

import { createGeminiClient, NO_INSIGHTS_TEXT } from "./gemini";

function replyWith(text: string) {
  generateContent.mockResolvedValue({ response: { text: () => text } });
}

describe("createGeminiClient", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    generateContent.mockReset();
    getGenerativeModel.mockClear();
  });

  it("returns the trimmed model text", async () => {
    replyWith("  ## Market-Timed Sowing Window\nSow in June.  ");
    const client = createGeminiClient({ apiKey: "test-key", model: "gemini-2.5-flash" });

    const result = await client.generate("  plan my tomatoes  ");

    expect(result).toEqual({ ok: true, text: "## Market-Timed Sowing Window\nSow in June." });
    expect(getGenerativeModel).toHaveBeenCalledWith(expect.objectContaining({ model: "gemini-2.5-flash" }));
    expect(generateContent).toHaveBeenCalledWith("plan my tomatoes");
  });

  it("substitutes a notice for empty output", async () => {
    replyWith("   ");
    const client = createGeminiClient({ apiKey: "test-key", model: "gemini-2.5-flash" });
    expect(await client.generate("p")).toEqual({ ok: true, text: NO_INSIGHTS_TEXT });
  });

  it("returns an error result when the SDK rejects", async () => {
    generateContent.mockRejectedValue(new Error("quota exceeded"));
    const client = createGeminiClient({ apiKey: "test-key", model: "gemini-2.5-flash" });
    expect(await client.generate("p")).toEqual({ ok: false, error: "Gemini API error: quota exceeded" });
  });

  it("returns an error result when the response is blocked", async () => {
    generateContent.mockResolvedValue({
      response: {
        text: () => {
          throw new Error("Candidate was blocked due to SAFETY");
        },
      },
    });
    const client = createGeminiClient({ apiKey: "test-key", model: "gemini-2.5-flash" });
    expect(await client.generate("p")).toEqual({
      ok: false,
      error: "Gemini API error: Candidate was blocked due to SAFETY",
    });
  });

  it("does not call out without a key", async () => {
    const client = createGeminiClient({ model: "gemini-2.5-flash" });
    expect(await client.generate("p")).toEqual({
      ok: false,
      error: "Gemini API error: GEMINI_API_KEY is not configured",
    });
    expect(generateContent).not.toHaveBeenCalled();
  });
});
