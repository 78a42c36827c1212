/**
 * Tests for the Gemini adapter. The SDK is mocked; no request leaves the process.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

const { generateContent, constructed } = vi.hoisted(() => {
    const constructed: unknown[] = [];
    return { generateContent: vi.fn(), constructed };
});

vi.mock("@google/genai", () => ({
    GoogleGenAI: class {
        models = { generateContent };
        constructor(options: unknown) {
            constructed.push(options);
        }
    },
}));

import { GoogleProvider, MissingApiKeyError, DEFAULT_GEMINI_MODEL } from "../src/providers/google-provider.js";

describe("GoogleProvider", () => {
    beforeEach(() => {
        generateContent.mockReset();
        constructed.length = 0;
    });

    it("should return completed text with usage", async () => {
        generateContent.mockResolvedValue({
            text: "The page is about widgets.",
            candidates: [{ finishReason: "STOP" }],
            usageMetadata: { promptTokenCount: 120, candidatesTokenCount: 8, totalTokenCount: 128 },
        });
        const provider = new GoogleProvider({ apiKey: "test-secret" });

        const completion = await provider.complete("prompt text");

        expect(completion).toEqual({
            status: "completed",
            text: "The page is about widgets.",
            model: DEFAULT_GEMINI_MODEL,
            usage: { promptTokens: 120, completionTokens: 8, totalTokens: 128 },
        });
        expect(generateContent).toHaveBeenCalledWith({
            model: "gemini-2.5-flash",
            contents: "prompt text",
            config: { temperature: undefined, maxOutputTokens: undefined },
        });
        expect(constructed).toEqual([{ apiKey: "test-secret" }]);
    });

    it("should honour the configured model, temperature and token cap", async () => {
        generateContent.mockResolvedValue({ text: "ok", candidates: [{ finishReason: "STOP" }] });
        const provider = new GoogleProvider({
            apiKey: "test-secret", model: "gemini-test", temperature: 0.2, maxTokens: 64,
        });

        await provider.complete("a");
        await provider.complete("b");

        expect(generateContent.mock.calls[1][0]).toEqual({
            model: "gemini-test",
            contents: "b",
            config: { temperature: 0.2, maxOutputTokens: 64 },
        });
        expect(constructed).toHaveLength(1);
    });

    it("should report a blocked prompt", async () => {
        generateContent.mockResolvedValue({ promptFeedback: { blockReason: "SAFETY" } });
        const provider = new GoogleProvider({ apiKey: "test-secret" });

        expect(await provider.complete("p")).toEqual({
            status: "blocked",
            reason: "SAFETY",
            model: DEFAULT_GEMINI_MODEL,
        });
    });

    it("should report a policy stop", async () => {
        generateContent.mockResolvedValue({ text: "", candidates: [{ finishReason: "SAFETY" }] });
        const provider = new GoogleProvider({ apiKey: "test-secret" });

        expect(await provider.complete("p")).toEqual({
            status: "stopped",
            reason: "SAFETY",
            model: DEFAULT_GEMINI_MODEL,
        });
    });

    it("should treat a length stop as completed", async () => {
        generateContent.mockResolvedValue({ text: "partial", candidates: [{ finishReason: "MAX_TOKENS" }] });
        const provider = new GoogleProvider({ apiKey: "test-secret" });

        const completion = await provider.complete("p");
        expect(completion.status).toBe("completed");
    });

    it("should fail on first use without an API key", async () => {
        const provider = new GoogleProvider({});

        await expect(provider.complete("p")).rejects.toThrow(MissingApiKeyError);
        await expect(provider.complete("p")).rejects.toThrow("GEMINI_API_KEY not found in environment variables");
        expect(generateContent).not.toHaveBeenCalled();
    });

    it("should let SDK errors propagate", async () => {
        generateContent.mockRejectedValue(new Error("503 Service Unavailable"));
        const provider = new GoogleProvider({ apiKey: "test-secret" });

        await expect(provider.complete("p")).rejects.toThrow("503 Service Unavailable");
    });
});
