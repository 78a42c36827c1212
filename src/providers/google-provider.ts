/**
 * pagechat Google Provider — Gemini models through @google/genai.
 */

import { GoogleGenAI } from "@google/genai";
import {
    type ProviderBase, type ProviderConfig, type Completion,
} from "../core/provider.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("Google");

export const DEFAULT_GEMINI_MODEL = "gemini-2.5-flash";

/** Finish reasons that mean the output was cut off by policy, not by length or completion. */
const POLICY_FINISH_REASONS: ReadonlySet<string> = new Set([
    "SAFETY",
    "RECITATION",
    "BLOCKLIST",
    "PROHIBITED_CONTENT",
    "SPII",
    "IMAGE_SAFETY",
]);

export class MissingApiKeyError extends Error {
    constructor() {
        super("GEMINI_API_KEY not found in environment variables");
        this.name = "MissingApiKeyError";
    }
}

export class GoogleProvider implements ProviderBase {
    readonly name = "Google";
    readonly config: ProviderConfig;
    private client: GoogleGenAI | null = null;

    constructor(config: ProviderConfig) {
        this.config = { model: DEFAULT_GEMINI_MODEL, ...config };
    }

    /** Created on first use so that scrape-only runs need no API key. */
    private getClient(): GoogleGenAI {
        if (!this.client) {
            if (!this.config.apiKey) throw new MissingApiKeyError();
            this.client = new GoogleGenAI({ apiKey: this.config.apiKey });
            log.info(`Initialized Gemini client with model: ${this.config.model ?? DEFAULT_GEMINI_MODEL}`);
        }
        return this.client;
    }

    async complete(prompt: string): Promise<Completion> {
        const model = this.config.model ?? DEFAULT_GEMINI_MODEL;

        const response = await this.getClient().models.generateContent({
            model,
            contents: prompt,
            config: {
                temperature: this.config.temperature,
                maxOutputTokens: this.config.maxTokens,
            },
        });

        const blockReason = response.promptFeedback?.blockReason;
        if (blockReason) {
            return { status: "blocked", reason: String(blockReason), model };
        }

        const finishReason = response.candidates?.[0]?.finishReason;
        if (finishReason && POLICY_FINISH_REASONS.has(finishReason)) {
            return { status: "stopped", reason: finishReason, model };
        }

        return {
            status: "completed",
            text: response.text ?? "",
            model,
            usage: {
                promptTokens: response.usageMetadata?.promptTokenCount ?? 0,
                completionTokens: response.usageMetadata?.candidatesTokenCount ?? 0,
                totalTokens: response.usageMetadata?.totalTokenCount ?? 0,
            },
        };
    }
}
