/**
 * pagechat Content Analyzer — answers a question about a scraped document.
 *
 * Builds a bounded context from the document, makes exactly one provider
 * call and maps the result onto `AnalysisFailure`. Retrying is left to
 * the caller.
 */

import type { ScrapedDocument } from "../scraper/types.js";
import type { ProviderBase } from "./provider.js";
import { fail, succeed, errorMessage, type AnalysisFailure, type Outcome } from "./errors.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("Analyzer");

export interface AnalysisLimits {
    /** Characters of document text included in the prompt. */
    maxContentChars: number;
    /** Tables included in the prompt. */
    maxTables: number;
}

export const DEFAULT_ANALYSIS_LIMITS: AnalysisLimits = {
    maxContentChars: 2000,
    maxTables: 3,
};

export function buildAnalysisPrompt(
    document: ScrapedDocument,
    query: string,
    limits: AnalysisLimits,
): string {
    const tables = document.tables.slice(0, Math.max(0, limits.maxTables));
    const tableText = tables.length > 0 ? tables.join(" ") : "No tables found";
    const summary = document.text.slice(0, Math.max(0, limits.maxContentChars));
    const truncated = document.text.length > summary.length ? "..." : "";

    return [
        `Title: ${document.title || "Unknown"}`,
        "",
        `Content Summary: ${summary}${truncated}`,
        "",
        `Table Data: ${tableText}`,
        "",
        "Metadata:",
        `- Description: ${document.metadata.description}`,
        `- Keywords: ${document.metadata.keywords}`,
        "",
        `Query: ${query}`,
        "",
        "Please provide a helpful and accurate response based on the content above.",
    ].join("\n");
}

export class ContentAnalyzer {
    private readonly provider: ProviderBase;
    private readonly limits: AnalysisLimits;

    constructor(provider: ProviderBase, limits: Partial<AnalysisLimits> = {}) {
        this.provider = provider;
        this.limits = { ...DEFAULT_ANALYSIS_LIMITS, ...limits };
    }

    async analyze(
        document: ScrapedDocument,
        query: string,
        limits: Partial<AnalysisLimits> = {},
    ): Promise<Outcome<string, AnalysisFailure>> {
        const prompt = buildAnalysisPrompt(document, query, { ...this.limits, ...limits });

        try {
            const completion = await this.provider.complete(prompt);

            switch (completion.status) {
                case "blocked":
                    log.warn(`Prompt blocked by ${this.provider.name}`, { reason: completion.reason });
                    return fail({
                        kind: "analysis-blocked",
                        reason: completion.reason,
                        message: "Your query was blocked by content safety filters",
                    });
                case "stopped":
                    log.warn(`Generation stopped by ${this.provider.name}`, { reason: completion.reason });
                    return fail({
                        kind: "analysis-stopped",
                        reason: completion.reason,
                        message: "Response generation was stopped due to content safety",
                    });
                case "completed":
                    if (!completion.text.trim()) {
                        log.warn(`Empty response from ${this.provider.name}`);
                        return fail({ kind: "analysis-empty", message: `Empty response from ${this.provider.name}` });
                    }
                    log.debug(`Answered with ${completion.model}`, { chars: completion.text.length });
                    return succeed(completion.text);
            }
        } catch (err) {
            log.error(`${this.provider.name} API error: ${errorMessage(err)}`);
            return fail({
                kind: "analysis-provider-error",
                message: `Failed to analyze content: ${errorMessage(err)}`,
                cause: err,
            });
        }
    }
}
