/**
 * pagechat Errors — typed failures returned by the pipeline.
 *
 * Nothing in the scrape/ask pipeline throws to its caller. Each step
 * returns an `Outcome`, and the failure side is a closed union keyed by
 * `kind` so the presentation layer can switch over it exhaustively.
 */

import type { SsrfRule } from "../scraper/ssrf.js";

export type Outcome<T, E> =
    | { ok: true; value: T }
    | { ok: false; error: E };

export function succeed<T>(value: T): { ok: true; value: T } {
    return { ok: true, value };
}

export function fail<E>(error: E): { ok: false; error: E } {
    return { ok: false, error };
}

// ── Scrape ─────────────────────────────────────────────────────

export type ScrapeFailure =
    | { kind: "url-invalid"; message: string }
    /** Includes unresolvable hostnames (`rule: "dns-unresolvable"`). */
    | { kind: "ssrf-blocked"; message: string; rule: SsrfRule; hostname: string; address?: string }
    | { kind: "fetch-failed"; message: string; cause: unknown };

// ── Analysis ───────────────────────────────────────────────────

export type AnalysisFailure =
    | { kind: "analysis-blocked"; message: string; reason: string }
    | { kind: "analysis-stopped"; message: string; reason: string }
    | { kind: "analysis-empty"; message: string }
    | { kind: "analysis-provider-error"; message: string; cause: unknown };

export type AskFailure =
    | AnalysisFailure
    | { kind: "no-content"; message: string }
    | { kind: "query-invalid"; message: string };

// ── Session ────────────────────────────────────────────────────

export type SessionFailure =
    | { kind: "session-busy"; message: string }
    | { kind: "superseded"; message: string };

export type PipelineFailure = ScrapeFailure | AskFailure | SessionFailure;

export type FailureKind = PipelineFailure["kind"];

/** One-line, user-facing rendering of a failure. */
export function describeFailure(failure: PipelineFailure): string {
    switch (failure.kind) {
        case "url-invalid":
            return `Invalid URL: ${failure.message}`;
        case "ssrf-blocked":
            return `Security error: ${failure.message}`;
        case "fetch-failed":
            return `Scraping error: ${failure.message}`;
        case "analysis-blocked":
        case "analysis-stopped":
        case "analysis-empty":
        case "analysis-provider-error":
            return `Analysis error: ${failure.message}`;
        case "no-content":
            return failure.message;
        case "query-invalid":
            return `Invalid question: ${failure.message}`;
        case "session-busy":
        case "superseded":
            return failure.message;
    }
}

/** Best-effort message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
