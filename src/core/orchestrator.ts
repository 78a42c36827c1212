/**
 * pagechat Scrape Orchestrator — runs the scrape pipeline as a state machine.
 *
 *   idle → validating → ssrf-checking → rate-limiting → fetching → extracting → ready
 *
 * `failed` is reachable from validating, ssrf-checking and fetching. The
 * validation and SSRF gates run before any rate-limit bookkeeping, so a
 * rejected URL never consumes a request slot; a failed fetch does.
 *
 * `state` belongs to the orchestrator, not to a scrape: concurrent scrapes
 * on one instance interleave their transitions. Give each session its own
 * orchestrator and share the DomainRateLimiter between them.
 */

import type { PageFetcher, RenderOptions, ScrapedDocument, SecurityPolicy } from "../scraper/types.js";
import { validateQuery, validateUrl } from "../scraper/validate.js";
import { extractDocument } from "../scraper/extract.js";
import { domainOf, type DomainRateLimiter } from "../scraper/rate-limit.js";
import type { SsrfGuard } from "../scraper/ssrf.js";
import type { ContentAnalyzer } from "./analyzer.js";
import {
    fail, succeed, errorMessage,
    type AskFailure, type Outcome, type ScrapeFailure,
} from "./errors.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("Orchestrator");

export type ScrapeState =
    | "idle"
    | "validating"
    | "ssrf-checking"
    | "rate-limiting"
    | "fetching"
    | "extracting"
    | "ready"
    | "failed";

export interface StateTransition {
    from: ScrapeState;
    to: ScrapeState;
    url: string;
    at: Date;
}

export type TransitionObserver = (transition: StateTransition) => void;

export interface OrchestratorDeps {
    policy: SecurityPolicy;
    guard: SsrfGuard;
    /** Shared by every orchestrator in the process. */
    rateLimiter: DomainRateLimiter;
    fetcher: PageFetcher;
    analyzer: ContentAnalyzer;
    render: RenderOptions;
}

export class ScrapeOrchestrator {
    private readonly deps: OrchestratorDeps;
    private readonly observers = new Set<TransitionObserver>();
    private current: ScrapeState = "idle";

    constructor(deps: OrchestratorDeps) {
        this.deps = deps;
    }

    /** State after the most recent transition of any scrape on this instance. */
    get state(): ScrapeState {
        return this.current;
    }

    get policy(): SecurityPolicy {
        return this.deps.policy;
    }

    /** Register a transition observer; returns an unsubscribe function. */
    onTransition(observer: TransitionObserver): () => void {
        this.observers.add(observer);
        return () => this.observers.delete(observer);
    }

    async scrape(rawUrl: string): Promise<Outcome<ScrapedDocument, ScrapeFailure>> {
        this.transition("validating", rawUrl);
        const validation = validateUrl(rawUrl, this.deps.policy);
        if (!validation.valid) {
            log.warn(`URL rejected: ${validation.reason}`);
            return this.failed(rawUrl, { kind: "url-invalid", message: validation.reason });
        }
        const url = validation.url;

        this.transition("ssrf-checking", rawUrl);
        const safety = await this.deps.guard.check(url);
        if (!safety.safe) {
            return this.failed(rawUrl, {
                kind: "ssrf-blocked",
                message: safety.reason,
                rule: safety.rule,
                hostname: safety.hostname,
                address: safety.address,
            });
        }

        this.transition("rate-limiting", rawUrl);
        await this.deps.rateLimiter.waitIfNeeded(domainOf(url));

        this.transition("fetching", rawUrl);
        let html: string;
        try {
            html = await this.deps.fetcher.render(url.href, this.deps.render);
        } catch (err) {
            log.error(`Fetch failed for ${url.href}: ${errorMessage(err)}`, { fetcher: this.deps.fetcher.name });
            return this.failed(rawUrl, {
                kind: "fetch-failed",
                message: `Failed to scrape website: ${errorMessage(err)}`,
                cause: err,
            });
        }

        this.transition("extracting", rawUrl);
        const document = extractDocument(html);

        this.transition("ready", rawUrl);
        log.info(`Scraped ${url.href}`, {
            chars: document.text.length,
            links: document.links.length,
            tables: document.tables.length,
        });
        return succeed(document);
    }

    /**
     * Answer a question about `document`. A missing document short-circuits
     * to `no-content` without calling the provider.
     */
    async ask(document: ScrapedDocument | null, query: string): Promise<Outcome<string, AskFailure>> {
        const checked = validateQuery(query, this.deps.policy);
        if (!checked.valid) {
            return fail({ kind: "query-invalid", message: checked.reason });
        }

        if (!document) {
            return fail({ kind: "no-content", message: "Please scrape a URL first" });
        }

        return this.deps.analyzer.analyze(document, checked.query);
    }

    private failed(url: string, failure: ScrapeFailure): { ok: false; error: ScrapeFailure } {
        this.transition("failed", url);
        return fail(failure);
    }

    private transition(to: ScrapeState, url: string): void {
        const from = this.current;
        this.current = to;
        log.debug(`${from} → ${to}`, { url });

        const event: StateTransition = { from, to, url, at: new Date() };
        for (const observer of this.observers) {
            try {
                observer(event);
            } catch (err) {
                log.error(`Transition observer failed: ${errorMessage(err)}`);
            }
        }
    }
}
