/**
 * pagechat Session — the current document and its chat history.
 *
 * A session holds at most one document at a time. Each successful scrape
 * or `clear()` starts a new generation and empties the history, and an
 * answer is recorded only if the generation it was asked against is still
 * current. One pipeline runs per session at a time.
 */

import type { ScrapedDocument } from "../scraper/types.js";
import type { ScrapeOrchestrator } from "./orchestrator.js";
import {
    fail, succeed,
    type AskFailure, type Outcome, type ScrapeFailure, type SessionFailure,
} from "./errors.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("Session");

export interface ChatTurn {
    query: string;
    response: string;
    askedAt: Date;
}

const BUSY: SessionFailure = {
    kind: "session-busy",
    message: "Another request is still running for this session",
};

export class ScrapeSession {
    private readonly orchestrator: ScrapeOrchestrator;
    private readonly now: () => Date;
    private currentDocument: ScrapedDocument | null = null;
    private currentUrl: string | null = null;
    private turns: ChatTurn[] = [];
    private gen = 0;
    private running = false;

    constructor(orchestrator: ScrapeOrchestrator, now: () => Date = () => new Date()) {
        this.orchestrator = orchestrator;
        this.now = now;
    }

    get document(): ScrapedDocument | null {
        return this.currentDocument;
    }

    get url(): string | null {
        return this.currentUrl;
    }

    get history(): readonly ChatTurn[] {
        return this.turns;
    }

    /** Incremented whenever the document is replaced or cleared. */
    get generation(): number {
        return this.gen;
    }

    get busy(): boolean {
        return this.running;
    }

    /** Scrape `url` and make it the current document. A failure keeps the previous one. */
    async scrape(url: string): Promise<Outcome<ScrapedDocument, ScrapeFailure | SessionFailure>> {
        if (this.running) return fail(BUSY);
        this.running = true;

        try {
            const result = await this.orchestrator.scrape(url);
            if (!result.ok) return result;

            this.replace(result.value, url);
            return succeed(result.value);
        } finally {
            this.running = false;
        }
    }

    async ask(query: string): Promise<Outcome<ChatTurn, AskFailure | SessionFailure>> {
        if (this.running) return fail(BUSY);
        this.running = true;

        const askedAgainst = this.gen;
        try {
            const result = await this.orchestrator.ask(this.currentDocument, query);
            if (!result.ok) return result;

            if (this.gen !== askedAgainst) {
                log.debug("Dropping answer for a replaced document", { asked: askedAgainst, current: this.gen });
                return fail({
                    kind: "superseded",
                    message: "The page changed while the question was being answered",
                });
            }

            const turn: ChatTurn = { query: query.trim(), response: result.value, askedAt: this.now() };
            this.turns.push(turn);
            return succeed(turn);
        } finally {
            this.running = false;
        }
    }

    /** Drop the document and its history. */
    clear(): void {
        this.gen++;
        this.currentDocument = null;
        this.currentUrl = null;
        this.turns = [];
        log.debug("Session cleared", { generation: this.gen });
    }

    private replace(document: ScrapedDocument, url: string): void {
        this.gen++;
        this.currentDocument = document;
        this.currentUrl = url;
        this.turns = [];
    }
}
