/**
 * Tests for ScrapeSession: document replacement, chat history and the
 * one-pipeline-per-session rule.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ScrapeSession } from "../src/core/session.js";
import { ScrapeOrchestrator } from "../src/core/orchestrator.js";
import { ContentAnalyzer } from "../src/core/analyzer.js";
import { SsrfGuard } from "../src/scraper/ssrf.js";
import { DomainRateLimiter } from "../src/scraper/rate-limit.js";
import { deferred, FakeClock, FakeFetcher, FakeResolver, MockProvider, testPolicy } from "./helpers.js";

const ASKED_AT = new Date("2026-01-15T12:00:00Z");

describe("ScrapeSession", () => {
    let fetcher: FakeFetcher;
    let provider: MockProvider;
    let session: ScrapeSession;

    beforeEach(() => {
        const policy = testPolicy();
        const resolver = new FakeResolver({
            "example.com": [{ address: "93.184.216.34", family: 4 }],
            "example.org": [{ address: "93.184.216.35", family: 4 }],
        });
        fetcher = new FakeFetcher("<title>First</title><p>one</p>");
        provider = new MockProvider();

        session = new ScrapeSession(new ScrapeOrchestrator({
            policy,
            guard: new SsrfGuard({ blockedIpPrefixes: policy.blockedIpPrefixes, resolver: resolver.resolve }),
            rateLimiter: new DomainRateLimiter(0, new FakeClock()),
            fetcher,
            analyzer: new ContentAnalyzer(provider),
            render: { headers: {}, timeoutMs: 1_000, settleWaitMs: 0 },
        }), () => ASKED_AT);
    });

    it("should start empty", () => {
        expect(session.document).toBeNull();
        expect(session.url).toBeNull();
        expect(session.history).toEqual([]);
        expect(session.generation).toBe(0);
    });

    it("should hold the scraped document and record answered turns", async () => {
        const scraped = await session.scrape("https://example.com/");
        expect(scraped.ok).toBe(true);
        expect(session.document?.title).toBe("First");
        expect(session.url).toBe("https://example.com/");
        expect(session.generation).toBe(1);

        const answer = await session.ask("  What is it?  ");

        expect(answer).toEqual({
            ok: true,
            value: { query: "What is it?", response: "Mock answer", askedAt: ASKED_AT },
        });
        expect(session.history).toEqual([{ query: "What is it?", response: "Mock answer", askedAt: ASKED_AT }]);
    });

    it("should return no-content before any scrape", async () => {
        const answer = await session.ask("Anything?");

        expect(answer).toEqual({ ok: false, error: { kind: "no-content", message: "Please scrape a URL first" } });
        expect(provider.prompts).toHaveLength(0);
        expect(session.history).toEqual([]);
    });

    it("should clear the history when a new document replaces the old one", async () => {
        await session.scrape("https://example.com/");
        await session.ask("first question");

        fetcher.html = "<title>Second</title><p>two</p>";
        await session.scrape("https://example.org/");

        expect(session.document?.title).toBe("Second");
        expect(session.history).toEqual([]);
        expect(session.generation).toBe(2);
    });

    it("should keep the previous document and history when a scrape fails", async () => {
        await session.scrape("https://example.com/");
        await session.ask("first question");

        const failed = await session.scrape("ftp://example.org/");

        expect(failed.ok).toBe(false);
        expect(session.document?.title).toBe("First");
        expect(session.url).toBe("https://example.com/");
        expect(session.history).toHaveLength(1);
        expect(session.generation).toBe(1);
    });

    it("should leave the document and history untouched on analysis failure", async () => {
        await session.scrape("https://example.com/");
        provider.next = new Error("quota exceeded");

        const answer = await session.ask("q");

        expect(answer.ok).toBe(false);
        expect(session.document?.title).toBe("First");
        expect(session.history).toEqual([]);
    });

    it("should drop an answer whose document was cleared meanwhile", async () => {
        await session.scrape("https://example.com/");
        const gate = deferred();
        provider.gate = gate.promise;

        const pending = session.ask("slow question");
        session.clear();
        gate.resolve();

        expect(await pending).toEqual({
            ok: false,
            error: { kind: "superseded", message: "The page changed while the question was being answered" },
        });
        expect(session.history).toEqual([]);
        expect(session.document).toBeNull();
    });

    it("should reject a second request while one is running", async () => {
        const gate = deferred();
        fetcher.gate = gate.promise;

        const first = session.scrape("https://example.com/");
        const second = await session.ask("too early");
        const third = await session.scrape("https://example.org/");

        expect(second).toEqual({
            ok: false,
            error: { kind: "session-busy", message: "Another request is still running for this session" },
        });
        expect(third.ok).toBe(false);
        expect(session.busy).toBe(true);

        gate.resolve();
        expect((await first).ok).toBe(true);
        expect(session.busy).toBe(false);
    });

    it("should clear the document, URL and history", async () => {
        await session.scrape("https://example.com/");
        await session.ask("q");

        session.clear();

        expect(session.document).toBeNull();
        expect(session.url).toBeNull();
        expect(session.history).toEqual([]);
        expect(session.generation).toBe(2);
    });
});
