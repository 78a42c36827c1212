/**
 * Shared fakes for the pagechat tests. Nothing here touches the network.
 */

import type { Completion, ProviderBase, ProviderConfig } from "../src/core/provider.js";
import type { Clock } from "../src/scraper/rate-limit.js";
import type { HostResolver, ResolvedAddress } from "../src/scraper/ssrf.js";
import type { PageFetcher, RenderOptions, ScrapedDocument, SecurityPolicy } from "../src/scraper/types.js";
import {
    DEFAULT_ALLOWED_SCHEMES, DEFAULT_BLOCKED_HOSTS, DEFAULT_BLOCKED_IP_PREFIXES,
    DEFAULT_MAX_QUERY_LENGTH, DEFAULT_MAX_URL_LENGTH,
} from "../src/scraper/defaults.js";

export function testPolicy(overrides: Partial<SecurityPolicy> = {}): SecurityPolicy {
    return {
        allowedSchemes: DEFAULT_ALLOWED_SCHEMES,
        blockedHosts: DEFAULT_BLOCKED_HOSTS,
        blockedIpPrefixes: DEFAULT_BLOCKED_IP_PREFIXES,
        maxUrlLength: DEFAULT_MAX_URL_LENGTH,
        maxQueryLength: DEFAULT_MAX_QUERY_LENGTH,
        ...overrides,
    };
}

/** Manual clock: `sleep` advances time instantly. */
export class FakeClock implements Clock {
    sleeps: number[] = [];

    constructor(public time = 1_000) {}

    now(): number {
        return this.time;
    }

    async sleep(ms: number): Promise<void> {
        this.sleeps.push(ms);
        this.time += ms;
    }
}

/** Resolver backed by a fixed table; IP literals resolve to themselves. */
export class FakeResolver {
    calls: string[] = [];

    constructor(private readonly table: Record<string, ResolvedAddress[]> = {}) {}

    readonly resolve: HostResolver = async (hostname) => {
        this.calls.push(hostname);
        const known = this.table[hostname];
        if (known) return known;
        if (/^\d{1,3}(\.\d{1,3}){3}$/.test(hostname)) return [{ address: hostname, family: 4 }];
        if (hostname.includes(":")) return [{ address: hostname, family: 6 }];
        throw new Error(`getaddrinfo ENOTFOUND ${hostname}`);
    };
}

export class FakeFetcher implements PageFetcher {
    readonly name = "fake";
    calls: { url: string; options: RenderOptions }[] = [];
    error: Error | null = null;
    /** When set, render waits for it before answering. */
    gate: Promise<void> | null = null;

    constructor(public html = "<html><head><title>Example</title></head><body><p>Hello</p></body></html>") {}

    async render(url: string, options: RenderOptions): Promise<string> {
        this.calls.push({ url, options });
        if (this.gate) await this.gate;
        if (this.error) throw this.error;
        return this.html;
    }
}

/** Mock provider for testing without real API calls. */
export class MockProvider implements ProviderBase {
    readonly name = "MockProvider";
    readonly config: ProviderConfig = { model: "mock-model" };
    prompts: string[] = [];
    next: Completion | Error = { status: "completed", text: "Mock answer", model: "mock-model" };
    gate: Promise<void> | null = null;

    async complete(prompt: string): Promise<Completion> {
        this.prompts.push(prompt);
        if (this.gate) await this.gate;
        if (this.next instanceof Error) throw this.next;
        return this.next;
    }
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
    let resolve: () => void = () => undefined;
    const promise = new Promise<void>((r) => { resolve = r; });
    return { promise, resolve };
}

export function sampleDocument(overrides: Partial<ScrapedDocument> = {}): ScrapedDocument {
    return {
        title: "Quarterly Report",
        text: "Revenue grew in every region.",
        links: ["/about", "https://example.com/contact"],
        metadata: { description: "Company results", keywords: "revenue, growth" },
        tables: ["Region Revenue North 10 South 12"],
        ...overrides,
    };
}
