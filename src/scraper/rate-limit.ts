/**
 * Scraper — per-domain rate limiting.
 *
 * Enforces a minimum spacing between requests to the same domain. One
 * limiter instance is meant to be shared by every session in the process;
 * callers for the same domain are serialized so the read-modify-write of
 * a ledger entry never interleaves.
 */

import { createLogger } from "../utils/logger.js";

const log = createLogger("RateLimiter");

export interface Clock {
    now(): number;
    sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
    now: () => Date.now(),
    sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

interface LedgerEntry {
    /** Epoch ms of the last recorded request; null until the first one. */
    lastRequestAt: number | null;
    delayMs: number;
}

/** Domain key for a URL: hostname plus port when it is not the scheme default. */
export function domainOf(url: URL): string {
    return url.host.toLowerCase();
}

export class DomainRateLimiter {
    private readonly ledger = new Map<string, LedgerEntry>();
    private readonly locks = new Map<string, Promise<void>>();
    private readonly defaultDelayMs: number;
    private readonly clock: Clock;

    constructor(defaultDelaySeconds: number, clock: Clock = systemClock) {
        if (!Number.isFinite(defaultDelaySeconds) || defaultDelaySeconds < 0) {
            throw new RangeError(`Rate-limit delay must be a non-negative number of seconds, got ${defaultDelaySeconds}`);
        }
        this.defaultDelayMs = defaultDelaySeconds * 1000;
        this.clock = clock;
    }

    /**
     * Wait until `domain` may be contacted again, then record the request.
     * Resolves once the request slot is claimed.
     */
    async waitIfNeeded(domain: string): Promise<void> {
        const previous = this.locks.get(domain) ?? Promise.resolve();

        let release: () => void = () => undefined;
        const current = new Promise<void>((resolve) => { release = resolve; });
        const tail = previous.then(() => current);
        this.locks.set(domain, tail);

        try {
            await previous;
            await this.claim(domain);
        } finally {
            release();
            if (this.locks.get(domain) === tail) this.locks.delete(domain);
        }
    }

    private async claim(domain: string): Promise<void> {
        const entry = this.entry(domain);

        const elapsed = entry.lastRequestAt === null
            ? Number.POSITIVE_INFINITY
            : this.clock.now() - entry.lastRequestAt;

        if (elapsed < entry.delayMs) {
            const waitMs = entry.delayMs - elapsed;
            log.debug(`Sleeping ${(waitMs / 1000).toFixed(2)}s for ${domain}`);
            await this.clock.sleep(waitMs);
        }

        entry.lastRequestAt = this.clock.now();
    }

    private entry(domain: string): LedgerEntry {
        let entry = this.ledger.get(domain);
        if (!entry) {
            entry = { lastRequestAt: null, delayMs: this.defaultDelayMs };
            this.ledger.set(domain, entry);
        }
        return entry;
    }

    /** Epoch ms of the last recorded request, or `undefined` if never seen. */
    lastRequestAt(domain: string): number | undefined {
        return this.ledger.get(domain)?.lastRequestAt ?? undefined;
    }

    get delayMs(): number {
        return this.defaultDelayMs;
    }

    get domains(): string[] {
        return [...this.ledger.keys()];
    }
}
