/**
 * Scraper — shared types.
 */

/** Structured content of one fetched page. */
export interface ScrapedDocument {
    title: string;
    /** Visible text of block, inline and table elements, space-joined. */
    text: string;
    /** Every anchor href in document order, unfiltered. */
    links: string[];
    metadata: {
        description: string;
        keywords: string;
    };
    /** Flattened text of each table in document order. */
    tables: string[];
}

/** URL and address policy applied before any network activity. */
export interface SecurityPolicy {
    allowedSchemes: readonly string[];
    /** Substrings matched case-insensitively against the hostname. */
    blockedHosts: readonly string[];
    /** Prefixes matched against every resolved address. */
    blockedIpPrefixes: readonly string[];
    maxUrlLength: number;
    maxQueryLength: number;
}

export interface RenderOptions {
    /** Sent with the navigation request (User-Agent, Accept, ...). */
    headers: Record<string, string>;
    /** Upper bound for navigation; the render fails once it elapses. */
    timeoutMs: number;
    /** Fixed pause after navigation so late content can load. */
    settleWaitMs: number;
}

/**
 * Renders a URL and returns the final HTML. Implementations own their
 * browser resources and release them whether the render succeeds or not.
 */
export interface PageFetcher {
    readonly name: string;
    render(url: string, options: RenderOptions): Promise<string>;
}
