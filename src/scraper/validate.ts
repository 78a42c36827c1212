/**
 * Scraper — URL and query validation.
 *
 * Syntactic and policy checks that run before any DNS lookup or fetch.
 * Both functions are pure.
 */

import type { SecurityPolicy } from "./types.js";

export type UrlValidation =
    | { valid: true; url: URL }
    | { valid: false; reason: string };

export type QueryValidation =
    | { valid: true; query: string }
    | { valid: false; reason: string };

function parseUrl(raw: string): URL | null {
    try {
        return new URL(raw);
    } catch {
        return null;
    }
}

/**
 * Validate a candidate URL. Checks run in order and the first failure wins:
 * non-empty, length, parse, scheme, host, blocked host substrings.
 */
export function validateUrl(raw: string, policy: SecurityPolicy): UrlValidation {
    if (!raw) {
        return { valid: false, reason: "URL cannot be empty" };
    }

    if (raw.length > policy.maxUrlLength) {
        return { valid: false, reason: `URL exceeds maximum length of ${policy.maxUrlLength} characters` };
    }

    const url = parseUrl(raw);
    if (!url) {
        return { valid: false, reason: "Invalid URL format" };
    }

    const scheme = url.protocol.replace(/:$/, "").toLowerCase();
    if (!policy.allowedSchemes.includes(scheme)) {
        return { valid: false, reason: `URL scheme must be one of: ${policy.allowedSchemes.join(", ")}` };
    }

    if (!url.host) {
        return { valid: false, reason: "URL must include a host" };
    }

    const hostname = url.hostname.toLowerCase();
    for (const blocked of policy.blockedHosts) {
        if (hostname.includes(blocked.toLowerCase())) {
            return { valid: false, reason: `Access to '${hostname}' is not allowed` };
        }
    }

    return { valid: true, url };
}

/** A query must contain non-whitespace text and fit the length limit. */
export function validateQuery(query: string, policy: Pick<SecurityPolicy, "maxQueryLength">): QueryValidation {
    if (!query.trim()) {
        return { valid: false, reason: "Query cannot be empty" };
    }

    if (query.length > policy.maxQueryLength) {
        return { valid: false, reason: `Query exceeds maximum length of ${policy.maxQueryLength} characters` };
    }

    return { valid: true, query: query.trim() };
}
