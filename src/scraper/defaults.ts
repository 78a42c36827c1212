/**
 * Scraper — defaults.
 */

/** Schemes a scrape target may use. */
export const DEFAULT_ALLOWED_SCHEMES: readonly string[] = ["http", "https"];

/**
 * Hostname substrings that are never scraped. Matched as substrings, so
 * "corp" also rejects "corporate.example.com".
 */
export const DEFAULT_BLOCKED_HOSTS: readonly string[] = [
    "localhost",
    "internal",
    "intranet",
    "corp",
    "local",
];

/** Resolved-address prefixes rejected before classification. */
export const DEFAULT_BLOCKED_IP_PREFIXES: readonly string[] = [
    "127.",             // loopback
    "10.",              // private class A
    "172.16.", "172.17.", "172.18.", "172.19.",
    "172.20.", "172.21.", "172.22.", "172.23.",
    "172.24.", "172.25.", "172.26.", "172.27.",
    "172.28.", "172.29.", "172.30.", "172.31.",
    "192.168.",         // private class C
    "0.",               // "this" network
    "169.254.",         // link-local
    "::1",              // IPv6 loopback
    "fc00:",            // IPv6 unique local
    "fe80:",            // IPv6 link-local
];

export const DEFAULT_MAX_URL_LENGTH = 2048;

export const DEFAULT_MAX_QUERY_LENGTH = 1000;

/** Minimum spacing between two requests to the same domain (seconds). */
export const DEFAULT_RATE_LIMIT_DELAY_SECONDS = 1;

/** Navigation timeout (milliseconds). */
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

/** Extra pause after navigation for late-loading content (milliseconds). */
export const DEFAULT_SETTLE_WAIT_MS = 2_000;

export const DEFAULT_USER_AGENT = "pagechat/0.1 (+https://example.com/contact)";

export const DEFAULT_ACCEPT = "text/html,application/xhtml+xml";
