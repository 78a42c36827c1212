/**
 * Scraper — request-safety gates, rate limiting and content extraction.
 */

export { validateUrl, validateQuery, type UrlValidation, type QueryValidation } from "./validate.js";
export {
    SsrfGuard, classifyAddress, systemResolver,
    type SsrfCheck, type SsrfRule, type SsrfGuardConfig, type HostResolver, type ResolvedAddress, type AddressCategory,
} from "./ssrf.js";
export { DomainRateLimiter, domainOf, systemClock, type Clock } from "./rate-limit.js";
export { extractDocument } from "./extract.js";
export { formatScrapeSummary } from "./format.js";
export * from "./defaults.js";
export type { ScrapedDocument, SecurityPolicy, RenderOptions, PageFetcher } from "./types.js";
