/**
 * pagechat Config Loader — defaults, YAML file and environment overlay.
 * Supports .env files and ${ENV_VAR} resolution inside the YAML file.
 */

import { readFileSync, existsSync } from "node:fs";
import { resolve, dirname, join } from "node:path";
import YAML from "yaml";
import dotenv from "dotenv";
import type { PageFetcher, SecurityPolicy } from "../scraper/types.js";
import {
    DEFAULT_ACCEPT, DEFAULT_ALLOWED_SCHEMES, DEFAULT_BLOCKED_HOSTS, DEFAULT_BLOCKED_IP_PREFIXES,
    DEFAULT_MAX_QUERY_LENGTH, DEFAULT_MAX_URL_LENGTH, DEFAULT_RATE_LIMIT_DELAY_SECONDS,
    DEFAULT_REQUEST_TIMEOUT_MS, DEFAULT_SETTLE_WAIT_MS, DEFAULT_USER_AGENT,
} from "../scraper/defaults.js";
import { ContentAnalyzer, DEFAULT_ANALYSIS_LIMITS } from "../core/analyzer.js";
import { ScrapeOrchestrator } from "../core/orchestrator.js";
import type { ProviderBase } from "../core/provider.js";
import { DomainRateLimiter } from "../scraper/rate-limit.js";
import { SsrfGuard, type HostResolver } from "../scraper/ssrf.js";
import { ChromePageFetcher } from "../plugins/browser.js";
import { DEFAULT_GEMINI_MODEL, GoogleProvider } from "../providers/google-provider.js";
import { createLogger } from "./logger.js";

const log = createLogger("Config");

export const DEFAULT_CONFIG_FILE = "pagechat.yaml";

export interface ScraperSettings {
    headless: boolean;
    /** Chrome executable; discovered when unset. */
    chromePath?: string;
    /** Pause after navigation (ms). */
    settleWaitMs: number;
    /** Navigation and DevTools command timeout (ms). */
    timeoutMs: number;
    /** Minimum spacing between requests to one domain (seconds). */
    rateLimitDelaySeconds: number;
    userAgent: string;
    accept: string;
}

export interface AnalysisSettings {
    apiKey?: string;
    model: string;
    temperature?: number;
    /** Cap on generated tokens; the model's own limit when unset. */
    maxTokens?: number;
    maxContentChars: number;
    maxTables: number;
}

export interface AppConfig {
    scraper: ScraperSettings;
    analysis: AnalysisSettings;
    security: SecurityPolicy;
    /** Absolute path of the YAML file that was applied, if any. */
    source?: string;
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

export function defaultConfig(): AppConfig {
    return {
        scraper: {
            headless: true,
            settleWaitMs: DEFAULT_SETTLE_WAIT_MS,
            timeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
            rateLimitDelaySeconds: DEFAULT_RATE_LIMIT_DELAY_SECONDS,
            userAgent: DEFAULT_USER_AGENT,
            accept: DEFAULT_ACCEPT,
        },
        analysis: {
            model: DEFAULT_GEMINI_MODEL,
            maxContentChars: DEFAULT_ANALYSIS_LIMITS.maxContentChars,
            maxTables: DEFAULT_ANALYSIS_LIMITS.maxTables,
        },
        security: {
            allowedSchemes: [...DEFAULT_ALLOWED_SCHEMES],
            blockedHosts: [...DEFAULT_BLOCKED_HOSTS],
            blockedIpPrefixes: [...DEFAULT_BLOCKED_IP_PREFIXES],
            maxUrlLength: DEFAULT_MAX_URL_LENGTH,
            maxQueryLength: DEFAULT_MAX_QUERY_LENGTH,
        },
    };
}

/**
 * Resolve ${ENV_VAR} references. Unset variables resolve to "".
 */
export function resolveEnvVars(value: string, env: NodeJS.ProcessEnv = process.env): string {
    return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_, name: string) => env[name] ?? "");
}

// ── YAML readers ───────────────────────────────────────────────

type Mapping = Record<string, unknown>;

function isMapping(value: unknown): value is Mapping {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

class SectionReader {
    constructor(
        private readonly values: Mapping,
        private readonly where: string,
        private readonly env: NodeJS.ProcessEnv,
    ) {}

    static of(root: Mapping, name: string, env: NodeJS.ProcessEnv): SectionReader {
        const section = root[name];
        if (section === undefined || section === null) return new SectionReader({}, name, env);
        if (!isMapping(section)) throw new ConfigError(`Invalid config: '${name}' must be a mapping`);
        return new SectionReader(section, name, env);
    }

    string(key: string): string | undefined {
        const value = this.values[key];
        if (value === undefined || value === null) return undefined;
        if (typeof value !== "string") throw this.invalid(key, "a string");
        return resolveEnvVars(value, this.env);
    }

    number(key: string, min = 0): number | undefined {
        const raw = this.values[key];
        if (raw === undefined || raw === null) return undefined;
        const value = typeof raw === "string" ? Number(resolveEnvVars(raw, this.env)) : raw;
        if (typeof value !== "number" || !Number.isFinite(value) || value < min) {
            throw this.invalid(key, `a number ≥ ${min}`);
        }
        return value;
    }

    boolean(key: string): boolean | undefined {
        const value = this.values[key];
        if (value === undefined || value === null) return undefined;
        if (typeof value !== "boolean") throw this.invalid(key, "true or false");
        return value;
    }

    stringList(key: string): string[] | undefined {
        const value = this.values[key];
        if (value === undefined || value === null) return undefined;
        if (!Array.isArray(value)) throw this.invalid(key, "a list of strings");
        return value.map((item) => {
            if (typeof item !== "string") throw this.invalid(key, "a list of strings");
            return resolveEnvVars(item, this.env);
        });
    }

    private invalid(key: string, expected: string): ConfigError {
        return new ConfigError(`Invalid config: '${this.where}.${key}' must be ${expected}`);
    }
}

function applyFile(config: AppConfig, root: Mapping, env: NodeJS.ProcessEnv): void {
    const scraper = SectionReader.of(root, "scraper", env);
    const analysis = SectionReader.of(root, "analysis", env);
    const security = SectionReader.of(root, "security", env);

    const s = config.scraper;
    s.headless = scraper.boolean("headless") ?? s.headless;
    s.chromePath = scraper.string("chrome_path") || s.chromePath;
    s.settleWaitMs = scraper.number("page_wait_ms") ?? s.settleWaitMs;
    s.timeoutMs = scraper.number("timeout_ms", 1) ?? s.timeoutMs;
    s.rateLimitDelaySeconds = scraper.number("rate_limit_delay") ?? s.rateLimitDelaySeconds;
    s.userAgent = scraper.string("user_agent") ?? s.userAgent;
    s.accept = scraper.string("accept") ?? s.accept;

    const a = config.analysis;
    a.apiKey = analysis.string("api_key") || a.apiKey;
    a.model = analysis.string("model") || a.model;
    a.temperature = analysis.number("temperature") ?? a.temperature;
    a.maxTokens = analysis.number("max_tokens", 1) ?? a.maxTokens;
    a.maxContentChars = analysis.number("max_content_chars") ?? a.maxContentChars;
    a.maxTables = analysis.number("max_tables") ?? a.maxTables;

    const p = config.security;
    config.security = {
        allowedSchemes: security.stringList("allowed_schemes")?.map((v) => v.toLowerCase()) ?? p.allowedSchemes,
        blockedHosts: security.stringList("blocked_hosts") ?? p.blockedHosts,
        blockedIpPrefixes: security.stringList("blocked_ip_prefixes") ?? p.blockedIpPrefixes,
        maxUrlLength: security.number("max_url_length", 1) ?? p.maxUrlLength,
        maxQueryLength: security.number("max_query_length", 1) ?? p.maxQueryLength,
    };
}

function envNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
    const raw = env[name];
    if (raw === undefined || raw.trim() === "") return undefined;
    const value = Number(raw);
    if (!Number.isFinite(value) || value < 0) {
        throw new ConfigError(`Invalid ${name}: expected a non-negative number, got '${raw}'`);
    }
    return value;
}

function applyEnv(config: AppConfig, env: NodeJS.ProcessEnv): void {
    if (env.GEMINI_API_KEY) config.analysis.apiKey = env.GEMINI_API_KEY;
    if (env.GEMINI_MODEL) config.analysis.model = env.GEMINI_MODEL;
    if (env.CHROME_PATH) config.scraper.chromePath = env.CHROME_PATH;
    config.scraper.rateLimitDelaySeconds = envNumber(env, "RATE_LIMIT_DELAY") ?? config.scraper.rateLimitDelaySeconds;
    config.scraper.settleWaitMs = envNumber(env, "PAGE_WAIT_TIMEOUT") ?? config.scraper.settleWaitMs;
}

// ── Loading ────────────────────────────────────────────────────

export interface LoadConfigOptions {
    /** YAML file; must exist when given. */
    path?: string;
    /** Environment to read; when omitted, `.env` is loaded into process.env first. */
    env?: NodeJS.ProcessEnv;
    /** Where to look for pagechat.yaml and .env. Default: process.cwd() */
    cwd?: string;
}

function findConfigFile(options: LoadConfigOptions): string | undefined {
    if (options.path) {
        const fullPath = resolve(options.cwd ?? process.cwd(), options.path);
        if (!existsSync(fullPath)) throw new ConfigError(`Config not found: ${fullPath}`);
        return fullPath;
    }
    const fallback = join(options.cwd ?? process.cwd(), DEFAULT_CONFIG_FILE);
    return existsSync(fallback) ? fallback : undefined;
}

function parseFile(fullPath: string): Mapping {
    let parsed: unknown;
    try {
        parsed = YAML.parse(readFileSync(fullPath, "utf-8"));
    } catch (err) {
        throw new ConfigError(`Invalid YAML in ${fullPath}: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (parsed === null || parsed === undefined) return {};
    if (!isMapping(parsed)) throw new ConfigError(`Invalid config: ${fullPath} must contain a mapping`);
    return parsed;
}

/**
 * Build the effective configuration: defaults, then the YAML file, then
 * environment variables.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
    const file = findConfigFile(options);

    let env = options.env;
    if (!env) {
        // Auto-load .env from the config directory
        const envPath = join(file ? dirname(file) : options.cwd ?? process.cwd(), ".env");
        if (existsSync(envPath)) {
            dotenv.config({ path: envPath });
            log.debug(`Loaded .env from ${envPath}`);
        }
        env = process.env;
    }

    const config = defaultConfig();
    if (file) {
        applyFile(config, parseFile(file), env);
        config.source = file;
        log.debug(`Applied ${file}`);
    }
    applyEnv(config, env);

    return config;
}

/** The configured Gemini API key, or a ConfigError naming the variable. */
export function requireApiKey(config: AppConfig): string {
    const key = config.analysis.apiKey;
    if (!key) {
        throw new ConfigError("GEMINI_API_KEY not found in environment variables");
    }
    return key;
}

// ── Wiring ─────────────────────────────────────────────────────

export interface BuildOverrides {
    /** Share one limiter between orchestrators; a new one is created otherwise. */
    rateLimiter?: DomainRateLimiter;
    fetcher?: PageFetcher;
    provider?: ProviderBase;
    resolver?: HostResolver;
}

export function buildProviderFromConfig(analysis: AnalysisSettings): GoogleProvider {
    return new GoogleProvider({
        apiKey: analysis.apiKey,
        model: analysis.model,
        temperature: analysis.temperature,
        maxTokens: analysis.maxTokens,
    });
}

/**
 * Build a ScrapeOrchestrator from parsed config.
 */
export function buildOrchestratorFromConfig(config: AppConfig, overrides: BuildOverrides = {}): ScrapeOrchestrator {
    const { scraper, analysis, security } = config;
    const provider = overrides.provider ?? buildProviderFromConfig(analysis);

    return new ScrapeOrchestrator({
        policy: security,
        guard: new SsrfGuard({ blockedIpPrefixes: security.blockedIpPrefixes, resolver: overrides.resolver }),
        rateLimiter: overrides.rateLimiter ?? new DomainRateLimiter(scraper.rateLimitDelaySeconds),
        fetcher: overrides.fetcher ?? new ChromePageFetcher({
            executablePath: scraper.chromePath,
            headless: scraper.headless,
        }),
        analyzer: new ContentAnalyzer(provider, {
            maxContentChars: analysis.maxContentChars,
            maxTables: analysis.maxTables,
        }),
        render: {
            headers: { "User-Agent": scraper.userAgent, "Accept": scraper.accept },
            timeoutMs: scraper.timeoutMs,
            settleWaitMs: scraper.settleWaitMs,
        },
    });
}
