/**
 * pagechat — scrape a web page and chat about its content.
 * @module pagechat
 */

// Core
export {
  ScrapeOrchestrator,
  type ScrapeState, type StateTransition, type TransitionObserver, type OrchestratorDeps,
} from "./core/orchestrator.js";
export { ScrapeSession, type ChatTurn } from "./core/session.js";
export {
  ContentAnalyzer, buildAnalysisPrompt, DEFAULT_ANALYSIS_LIMITS,
  type AnalysisLimits,
} from "./core/analyzer.js";
export {
  type ProviderBase, type ProviderConfig, type Completion, type TokenUsage,
} from "./core/provider.js";
export {
  describeFailure, errorMessage, succeed, fail,
  type Outcome, type ScrapeFailure, type AnalysisFailure, type AskFailure,
  type SessionFailure, type PipelineFailure, type FailureKind,
} from "./core/errors.js";

// Scraper
export * from "./scraper/index.js";

// Providers
export { GoogleProvider, MissingApiKeyError, DEFAULT_GEMINI_MODEL } from "./providers/index.js";

// Plugins
export { ChromePageFetcher, findChrome, type BrowserConfig } from "./plugins/browser.js";
export { CdpConnection, CdpError, type CdpEvent, type CdpPayload } from "./plugins/cdp.js";

// Utils
export {
  loadConfig, defaultConfig, requireApiKey, resolveEnvVars, buildOrchestratorFromConfig, buildProviderFromConfig, ConfigError,
  type AppConfig, type ScraperSettings, type AnalysisSettings, type LoadConfigOptions, type BuildOverrides,
} from "./utils/config.js";
export { Logger, LogLevel, createLogger, setGlobalLogLevel, parseLogLevel, type LogFields } from "./utils/logger.js";

export const VERSION = "0.1.0";
