/**
 * pagechat Providers — Re-export all provider adapters.
 */

export { GoogleProvider, MissingApiKeyError, DEFAULT_GEMINI_MODEL } from "./google-provider.js";
