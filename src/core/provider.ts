/**
 * pagechat Provider Abstraction — generative-text provider interface.
 *
 * The analyzer talks to providers only through this interface. Adapters
 * translate vendor responses into a `Completion`, so refusals reach the
 * core as data instead of vendor-specific exceptions. Transport and API
 * failures are still thrown.
 */

export interface ProviderConfig {
    apiKey?: string;
    model?: string;
    temperature?: number;
    maxTokens?: number;
}

export interface TokenUsage {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
}

export type Completion =
    /** The provider produced output; `text` may still be empty. */
    | { status: "completed"; text: string; model: string; usage?: TokenUsage }
    /** The prompt itself was refused by a safety filter. */
    | { status: "blocked"; reason: string; model: string }
    /** Generation started but was cut off for policy reasons. */
    | { status: "stopped"; reason: string; model: string };

/**
 * Every provider must implement this interface.
 */
export interface ProviderBase {
    readonly name: string;
    readonly config: ProviderConfig;
    complete(prompt: string): Promise<Completion>;
}
