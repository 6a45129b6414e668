export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggingConfig {
    level: LogLevel;
    pretty: boolean;
}

export interface DocumentsConfig {
    directory: string;
    extension: string;
    chunkSize: number;
    chunkOverlap: number;
}

export interface VectorStoreConfig {
    url: string;
    apiKey?: string;
    collection: string;
    recreateOnIngest: boolean;
}

export interface RetrievalConfig {
    topK: number;
}

export const LLM_PROVIDER_NAMES = ["google", "openai"] as const;

export type LLMProviderName = (typeof LLM_PROVIDER_NAMES)[number];

export interface ProviderLimitsConfig {
    batchSize?: number;
    concurrency?: number;
    maxRequestsPerMinute?: number;
    maxTokensPerMinute?: number;
    retries?: number;
}

interface BaseModelConfig {
    provider: LLMProviderName;
    model: string;
    apiKey?: string;
    baseUrl?: string;
    limits?: ProviderLimitsConfig;
}

export type EmbeddingModelConfig = BaseModelConfig;

export interface ChatModelConfig extends BaseModelConfig {
    maxOutputTokens?: number;
    temperature: number;
    /** Fold the system instructions into the user turn for models without a system role. */
    systemMessageAsUser: boolean;
}

export interface LLMConfig {
    embedding: EmbeddingModelConfig;
    chat: ChatModelConfig;
}

export interface AppConfig {
    logging: LoggingConfig;
    documents: DocumentsConfig;
    vectorStore: VectorStoreConfig;
    retrieval: RetrievalConfig;
    llm: LLMConfig;
}
