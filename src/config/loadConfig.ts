import { config as loadDotenv } from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigurationError } from "../utils/errors";
import { LLM_PROVIDER_NAMES, LOG_LEVELS, type AppConfig, type LLMProviderName, type LogLevel } from "./types";

const PACKAGE_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..");

export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 200;
export const DEFAULT_TOP_K = 3;
export const DEFAULT_CHAT_TEMPERATURE = 0.2;

function getEnv(key: string): string;
function getEnv(key: string, required: false): string | undefined;
function getEnv(key: string, required = true): string | undefined {
    const value = process.env[key]?.trim();
    if (required && !value) {
        throw new ConfigurationError(`Missing required environment variable: ${key}`);
    }
    return value || undefined;
}

function getEnvNumber(key: string): number | undefined;
function getEnvNumber(key: string, defaultValue: number): number;
function getEnvNumber(key: string, defaultValue?: number): number | undefined {
    const value = process.env[key]?.trim();
    if (!value) {
        return defaultValue;
    }
    const parsed = Number.parseFloat(value);
    if (Number.isNaN(parsed)) {
        throw new ConfigurationError(`Environment variable ${key} must be a valid number, got: ${value}`);
    }
    return parsed;
}

function getEnvInteger(key: string, defaultValue: number): number {
    const value = getEnvNumber(key, defaultValue);
    if (!Number.isInteger(value)) {
        throw new ConfigurationError(`Environment variable ${key} must be an integer, got: ${value}`);
    }
    return value;
}

function getEnvBoolean(key: string, defaultValue = false): boolean {
    const value = process.env[key];
    if (!value) {
        return defaultValue;
    }
    const lowered = value.toLowerCase().trim();
    return lowered === "true" || lowered === "1" || lowered === "yes";
}

function isProviderName(value: string): value is LLMProviderName {
    return LLM_PROVIDER_NAMES.some((name) => name === value);
}

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

function getProvider(key: string, defaultValue: LLMProviderName): LLMProviderName {
    const value = getEnv(key, false)?.toLowerCase() ?? defaultValue;
    if (!isProviderName(value)) {
        throw new ConfigurationError(
            `Environment variable ${key} must be one of ${LLM_PROVIDER_NAMES.join(", ")}, got: ${value}`
        );
    }
    return value;
}

function getLogLevel(): LogLevel {
    const value = getEnv("FOLIO_LOGGING_LEVEL", false)?.toLowerCase() ?? "info";
    if (!isLogLevel(value)) {
        throw new ConfigurationError(`FOLIO_LOGGING_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got: ${value}`);
    }
    return value;
}

function assertChunking(chunkSize: number, chunkOverlap: number): void {
    if (chunkSize <= 0) {
        throw new ConfigurationError(`FOLIO_CHUNK_SIZE must be greater than zero, got: ${chunkSize}`);
    }
    if (chunkOverlap < 0 || chunkOverlap >= chunkSize) {
        throw new ConfigurationError(
            `FOLIO_CHUNK_OVERLAP must be at least 0 and smaller than FOLIO_CHUNK_SIZE (${chunkSize}), got: ${chunkOverlap}`
        );
    }
}

export function resolveConfigPath(providedPath?: string): string {
    if (providedPath) {
        return path.resolve(process.cwd(), providedPath);
    }

    if (process.env.FOLIO_CONFIG_PATH) {
        return path.resolve(process.cwd(), process.env.FOLIO_CONFIG_PATH);
    }

    return path.join(PACKAGE_ROOT, ".env");
}

export async function loadAppConfig(configPath?: string): Promise<AppConfig> {
    const envPath = configPath ?? resolveConfigPath();
    const result = loadDotenv({ path: envPath });

    if (result.error) {
        // An explicit path must exist; the default .env is optional when the variables are already exported.
        if (configPath) {
            throw new ConfigurationError(`Failed to load environment file from "${configPath}": ${result.error.message}`);
        }
    }

    const chatApiKey = getEnv("FOLIO_LLM_CHAT_API_KEY");

    const chunkSize = getEnvInteger("FOLIO_CHUNK_SIZE", DEFAULT_CHUNK_SIZE);
    const chunkOverlap = getEnvInteger("FOLIO_CHUNK_OVERLAP", DEFAULT_CHUNK_OVERLAP);
    assertChunking(chunkSize, chunkOverlap);

    const topK = getEnvInteger("FOLIO_RETRIEVAL_TOP_K", DEFAULT_TOP_K);
    if (topK <= 0) {
        throw new ConfigurationError(`FOLIO_RETRIEVAL_TOP_K must be greater than zero, got: ${topK}`);
    }

    return {
        logging: {
            level: getLogLevel(),
            pretty: getEnvBoolean("FOLIO_LOGGING_PRETTY", true),
        },
        documents: {
            directory: path.resolve(process.cwd(), getEnv("FOLIO_DOCUMENTS_DIR", false) ?? "./documents"),
            extension: ".pdf",
            chunkSize,
            chunkOverlap,
        },
        vectorStore: {
            url: getEnv("FOLIO_QDRANT_URL", false) ?? "http://localhost:6333",
            apiKey: getEnv("FOLIO_QDRANT_API_KEY", false),
            collection: getEnv("FOLIO_QDRANT_COLLECTION", false) ?? "pdf_documents",
            recreateOnIngest: getEnvBoolean("FOLIO_VECTOR_RECREATE", true),
        },
        retrieval: {
            topK,
        },
        llm: {
            embedding: {
                provider: getProvider("FOLIO_LLM_EMBEDDING_PROVIDER", "google"),
                model: getEnv("FOLIO_LLM_EMBEDDING_MODEL", false) ?? "gemini-embedding-001",
                apiKey: getEnv("FOLIO_LLM_EMBEDDING_API_KEY", false) ?? chatApiKey,
                baseUrl: getEnv("FOLIO_LLM_EMBEDDING_BASE_URL", false),
                limits: {
                    batchSize: getEnvNumber("FOLIO_LLM_EMBEDDING_LIMITS_BATCH_SIZE", 64),
                    concurrency: getEnvNumber("FOLIO_LLM_EMBEDDING_LIMITS_CONCURRENCY", 1),
                    maxRequestsPerMinute: getEnvNumber("FOLIO_LLM_EMBEDDING_LIMITS_MAX_REQUESTS_PER_MINUTE"),
                    maxTokensPerMinute: getEnvNumber("FOLIO_LLM_EMBEDDING_LIMITS_MAX_TOKENS_PER_MINUTE"),
                    retries: getEnvNumber("FOLIO_LLM_EMBEDDING_LIMITS_RETRIES", 0),
                },
            },
            chat: {
                provider: getProvider("FOLIO_LLM_CHAT_PROVIDER", "google"),
                model: getEnv("FOLIO_LLM_CHAT_MODEL", false) ?? "gemini-2.5-flash",
                apiKey: chatApiKey,
                baseUrl: getEnv("FOLIO_LLM_CHAT_BASE_URL", false),
                temperature: getEnvNumber("FOLIO_LLM_CHAT_TEMPERATURE", DEFAULT_CHAT_TEMPERATURE),
                maxOutputTokens: getEnvNumber("FOLIO_LLM_CHAT_MAX_OUTPUT_TOKENS"),
                systemMessageAsUser: getEnvBoolean("FOLIO_LLM_CHAT_SYSTEM_AS_USER", true),
                limits: {
                    concurrency: getEnvNumber("FOLIO_LLM_CHAT_LIMITS_CONCURRENCY", 1),
                    maxRequestsPerMinute: getEnvNumber("FOLIO_LLM_CHAT_LIMITS_MAX_REQUESTS_PER_MINUTE"),
                    maxTokensPerMinute: getEnvNumber("FOLIO_LLM_CHAT_LIMITS_MAX_TOKENS_PER_MINUTE"),
                    retries: getEnvNumber("FOLIO_LLM_CHAT_LIMITS_RETRIES", 0),
                },
            },
        },
    };
}
