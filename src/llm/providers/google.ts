import type { Logger } from "pino";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { embedMany, generateText } from "ai";
import { BaseChatProvider, BaseEmbeddingProvider } from "../base";
import { mergeLimits, resolveBaseUrl } from "../limits";
import { buildPromptMessages } from "../prompt";
import type { ChatModelConfig, EmbeddingModelConfig } from "../../config/types";
import type { EmbedOptions, GenerateAnswerOptions } from "../types";

export class GoogleEmbeddingProvider extends BaseEmbeddingProvider {
    private readonly sdk: ReturnType<typeof createGoogleGenerativeAI>;

    constructor(config: EmbeddingModelConfig, logger?: Logger) {
        if (!config.apiKey) {
            throw new Error("Google Generative AI API key is required for embeddings.");
        }

        super(
            config,
            mergeLimits(
                {
                    batchSize: 64,
                    concurrency: 1,
                    maxRequestsPerMinute: 300,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createGoogleGenerativeAI({
            apiKey: config.apiKey,
            baseURL: resolveBaseUrl(config.baseUrl),
        });
    }

    protected async sendEmbeddingRequest(texts: string[], options?: EmbedOptions): Promise<number[][]> {
        const model = this.sdk.textEmbeddingModel(this.config.model);
        const { embeddings } = await embedMany({
            model,
            values: texts,
            abortSignal: options?.signal,
        });

        return embeddings;
    }
}

export class GoogleChatProvider extends BaseChatProvider {
    private readonly sdk: ReturnType<typeof createGoogleGenerativeAI>;

    constructor(config: ChatModelConfig, logger?: Logger) {
        if (!config.apiKey) {
            throw new Error("Google Generative AI API key is required for chat completions.");
        }

        super(
            config,
            mergeLimits(
                {
                    concurrency: 1,
                    maxRequestsPerMinute: 90,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createGoogleGenerativeAI({
            apiKey: config.apiKey,
            baseURL: resolveBaseUrl(config.baseUrl),
        });
    }

    protected async complete(options: GenerateAnswerOptions): Promise<string> {
        const { system, user } = buildPromptMessages(options, this.config.systemMessageAsUser);

        const { text } = await generateText({
            model: this.sdk(this.config.model),
            system,
            prompt: user,
            temperature: options.temperature ?? this.config.temperature,
            maxTokens: options.maxTokens ?? this.config.maxOutputTokens,
            abortSignal: options.signal,
        });

        return text;
    }
}
