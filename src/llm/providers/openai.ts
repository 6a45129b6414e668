import type { Logger } from "pino";
import { createOpenAI } from "@ai-sdk/openai";
import { embedMany, generateText } from "ai";
import { BaseChatProvider, BaseEmbeddingProvider } from "../base";
import { mergeLimits, resolveBaseUrl } from "../limits";
import { buildPromptMessages } from "../prompt";
import type { ChatModelConfig, EmbeddingModelConfig } from "../../config/types";
import type { EmbedOptions, GenerateAnswerOptions } from "../types";

export class OpenAIEmbeddingProvider extends BaseEmbeddingProvider {
    private readonly sdk: ReturnType<typeof createOpenAI>;

    constructor(config: EmbeddingModelConfig, logger?: Logger) {
        if (!config.apiKey) {
            throw new Error("OpenAI API key is required for embeddings.");
        }

        super(
            config,
            mergeLimits(
                {
                    batchSize: 100,
                    concurrency: 1,
                    maxRequestsPerMinute: 1_500,
                    maxTokensPerMinute: 1_000_000,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createOpenAI({
            apiKey: config.apiKey,
            baseURL: resolveBaseUrl(config.baseUrl),
        });
    }

    protected async sendEmbeddingRequest(texts: string[], options?: EmbedOptions): Promise<number[][]> {
        const { embeddings } = await embedMany({
            model: this.sdk.embedding(this.config.model),
            values: texts,
            abortSignal: options?.signal,
        });

        return embeddings;
    }
}

export class OpenAIChatProvider extends BaseChatProvider {
    private readonly sdk: ReturnType<typeof createOpenAI>;

    constructor(config: ChatModelConfig, logger?: Logger) {
        if (!config.apiKey) {
            throw new Error("OpenAI API key is required for chat completions.");
        }

        super(
            config,
            mergeLimits(
                {
                    concurrency: 1,
                    maxRequestsPerMinute: 500,
                    maxTokensPerMinute: 90_000,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createOpenAI({
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
