import pLimit from "p-limit";
import pRetry, { type FailedAttemptError } from "p-retry";
import type Bottleneck from "bottleneck";
import type { Logger } from "pino";
import type { ChatModelConfig, EmbeddingModelConfig } from "../config/types";
import { countTokens, countTokensInBatch } from "../utils/tokenEncoder";
import { createRateLimiter, splitIntoBatches, type ProviderRateLimits } from "./limits";
import type { ChatProvider, EmbedOptions, EmbeddingProvider, GenerateAnswerOptions } from "./types";

const DIMENSION_PROBE_TEXT = "dimension probe";

interface ScheduleOptions {
    logPrefix: string;
    signal?: AbortSignal;
}

/**
 * Shared request scheduling for hosted providers: a request limiter, an
 * optional tokens-per-minute limiter and p-retry around every request.
 */
abstract class ScheduledProvider {
    protected readonly concurrencyLimit: number;
    protected readonly retries: number;

    private readonly requestLimiter: Bottleneck;
    private readonly tokenLimiter?: Bottleneck;

    protected constructor(limits: ProviderRateLimits, protected readonly logger?: Logger) {
        this.retries = Math.max(0, limits.retries ?? 0);
        this.concurrencyLimit = Math.max(1, limits.concurrency ?? 1);

        this.requestLimiter = createRateLimiter(this.concurrencyLimit, limits.maxRequestsPerMinute);

        if (limits.maxTokensPerMinute && Number.isFinite(limits.maxTokensPerMinute)) {
            const tokenConcurrency = Math.max(this.concurrencyLimit, Math.ceil(limits.maxTokensPerMinute));
            this.tokenLimiter = createRateLimiter(tokenConcurrency, limits.maxTokensPerMinute);
        }
    }

    protected get tracksTokens(): boolean {
        return this.tokenLimiter !== undefined;
    }

    protected async scheduleWithRateLimits<T>(
        tokens: number,
        task: () => Promise<T>,
        { logPrefix, signal }: ScheduleOptions
    ): Promise<T> {
        await this.reserveTokens(tokens);
        return this.requestLimiter.schedule(() =>
            pRetry(task, {
                retries: this.retries,
                signal,
                onFailedAttempt: (error: FailedAttemptError) => {
                    this.logger?.warn(
                        {
                            attemptNumber: error.attemptNumber,
                            retriesLeft: error.retriesLeft,
                            error: error.message,
                        },
                        `${logPrefix} failed attempt`
                    );
                },
            })
        );
    }

    private async reserveTokens(tokens: number): Promise<void> {
        if (!this.tokenLimiter || tokens <= 0) {
            return;
        }

        const weight = Math.max(1, Math.ceil(tokens));
        await this.tokenLimiter.schedule({ weight }, async () => undefined);
    }
}

export abstract class BaseEmbeddingProvider extends ScheduledProvider implements EmbeddingProvider {
    protected readonly batchSize: number;
    private dimension?: number;

    constructor(
        public readonly config: EmbeddingModelConfig,
        limits: ProviderRateLimits,
        logger?: Logger
    ) {
        super(limits, logger);
        this.batchSize = Math.max(1, limits.batchSize ?? 50);
    }

    async embedDocuments(texts: string[], options?: EmbedOptions): Promise<number[][]> {
        if (texts.length === 0) {
            return [];
        }

        const batches = splitIntoBatches(texts, this.batchSize).map((batch, idx) => ({
            idx,
            batch,
            tokens: this.tracksTokens ? countTokensInBatch(batch, this.config.model) : 0,
        }));

        const limit = pLimit(this.concurrencyLimit);
        const logPrefix = `${this.config.provider}:embed`;
        const results = await Promise.all(
            batches.map(({ batch, idx, tokens }) =>
                limit(async () => {
                    const embeddings = await this.scheduleWithRateLimits(
                        tokens,
                        () => this.sendEmbeddingRequest(batch, options),
                        { logPrefix, signal: options?.signal }
                    );

                    if (embeddings.length !== batch.length) {
                        throw new Error(
                            `${logPrefix} returned ${embeddings.length} vectors for a batch of ${batch.length} texts.`
                        );
                    }

                    return { idx, embeddings };
                })
            )
        );

        const ordered = results.sort((a, b) => a.idx - b.idx);
        return ordered.flatMap((entry) => entry.embeddings);
    }

    async embedQuery(text: string, options?: EmbedOptions): Promise<number[]> {
        const [embedding] = await this.embedDocuments([text], options);
        if (!embedding) {
            throw new Error(`${this.config.provider}:embed returned no vector for the query.`);
        }
        return embedding;
    }

    async resolveDimension(): Promise<number> {
        if (this.dimension === undefined) {
            const probe = await this.embedQuery(DIMENSION_PROBE_TEXT);
            if (probe.length === 0) {
                throw new Error(`Embedding model "${this.config.model}" returned an empty vector.`);
            }
            this.dimension = probe.length;
            this.logger?.debug({ dimension: this.dimension }, "Resolved embedding dimension.");
        }
        return this.dimension;
    }

    protected abstract sendEmbeddingRequest(texts: string[], options?: EmbedOptions): Promise<number[][]>;
}

export abstract class BaseChatProvider extends ScheduledProvider implements ChatProvider {
    constructor(
        public readonly config: ChatModelConfig,
        limits: ProviderRateLimits,
        logger?: Logger
    ) {
        super(limits, logger);
    }

    async generateAnswer(options: GenerateAnswerOptions): Promise<string> {
        const tokens = this.tracksTokens ? this.estimateChatTokens(options) : 0;
        return this.scheduleWithRateLimits(tokens, () => this.complete(options), {
            logPrefix: `${this.config.provider}:chat`,
            signal: options.signal,
        });
    }

    protected estimateChatTokens(options: GenerateAnswerOptions): number {
        const model = this.config.model;
        let tokens = countTokens(options.prompt, model);

        if (options.systemPrompt) {
            tokens += countTokens(options.systemPrompt, model);
        }

        tokens += options.maxTokens ?? this.config.maxOutputTokens ?? 2000;
        return tokens;
    }

    protected abstract complete(options: GenerateAnswerOptions): Promise<string>;
}
