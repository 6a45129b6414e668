import type { ChatModelConfig, EmbeddingModelConfig } from "../config/types";

export interface EmbedOptions {
    signal?: AbortSignal;
}

export interface GenerateAnswerOptions {
    prompt: string;
    systemPrompt?: string;
    temperature?: number;
    maxTokens?: number;
    signal?: AbortSignal;
}

export interface EmbeddingProvider {
    readonly config: EmbeddingModelConfig;
    embedDocuments(texts: string[], options?: EmbedOptions): Promise<number[][]>;
    embedQuery(text: string, options?: EmbedOptions): Promise<number[]>;
    /** Length of the vectors this provider produces, discovered on first use. */
    resolveDimension(): Promise<number>;
}

export interface ChatProvider {
    readonly config: ChatModelConfig;
    generateAnswer(options: GenerateAnswerOptions): Promise<string>;
}

export interface LLMClientBundle {
    embedding: EmbeddingProvider;
    chat: ChatProvider;
}
