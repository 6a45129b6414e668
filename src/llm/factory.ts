import type { Logger } from "pino";
import type { ChatModelConfig, EmbeddingModelConfig, LLMConfig, LLMProviderName } from "../config/types";
import { scopedLogger } from "../utils/logger";
import { GoogleChatProvider, GoogleEmbeddingProvider } from "./providers/google";
import { OpenAIChatProvider, OpenAIEmbeddingProvider } from "./providers/openai";
import type { ChatProvider, EmbeddingProvider, LLMClientBundle } from "./types";

type ProviderRegistry<TConfig, TProvider> = Record<LLMProviderName, new (config: TConfig, logger?: Logger) => TProvider>;

const EMBEDDING_PROVIDERS: ProviderRegistry<EmbeddingModelConfig, EmbeddingProvider> = {
    google: GoogleEmbeddingProvider,
    openai: OpenAIEmbeddingProvider,
};

const CHAT_PROVIDERS: ProviderRegistry<ChatModelConfig, ChatProvider> = {
    google: GoogleChatProvider,
    openai: OpenAIChatProvider,
};

export function createEmbeddingProvider(config: EmbeddingModelConfig, logger?: Logger): EmbeddingProvider {
    const Provider = EMBEDDING_PROVIDERS[config.provider];
    return new Provider(config, scopedLogger(logger, { module: "llm", scope: "embedding", provider: config.provider }));
}

export function createChatProvider(config: ChatModelConfig, logger?: Logger): ChatProvider {
    const Provider = CHAT_PROVIDERS[config.provider];
    return new Provider(config, scopedLogger(logger, { module: "llm", scope: "chat", provider: config.provider }));
}

export function createLLMClient(config: LLMConfig, logger?: Logger): LLMClientBundle {
    return {
        embedding: createEmbeddingProvider(config.embedding, logger),
        chat: createChatProvider(config.chat, logger),
    };
}
