import type { Logger } from "pino";
import type { LLMClientBundle } from "../llm/types";
import { formatContext, renderAnswerPrompt } from "../llm/prompt";
import type { RetrievedChunk, VectorStore } from "../vectorstore/types";
import { scopedLogger } from "../utils/logger";
import { attempt, fail, ok, type Result } from "../utils/result";
import type { PipelineState } from "./state";

export const NO_CONTEXT_ANSWER = "I could not find relevant context to answer that question.";

export type AnswerFailureReason = "not-ready" | "embedding" | "retrieval" | "generation";

export interface AskAiDependencies {
    llm: LLMClientBundle;
    store: VectorStore;
}

export interface AskAiOptions {
    question: string;
    topK: number;
    temperature?: number;
    systemPrompt?: string;
}

export interface RetrievalResult {
    answer: string;
    sourceChunks: RetrievedChunk[];
}

export type AskAiResult = Result<RetrievalResult, AnswerFailureReason>;

export async function askAi(
    { llm, store }: AskAiDependencies,
    state: PipelineState,
    options: AskAiOptions,
    logger?: Logger
): Promise<AskAiResult> {
    const activeLogger = scopedLogger(logger, { module: "ask" });

    if (state.status !== "ready") {
        return fail("not-ready", new Error("No documents have been indexed yet; questions cannot be answered."));
    }

    activeLogger.debug({ question: options.question }, "Embedding query.");
    const embedded = await attempt("embedding", () => llm.embedding.embedQuery(options.question));
    if (!embedded.ok) {
        activeLogger.error({ err: embedded.error }, "Failed to embed the question.");
        return embedded;
    }

    activeLogger.debug(`Retrieving ${options.topK} similar chunks from "${state.collection}".`);
    const retrieved = await attempt("retrieval", () => store.query(embedded.value, options.topK));
    if (!retrieved.ok) {
        activeLogger.error({ err: retrieved.error }, "Failed to retrieve similar chunks.");
        return retrieved;
    }

    const matches = retrieved.value;
    if (matches.length === 0) {
        activeLogger.warn("No similar chunks found for query.");
        return ok({ answer: NO_CONTEXT_ANSWER, sourceChunks: [] });
    }

    const prompt = renderAnswerPrompt(
        formatContext(matches.map((match) => match.text)),
        options.question
    );

    activeLogger.debug({ matchCount: matches.length }, "Generating answer with retrieved context.");
    const generated = await attempt("generation", () =>
        llm.chat.generateAnswer({
            prompt,
            systemPrompt: options.systemPrompt,
            temperature: options.temperature,
        })
    );
    if (!generated.ok) {
        activeLogger.error({ err: generated.error }, "Failed to generate an answer.");
        return generated;
    }

    return ok({ answer: generated.value, sourceChunks: matches });
}
