import type { GenerateAnswerOptions } from "./types";

export const DEFAULT_SYSTEM_PROMPT = [
    "You are a meticulous assistant that answers questions about the user's PDF documents.",
    "Use only the supplied context to craft your answer.",
    "If the answer cannot be determined from the context, say you do not know.",
].join(" ");

export const ANSWER_PROMPT_TEMPLATE = [
    "Use the following pieces of context to answer the question at the end.",
    "Structure your reply in two parts:",
    "1. Summary: a short answer in one or two sentences.",
    "2. Key points: the supporting details as a bulleted list.",
    "",
    "Context:",
    "{context}",
    "",
    "Question: {question}",
    "",
    "Answer:",
].join("\n");

export function formatContext(texts: string[]): string {
    return texts.join("\n\n");
}

/** Substitutes `{context}` and `{question}` in a single pass so neither value is re-interpreted. */
export function renderAnswerPrompt(context: string, question: string, template = ANSWER_PROMPT_TEMPLATE): string {
    return template.replace(/\{(context|question)\}/g, (_match, key: string) => (key === "context" ? context : question));
}

export interface PromptMessages {
    system?: string;
    user: string;
}

export function buildPromptMessages(options: GenerateAnswerOptions, systemMessageAsUser: boolean): PromptMessages {
    const system = (options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT).trim();
    const user = options.prompt;

    if (!system) {
        return { user };
    }

    if (systemMessageAsUser) {
        return { user: `${system}\n\n${user}` };
    }

    return { system, user };
}
