import type { Interface } from "node:readline";

export const QUESTION_PROMPT = "\nQuestion (exit, quit or q to leave): ";

/**
 * Reads one line per call from `rl`, or null once input has ended. Lines that
 * arrive while a question is being answered are buffered by the iterator.
 */
export function createQuestionReader(rl: Interface, prompt = QUESTION_PROMPT): () => Promise<string | null> {
    const lines = rl[Symbol.asyncIterator]();
    let closed = false;
    rl.once("close", () => {
        closed = true;
    });
    rl.setPrompt(prompt);

    return async () => {
        if (!closed) {
            rl.prompt();
        }
        const next = await lines.next();
        return next.done ? null : next.value;
    };
}
