import type { AskAiResult } from "./askAi";

export const EXIT_COMMANDS: readonly string[] = ["exit", "quit", "q"];

export function isExitCommand(input: string): boolean {
    return EXIT_COMMANDS.includes(input.toLowerCase());
}

export interface InteractiveLoopOptions {
    /** Resolves to the next line of input, or null once input has ended. */
    readQuestion: () => Promise<string | null>;
    answer: (question: string) => Promise<AskAiResult>;
    print: (text: string) => void;
}

export function formatAnswer(result: AskAiResult): string {
    if (!result.ok) {
        return result.reason === "not-ready"
            ? `Not ready: ${result.error.message}`
            : `Could not answer (${result.reason} failed): ${result.error.message}`;
    }

    const { answer, sourceChunks } = result.value;
    if (sourceChunks.length === 0) {
        return answer;
    }

    const sources = sourceChunks.map(
        (chunk, index) => `  ${index + 1}. ${chunk.sourceFile} p.${chunk.metadata.page ?? "?"} (score ${chunk.score.toFixed(3)})`
    );
    return [answer, "", "Sources:", ...sources].join("\n");
}

/** Answers questions one at a time until an exit command or end of input. Returns the number of questions asked. */
export async function runInteractiveLoop({ readQuestion, answer, print }: InteractiveLoopOptions): Promise<number> {
    let asked = 0;

    for (;;) {
        const question = await readQuestion();
        if (question === null || isExitCommand(question)) {
            return asked;
        }

        asked += 1;
        print(formatAnswer(await answer(question)));
    }
}
