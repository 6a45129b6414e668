import { encoding_for_model, get_encoding, type Tiktoken, type TiktokenModel } from "tiktoken";

const TOKENIZER_FALLBACK = "cl100k_base";
const encoderCache = new Map<string, Tiktoken>();

function getEncoder(model: string): Tiktoken {
    const key = model.toLowerCase();
    const cached = encoderCache.get(key);
    if (cached) {
        return cached;
    }

    let encoder: Tiktoken;
    try {
        // Throws for model names tiktoken does not know, which includes every non-OpenAI model.
        encoder = encoding_for_model(key as TiktokenModel);
    } catch {
        encoder = get_encoding(TOKENIZER_FALLBACK);
    }

    encoderCache.set(key, encoder);
    return encoder;
}

export function countTokens(text: string, model: string): number {
    if (!text) return 0;
    try {
        // Special tokens in document text are encoded as ordinary text.
        return getEncoder(model).encode(text, [], []).length;
    } catch {
        return Math.ceil(text.length / 4);
    }
}

export function countTokensInBatch(texts: string[], model: string): number {
    return texts.reduce((sum, text) => sum + countTokens(text, model), 0);
}
