export interface Chunk {
    text: string;
    sourceFile: string;
    /** Ordinal of the chunk within its source file, counted across pages. */
    position: number;
    metadata: Record<string, string>;
}

export interface ChunkingOptions {
    chunkSize: number;
    chunkOverlap: number;
}

export interface PageText {
    pageNumber: number;
    text: string;
}

function assertChunkingOptions({ chunkSize, chunkOverlap }: ChunkingOptions): void {
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
        throw new Error(`chunkSize must be a positive integer, got ${chunkSize}.`);
    }
    if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
        throw new Error(`chunkOverlap must be an integer in [0, ${chunkSize}), got ${chunkOverlap}.`);
    }
}

/**
 * Sliding window over the code points of `text`: windows of `chunkSize`
 * characters starting every `chunkSize - chunkOverlap` characters. The final
 * window may be shorter and ends exactly at the end of the text.
 */
export function splitText(text: string, options: ChunkingOptions): string[] {
    assertChunkingOptions(options);

    const { chunkSize, chunkOverlap } = options;
    const step = chunkSize - chunkOverlap;
    // Surrogate pairs count as one character and are never split.
    const characters = Array.from(text);
    const segments: string[] = [];

    for (let start = 0; start < characters.length; start += step) {
        const end = Math.min(start + chunkSize, characters.length);
        segments.push(characters.slice(start, end).join(""));
        if (end === characters.length) {
            break;
        }
    }

    return segments;
}

export function chunkDocument(sourceFile: string, pages: PageText[], options: ChunkingOptions): Chunk[] {
    const chunks: Chunk[] = [];

    for (const page of pages) {
        if (!page.text.trim()) {
            continue;
        }

        for (const segment of splitText(page.text, options)) {
            chunks.push({
                text: segment,
                sourceFile,
                position: chunks.length,
                metadata: {
                    source: sourceFile,
                    page: String(page.pageNumber),
                },
            });
        }
    }

    return chunks;
}
