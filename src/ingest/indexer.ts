import type { Logger } from "pino";
import type { EmbeddingProvider } from "../llm/types";
import type { VectorRecord, VectorStore } from "../vectorstore/types";
import { calculateChecksum, checksumToUuid } from "../utils/calculateChecksum";
import { scopedLogger } from "../utils/logger";
import type { Chunk } from "./chunker";

export interface IndexingResult {
    recordCount: number;
    elapsedMs: number;
}

/** Stable id per (file, position, text); re-indexing identical content overwrites the same point. */
export function chunkRecordId(chunk: Chunk): string {
    return checksumToUuid(calculateChecksum(`${chunk.sourceFile}\u0000${chunk.position}\u0000${chunk.text}`));
}

export async function indexChunks(
    chunks: Chunk[],
    embedding: EmbeddingProvider,
    store: VectorStore,
    logger?: Logger
): Promise<IndexingResult> {
    const indexLogger = scopedLogger(logger, { module: "index" });
    const startedAt = Date.now();

    if (chunks.length === 0) {
        return { recordCount: 0, elapsedMs: 0 };
    }

    indexLogger.info(`Embedding ${chunks.length} chunk${chunks.length === 1 ? "" : "s"} using ${embedding.config.provider}.`);

    const vectors = await embedding.embedDocuments(chunks.map((chunk) => chunk.text));

    if (vectors.length !== chunks.length) {
        throw new Error(`Embedding generation returned ${vectors.length} vectors for ${chunks.length} chunks.`);
    }

    const records: VectorRecord[] = chunks.map((chunk, index) => ({
        id: chunkRecordId(chunk),
        vector: vectors[index],
        payload: chunk,
    }));

    await store.upsert(records);

    const result = { recordCount: records.length, elapsedMs: Date.now() - startedAt };
    indexLogger.info(result, `Indexed ${result.recordCount} records into "${store.collection}" in ${result.elapsedMs} ms.`);
    return result;
}
