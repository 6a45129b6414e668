import type { Chunk } from "../ingest/chunker";

export interface VectorRecord {
    id: string;
    vector: number[];
    payload: Chunk;
}

export interface RetrievedChunk extends Chunk {
    /** Similarity to the query under the collection's distance metric; higher is closer. */
    score: number;
}

export interface VectorStore {
    readonly collection: string;
    /** Drops the collection when it exists and creates it empty with the given dimension. */
    resetCollection(dimension: number): Promise<void>;
    /** Creates the collection when missing; an existing one must already have the given dimension. */
    ensureCollection(dimension: number): Promise<void>;
    upsert(records: VectorRecord[]): Promise<void>;
    /** Up to `k` nearest chunks, most similar first. */
    query(vector: number[], k: number): Promise<RetrievedChunk[]>;
    count(): Promise<number>;
}
