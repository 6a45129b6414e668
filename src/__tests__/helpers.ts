/**
 * In-process stand-ins for the remote services used by the pipeline.
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import pino from "pino";
import type { AppConfig, ChatModelConfig, EmbeddingModelConfig } from "../config/types";
import type { PageText } from "../ingest/chunker";
import type { TextExtractor } from "../ingest/pdf";
import type { ChatProvider, EmbeddingProvider, GenerateAnswerOptions } from "../llm/types";
import type { QdrantApi } from "../vectorstore/qdrant";

export const silentLogger = pino({ level: "silent" });

export function cosine(a: number[], b: number[]): number {
    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i += 1) {
        dot += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }
    if (normA === 0 || normB === 0) {
        return 0;
    }
    return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

// ============================================================================
// Embeddings
// ============================================================================

/**
 * Deterministic bag-of-words embedder: one dimension per vocabulary word,
 * holding the number of times the word occurs in the text.
 */
export class BagOfWordsEmbedder implements EmbeddingProvider {
    readonly config: EmbeddingModelConfig = { provider: "google", model: "bag-of-words" };
    readonly embeddedTexts: string[] = [];

    constructor(private readonly vocabulary: string[]) {}

    async embedDocuments(texts: string[]): Promise<number[][]> {
        return texts.map((text) => this.vectorFor(text));
    }

    async embedQuery(text: string): Promise<number[]> {
        return this.vectorFor(text);
    }

    async resolveDimension(): Promise<number> {
        return this.vocabulary.length;
    }

    private vectorFor(text: string): number[] {
        this.embeddedTexts.push(text);
        const words = text.toLowerCase().match(/[a-z]+/g) ?? [];
        return this.vocabulary.map((term) => words.filter((word) => word === term).length);
    }
}

// ============================================================================
// Chat
// ============================================================================

export class RecordingChatProvider implements ChatProvider {
    readonly config: ChatModelConfig = {
        provider: "google",
        model: "recording",
        temperature: 0.2,
        systemMessageAsUser: true,
    };
    readonly calls: GenerateAnswerOptions[] = [];

    constructor(private readonly reply: string | Error = "Summary: stub answer.\n- point") {}

    async generateAnswer(options: GenerateAnswerOptions): Promise<string> {
        this.calls.push(options);
        if (this.reply instanceof Error) {
            throw this.reply;
        }
        return this.reply;
    }
}

// ============================================================================
// Qdrant
// ============================================================================

interface FakePoint {
    vector: number[];
    payload: Record<string, unknown>;
}

interface FakeCollection {
    size: number;
    points: Map<string, FakePoint>;
}

/** Keeps collections in memory and answers the subset of the Qdrant REST client the store calls. */
export class FakeQdrantClient implements QdrantApi {
    readonly collections = new Map<string, FakeCollection>();

    async collectionExists(name: string): Promise<{ exists: boolean }> {
        return { exists: this.collections.has(name) };
    }

    async createCollection(name: string, body: { vectors: { size: number; distance: string } }): Promise<boolean> {
        if (this.collections.has(name)) {
            throw new Error(`Collection \`${name}\` already exists!`);
        }
        this.collections.set(name, { size: body.vectors.size, points: new Map() });
        return true;
    }

    async deleteCollection(name: string): Promise<boolean> {
        return this.collections.delete(name);
    }

    async getCollection(name: string) {
        const collection = this.require(name);
        return {
            status: "green",
            points_count: collection.points.size,
            config: { params: { vectors: { size: collection.size, distance: "Cosine" } } },
        };
    }

    async upsert(
        name: string,
        body: { wait?: boolean; points: Array<{ id: string | number; vector: number[]; payload?: Record<string, unknown> }> },
    ) {
        const collection = this.require(name);
        for (const point of body.points) {
            if (point.vector.length !== collection.size) {
                throw new Error(
                    `Wrong input: Vector dimension error: expected dim: ${collection.size}, got ${point.vector.length}`,
                );
            }
        }
        for (const point of body.points) {
            collection.points.set(String(point.id), { vector: point.vector, payload: point.payload ?? {} });
        }
        return { operation_id: 1, status: "completed" };
    }

    async query(name: string, body: { query: number[]; limit?: number; with_payload?: boolean }) {
        const collection = this.require(name);
        const scored = [...collection.points.entries()].map(([id, point]) => ({
            id,
            version: 0,
            score: cosine(body.query, point.vector),
            payload: body.with_payload ? point.payload : null,
        }));
        scored.sort((a, b) => b.score - a.score);
        return { points: scored.slice(0, body.limit ?? 10) };
    }

    async count(name: string): Promise<{ count: number }> {
        return { count: this.require(name).points.size };
    }

    private require(name: string): FakeCollection {
        const collection = this.collections.get(name);
        if (!collection) {
            throw new Error(`Not found: Collection \`${name}\` doesn't exist!`);
        }
        return collection;
    }
}

// ============================================================================
// Documents
// ============================================================================

/** Reads files as UTF-8 text; a form feed separates pages. */
export class PlainTextExtractor implements TextExtractor {
    readonly extension = ".pdf";
    readonly failOn = new Set<string>();

    async extractPages(filePath: string): Promise<PageText[]> {
        if (this.failOn.has(path.basename(filePath))) {
            throw new Error("Invalid PDF structure.");
        }
        const content = await fs.readFile(filePath, "utf8");
        return content.split("\f").map((text, index) => ({ pageNumber: index + 1, text }));
    }
}

export async function makeTempDir(): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), "folio-rag-test-"));
}

export function makeConfig(directory: string, overrides: Partial<AppConfig["documents"]> = {}): AppConfig {
    return {
        logging: { level: "info", pretty: false },
        documents: { directory, extension: ".pdf", chunkSize: 1000, chunkOverlap: 200, ...overrides },
        vectorStore: { url: "http://localhost:6333", collection: "test_documents", recreateOnIngest: true },
        retrieval: { topK: 3 },
        llm: {
            embedding: { provider: "google", model: "bag-of-words", apiKey: "test-key" },
            chat: { provider: "google", model: "recording", apiKey: "test-key", temperature: 0.2, systemMessageAsUser: true },
        },
    };
}
