import { QdrantClient } from "@qdrant/js-client-rest";
import type { Logger } from "pino";
import { z } from "zod";
import type { VectorStoreConfig } from "../config/types";
import { CollectionDimensionMismatchError, toError } from "../utils/errors";
import { scopedLogger } from "../utils/logger";
import type { RetrievedChunk, VectorRecord, VectorStore } from "./types";

export interface QdrantPoint {
    id: string;
    vector: number[];
    payload: Record<string, unknown>;
}

export interface QdrantScoredPoint {
    id: string | number;
    score: number;
    payload?: Record<string, unknown> | null;
}

/** The calls the store makes; `QdrantClient` satisfies it structurally. */
export interface QdrantApi {
    collectionExists(name: string): Promise<{ exists: boolean }>;
    createCollection(name: string, body: { vectors: { size: number; distance: "Cosine" } }): Promise<boolean>;
    deleteCollection(name: string): Promise<boolean>;
    getCollection(name: string): Promise<{ config: { params: { vectors?: unknown } } }>;
    upsert(name: string, body: { wait: boolean; points: QdrantPoint[] }): Promise<unknown>;
    query(
        name: string,
        body: { query: number[]; limit: number; with_payload: boolean }
    ): Promise<{ points: QdrantScoredPoint[] }>;
    count(name: string, body: { exact: boolean }): Promise<{ count: number }>;
}

const chunkPayloadSchema = z.object({
    text: z.string(),
    source_file: z.string(),
    position: z.number().int(),
    metadata: z.record(z.string()),
});

export class QdrantVectorStore implements VectorStore {
    private readonly logger: Logger;
    private readonly client: QdrantApi;

    constructor(
        private readonly config: VectorStoreConfig,
        client?: QdrantApi,
        logger?: Logger
    ) {
        this.logger = scopedLogger(logger, { module: "qdrant" });
        this.client = client ?? new QdrantClient({ url: config.url, apiKey: config.apiKey });
    }

    get collection(): string {
        return this.config.collection;
    }

    async resetCollection(dimension: number): Promise<void> {
        if (await this.exists()) {
            this.logger.warn(`Dropping existing collection "${this.collection}" and all of its points.`);
            await this.run("delete collection", () => this.client.deleteCollection(this.collection));
        }

        await this.create(dimension);
    }

    async ensureCollection(dimension: number): Promise<void> {
        if (!(await this.exists())) {
            await this.create(dimension);
            return;
        }

        const actual = await this.vectorSize();
        if (actual !== undefined && actual !== dimension) {
            throw new CollectionDimensionMismatchError(this.collection, dimension, actual);
        }

        this.logger.info(`Reusing collection "${this.collection}" (dimension ${dimension}).`);
    }

    async upsert(records: VectorRecord[]): Promise<void> {
        if (records.length === 0) {
            return;
        }

        const points = records.map((record): QdrantPoint => ({
            id: record.id,
            vector: record.vector,
            payload: {
                text: record.payload.text,
                source_file: record.payload.sourceFile,
                position: record.payload.position,
                metadata: { ...record.payload.metadata },
            },
        }));

        await this.run("upsert points", () => this.client.upsert(this.collection, { wait: true, points }));
        this.logger.info(`Upserted ${records.length} point${records.length === 1 ? "" : "s"} into "${this.collection}".`);
    }

    async query(vector: number[], k: number): Promise<RetrievedChunk[]> {
        const { points } = await this.run("query points", () =>
            this.client.query(this.collection, { query: vector, limit: k, with_payload: true })
        );

        return points.map((point) => {
            const payload = chunkPayloadSchema.safeParse(point.payload);
            if (!payload.success) {
                throw new Error(`Point ${String(point.id)} in "${this.collection}" has a malformed payload: ${payload.error.message}`);
            }

            return {
                text: payload.data.text,
                sourceFile: payload.data.source_file,
                position: payload.data.position,
                metadata: payload.data.metadata,
                score: point.score,
            };
        });
    }

    async count(): Promise<number> {
        const { count } = await this.run("count points", () => this.client.count(this.collection, { exact: true }));
        return count;
    }

    private async exists(): Promise<boolean> {
        const { exists } = await this.run("check collection", () => this.client.collectionExists(this.collection));
        return exists;
    }

    private async create(dimension: number): Promise<void> {
        await this.run("create collection", () =>
            this.client.createCollection(this.collection, {
                vectors: { size: dimension, distance: "Cosine" },
            })
        );
        this.logger.info(`Created collection "${this.collection}" (dimension ${dimension}, cosine distance).`);
    }

    private async vectorSize(): Promise<number | undefined> {
        const info = await this.run("read collection", () => this.client.getCollection(this.collection));
        const vectors = info.config.params.vectors;
        const size = typeof vectors === "object" && vectors !== null && "size" in vectors ? vectors.size : undefined;
        return typeof size === "number" ? size : undefined;
    }

    private async run<T>(action: string, task: () => Promise<T>): Promise<T> {
        try {
            return await task();
        } catch (error) {
            const message = `Failed to ${action} in Qdrant collection "${this.collection}": ${toError(error).message}`;
            this.logger.error(message);
            throw new Error(message, { cause: error });
        }
    }
}

export function createVectorStore(config: VectorStoreConfig, logger?: Logger): VectorStore {
    return new QdrantVectorStore(config, undefined, logger);
}
