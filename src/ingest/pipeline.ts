import fs from "node:fs/promises";
import path from "node:path";
import type { Logger } from "pino";
import type { AppConfig, DocumentsConfig } from "../config/types";
import type { LLMClientBundle } from "../llm/types";
import type { PipelineState } from "../query/state";
import { UNINITIALIZED } from "../query/state";
import type { VectorStore } from "../vectorstore/types";
import { getLogger, scopedLogger } from "../utils/logger";
import { chunkDocument, type Chunk } from "./chunker";
import { indexChunks } from "./indexer";
import type { TextExtractor } from "./pdf";

export interface LoadedDocuments {
    /** True when the documents folder was missing and has just been created. */
    folderCreated: boolean;
    files: string[];
    skippedFiles: string[];
    chunks: Chunk[];
}

export interface IngestionPipelineStats {
    processedDocuments: number;
    skippedDocuments: number;
    chunks: number;
    indexedRecords: number;
    elapsedMs: number;
}

export interface IngestionPipelineResult {
    state: PipelineState;
    stats: IngestionPipelineStats;
}

export interface IngestionDependencies {
    llm: LLMClientBundle;
    store: VectorStore;
    extractor: TextExtractor;
}

export interface IngestionOptions {
    /** Drop and recreate the collection instead of appending to it. */
    recreate: boolean;
}

async function ensureFolder(directory: string): Promise<boolean> {
    try {
        const stats = await fs.stat(directory);
        if (!stats.isDirectory()) {
            throw new Error(`Documents path "${directory}" exists but is not a directory.`);
        }
        return false;
    } catch (error) {
        if (error instanceof Error && "code" in error && error.code === "ENOENT") {
            await fs.mkdir(directory, { recursive: true });
            return true;
        }
        throw error;
    }
}

async function listDocumentFiles(directory: string, extension: string): Promise<string[]> {
    const suffix = extension.toLowerCase();
    const entries = await fs.readdir(directory, { withFileTypes: true });

    return entries
        .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(suffix))
        .map((entry) => entry.name)
        .sort((a, b) => a.localeCompare(b));
}

export async function loadDocuments(
    config: DocumentsConfig,
    extractor: TextExtractor,
    logger?: Logger
): Promise<LoadedDocuments> {
    const ingestionLogger = scopedLogger(logger, { module: "ingest" });

    if (await ensureFolder(config.directory)) {
        ingestionLogger.warn(`Created documents folder ${config.directory}. Add ${extractor.extension} files there and run again.`);
        return { folderCreated: true, files: [], skippedFiles: [], chunks: [] };
    }

    const files = await listDocumentFiles(config.directory, extractor.extension);
    ingestionLogger.info(`Found ${files.length} ${extractor.extension} file${files.length === 1 ? "" : "s"} in ${config.directory}.`);

    const chunks: Chunk[] = [];
    const skippedFiles: string[] = [];

    for (const file of files) {
        const fileLogger = ingestionLogger.child({ file });

        let fileChunks: Chunk[];
        try {
            const pages = await extractor.extractPages(path.join(config.directory, file));
            fileChunks = chunkDocument(file, pages, config);
        } catch (error) {
            fileLogger.error({ err: error }, "Failed to extract text. Skipping.");
            skippedFiles.push(file);
            continue;
        }

        if (fileChunks.length === 0) {
            fileLogger.warn("No text could be extracted from this document. Skipping.");
            skippedFiles.push(file);
            continue;
        }

        fileLogger.debug(`Split into ${fileChunks.length} chunk${fileChunks.length === 1 ? "" : "s"}.`);
        chunks.push(...fileChunks);
    }

    return { folderCreated: false, files, skippedFiles, chunks };
}

/**
 * Prepares the collection, reads and splits the documents and indexes them.
 * The returned state is ready only when at least one chunk was indexed.
 */
export async function runIngestionPipeline(
    appConfig: AppConfig,
    { llm, store, extractor }: IngestionDependencies,
    options: IngestionOptions,
    logger?: Logger
): Promise<IngestionPipelineResult> {
    const ingestionLogger = scopedLogger(logger, { module: "ingest" });

    const dimension = await llm.embedding.resolveDimension();
    ingestionLogger.info(`Embedding model ${llm.embedding.config.model} produces ${dimension}-dimensional vectors.`);

    if (options.recreate) {
        await store.resetCollection(dimension);
    } else {
        await store.ensureCollection(dimension);
    }

    const documents = await loadDocuments(appConfig.documents, extractor, logger);

    const stats: IngestionPipelineStats = {
        processedDocuments: documents.files.length - documents.skippedFiles.length,
        skippedDocuments: documents.skippedFiles.length,
        chunks: documents.chunks.length,
        indexedRecords: 0,
        elapsedMs: 0,
    };

    if (documents.chunks.length === 0) {
        if (!documents.folderCreated) {
            ingestionLogger.warn(`No ${extractor.extension} content to index in ${appConfig.documents.directory}.`);
        }
        return { state: UNINITIALIZED, stats };
    }

    const indexed = await indexChunks(documents.chunks, llm.embedding, store, logger);
    stats.indexedRecords = indexed.recordCount;
    stats.elapsedMs = indexed.elapsedMs;

    return {
        state: { status: "ready", collection: store.collection, chunkCount: indexed.recordCount },
        stats,
    };
}

export function logIngestionStats(stats: IngestionPipelineStats, logger?: Logger): void {
    const activeLogger = logger ?? getLogger();
    activeLogger.info(`Processed documents: ${stats.processedDocuments}`);
    activeLogger.info(`Skipped documents: ${stats.skippedDocuments}`);
    activeLogger.info(`Chunks created: ${stats.chunks}`);
    activeLogger.info(`Records indexed: ${stats.indexedRecords} in ${stats.elapsedMs} ms`);
}
