import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadDocuments, runIngestionPipeline } from "../ingest/pipeline";
import { QdrantVectorStore } from "../vectorstore/qdrant";
import {
    BagOfWordsEmbedder,
    FakeQdrantClient,
    makeConfig,
    makeTempDir,
    PlainTextExtractor,
    RecordingChatProvider,
    silentLogger,
} from "./helpers";

const VOCABULARY = ["capital", "france", "paris", "ocean", "salt"];

describe("ingest/pipeline.ts", () => {
    let root: string;
    let extractor: PlainTextExtractor;

    beforeEach(async () => {
        root = await makeTempDir();
        extractor = new PlainTextExtractor();
    });

    afterEach(async () => {
        await fs.rm(root, { recursive: true, force: true });
    });

    describe("loadDocuments", () => {
        it("creates a missing folder and reports that there is no input yet", async () => {
            const directory = path.join(root, "documents");
            const config = makeConfig(directory).documents;

            const result = await loadDocuments(config, extractor, silentLogger);

            expect(result).toEqual({ folderCreated: true, files: [], skippedFiles: [], chunks: [] });
            const stats = await fs.stat(directory);
            expect(stats.isDirectory()).toBe(true);
        });

        it("reads only files with the document extension, in name order", async () => {
            await fs.writeFile(path.join(root, "b.pdf"), "Second file.");
            await fs.writeFile(path.join(root, "a.PDF"), "First file.\fFirst file, page two.");
            await fs.writeFile(path.join(root, "notes.txt"), "Ignored.");
            await fs.mkdir(path.join(root, "nested.pdf"));

            const result = await loadDocuments(makeConfig(root).documents, extractor, silentLogger);

            expect(result.folderCreated).toBe(false);
            expect(result.files).toEqual(["a.PDF", "b.pdf"]);
            expect(result.chunks.map((chunk) => [chunk.sourceFile, chunk.position, chunk.metadata.page, chunk.text])).toEqual([
                ["a.PDF", 0, "1", "First file."],
                ["a.PDF", 1, "2", "First file, page two."],
                ["b.pdf", 0, "1", "Second file."],
            ]);
        });

        it("returns zero chunks when no file matches", async () => {
            await fs.writeFile(path.join(root, "notes.txt"), "Ignored.");

            const result = await loadDocuments(makeConfig(root).documents, extractor, silentLogger);

            expect(result.files).toEqual([]);
            expect(result.chunks).toEqual([]);
        });

        it("skips a file whose text cannot be extracted and keeps the others", async () => {
            await fs.writeFile(path.join(root, "broken.pdf"), "unused");
            await fs.writeFile(path.join(root, "good.pdf"), "Readable text.");
            await fs.writeFile(path.join(root, "blank.pdf"), "  \f ");
            extractor.failOn.add("broken.pdf");

            const result = await loadDocuments(makeConfig(root).documents, extractor, silentLogger);

            expect(result.skippedFiles).toEqual(["blank.pdf", "broken.pdf"]);
            expect(result.chunks.map((chunk) => chunk.text)).toEqual(["Readable text."]);
        });

        it("produces identical chunk sequences for identical documents", async () => {
            const text = "The ocean is salt water. ".repeat(120);
            await fs.writeFile(path.join(root, "sea.pdf"), text);
            const config = makeConfig(root, { chunkSize: 300, chunkOverlap: 50 }).documents;

            const first = await loadDocuments(config, extractor, silentLogger);
            const second = await loadDocuments(config, extractor, silentLogger);

            expect(first.chunks.length).toBe(12);
            expect(second.chunks).toEqual(first.chunks);
        });
    });

    describe("runIngestionPipeline", () => {
        function setup() {
            const qdrant = new FakeQdrantClient();
            const config = makeConfig(root);
            const store = new QdrantVectorStore(config.vectorStore, qdrant, silentLogger);
            const llm = { embedding: new BagOfWordsEmbedder(VOCABULARY), chat: new RecordingChatProvider() };
            return { qdrant, config, store, llm };
        }

        it("indexes every chunk and reports a ready state", async () => {
            await fs.writeFile(path.join(root, "france.pdf"), "The capital of France is Paris.");
            await fs.writeFile(path.join(root, "sea.pdf"), "The ocean is salt water.");
            const { config, store, llm } = setup();

            const result = await runIngestionPipeline(config, { llm, store, extractor }, { recreate: true }, silentLogger);

            expect(result.state).toEqual({ status: "ready", collection: "test_documents", chunkCount: 2 });
            expect(result.stats).toMatchObject({ processedDocuments: 2, skippedDocuments: 0, chunks: 2, indexedRecords: 2 });
            await expect(store.count()).resolves.toBe(2);
        });

        it("does not index anything when the folder has no matching files", async () => {
            await fs.writeFile(path.join(root, "notes.txt"), "Ignored.");
            const { config, store, llm } = setup();
            const upsert = vi.spyOn(store, "upsert");

            const result = await runIngestionPipeline(config, { llm, store, extractor }, { recreate: true }, silentLogger);

            expect(result.state).toEqual({ status: "uninitialized" });
            expect(result.stats.chunks).toBe(0);
            expect(upsert).not.toHaveBeenCalled();
            expect(llm.embedding.embeddedTexts).toEqual([]);
        });

        it("rebuilds the collection by default and appends when asked", async () => {
            await fs.writeFile(path.join(root, "france.pdf"), "The capital of France is Paris.");
            const { config, store, llm } = setup();
            const reset = vi.spyOn(store, "resetCollection");
            const ensure = vi.spyOn(store, "ensureCollection");

            await runIngestionPipeline(config, { llm, store, extractor }, { recreate: true }, silentLogger);
            await fs.writeFile(path.join(root, "sea.pdf"), "The ocean is salt water.");
            await runIngestionPipeline(config, { llm, store, extractor }, { recreate: false }, silentLogger);

            expect(reset).toHaveBeenCalledTimes(1);
            expect(reset).toHaveBeenCalledWith(VOCABULARY.length);
            expect(ensure).toHaveBeenCalledTimes(1);
            // france.pdf keeps its id, sea.pdf is new.
            await expect(store.count()).resolves.toBe(2);
        });
    });
});
