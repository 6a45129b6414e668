import { createInterface } from "node:readline";
import { loadAppConfig, resolveConfigPath } from "../config/loadConfig";
import { logIngestionStats, runIngestionPipeline } from "../ingest/pipeline";
import { PdfTextExtractor } from "../ingest/pdf";
import { createLLMClient } from "../llm/factory";
import { askAi } from "../query/askAi";
import { runInteractiveLoop } from "../query/interactive";
import { configureLogger, getLogger } from "../utils/logger";
import { createVectorStore } from "../vectorstore/qdrant";
import { parseArgs } from "./args";
import { createQuestionReader } from "./questions";

async function main(): Promise<void> {
    const options = parseArgs(process.argv.slice(2), {
        usage: "run [--config <path-to-env>]",
        allowAppend: false,
    });
    const configPath = resolveConfigPath(options.configPath);
    const config = await loadAppConfig(options.configPath);

    const logger = configureLogger(config.logging);
    logger.info(`Loaded configuration from ${configPath}`);

    const llm = createLLMClient(config.llm, logger);
    const store = createVectorStore(config.vectorStore, logger);

    const { state, stats } = await runIngestionPipeline(
        config,
        { llm, store, extractor: new PdfTextExtractor() },
        { recreate: config.vectorStore.recreateOnIngest },
        logger
    );
    logIngestionStats(stats, logger);

    if (state.status === "ready") {
        logger.info(`Ready: ${state.chunkCount} chunks indexed in "${state.collection}".`);
    } else {
        logger.warn("No documents indexed; questions will be rejected until PDFs are added and the tool is restarted.");
    }

    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
        const asked = await runInteractiveLoop({
            readQuestion: createQuestionReader(rl),
            answer: (question) =>
                askAi({ llm, store }, state, { question, topK: config.retrieval.topK }, logger),
            print: (text) => console.log(`\n${text}`),
        });
        logger.info(`Session ended after ${asked} question${asked === 1 ? "" : "s"}.`);
    } finally {
        rl.close();
    }
}

main().catch((error) => {
    const logger = getLogger();
    logger.error({ err: error }, "Session failed.");
    process.exitCode = 1;
});
