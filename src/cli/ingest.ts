import { loadAppConfig, resolveConfigPath } from "../config/loadConfig";
import { logIngestionStats, runIngestionPipeline } from "../ingest/pipeline";
import { PdfTextExtractor } from "../ingest/pdf";
import { createLLMClient } from "../llm/factory";
import { configureLogger, getLogger } from "../utils/logger";
import { createVectorStore } from "../vectorstore/qdrant";
import { parseArgs } from "./args";

async function main(): Promise<void> {
    const options = parseArgs(process.argv.slice(2), {
        usage: "ingest [--config <path-to-env>] [--append]",
        allowAppend: true,
    });
    const configPath = resolveConfigPath(options.configPath);
    const config = await loadAppConfig(options.configPath);

    const logger = configureLogger(config.logging);
    logger.info(`Loaded configuration from ${configPath}`);

    const llm = createLLMClient(config.llm, logger);
    const store = createVectorStore(config.vectorStore, logger);

    logger.info("Starting ingestion pipeline.");

    const { stats } = await runIngestionPipeline(
        config,
        { llm, store, extractor: new PdfTextExtractor() },
        { recreate: config.vectorStore.recreateOnIngest && !options.append },
        logger
    );

    logIngestionStats(stats, logger);

    logger.info("Ingestion pipeline completed.");
}

main().catch((error) => {
    const logger = getLogger();
    logger.error({ err: error }, "Ingestion pipeline failed.");
    process.exitCode = 1;
});
