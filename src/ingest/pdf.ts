import fs from "node:fs/promises";
import type { PageText } from "./chunker";

export interface TextExtractor {
    /** File name suffix this extractor reads, including the dot. */
    readonly extension: string;
    extractPages(filePath: string): Promise<PageText[]>;
}

function normalizeWhitespace(text: string): string {
    return text.replace(/\s+/g, " ").trim();
}

export class PdfTextExtractor implements TextExtractor {
    readonly extension = ".pdf";

    async extractPages(filePath: string): Promise<PageText[]> {
        const pdfjs = await import("pdfjs-dist/legacy/build/pdf.mjs");
        pdfjs.GlobalWorkerOptions.workerSrc = "pdfjs-dist/legacy/build/pdf.worker.mjs";

        const data = new Uint8Array(await fs.readFile(filePath));
        const doc = await pdfjs.getDocument({ data, isEvalSupported: false, useSystemFonts: true }).promise;

        try {
            const pages: PageText[] = [];
            for (let pageNumber = 1; pageNumber <= doc.numPages; pageNumber += 1) {
                const page = await doc.getPage(pageNumber);
                const content = await page.getTextContent();
                const text = content.items.map((item) => ("str" in item ? item.str : "")).join(" ");
                pages.push({ pageNumber, text: normalizeWhitespace(text) });
                page.cleanup();
            }
            return pages;
        } finally {
            await doc.destroy();
        }
    }
}
