import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { PdfTextExtractor } from "../ingest/pdf";
import { makeTempDir } from "./helpers";

/** Builds a PDF with one Helvetica page per content stream, with a correct cross-reference table. */
function buildPdf(pageContents: string[]): string {
    const fontId = 3 + pageContents.length * 2;
    const pageIds = pageContents.map((_, index) => 3 + index * 2);

    const objects: string[] = [
        "<< /Type /Catalog /Pages 2 0 R >>",
        `<< /Type /Pages /Kids [${pageIds.map((id) => `${id} 0 R`).join(" ")}] /Count ${pageContents.length} >>`,
    ];
    pageContents.forEach((content, index) => {
        objects.push(
            `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Resources << /Font << /F1 ${fontId} 0 R >> >> /Contents ${
                pageIds[index] + 1
            } 0 R >>`
        );
        objects.push(`<< /Length ${content.length} >>\nstream\n${content}\nendstream`);
    });
    objects.push("<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica /Encoding /WinAnsiEncoding >>");

    let body = "%PDF-1.4\n";
    const offsets: number[] = [];
    objects.forEach((object, index) => {
        offsets.push(body.length);
        body += `${index + 1} 0 obj\n${object}\nendobj\n`;
    });

    const xrefOffset = body.length;
    const entries = offsets.map((offset) => `${String(offset).padStart(10, "0")} 00000 n \n`).join("");
    body += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n${entries}`;
    body += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;
    return body;
}

describe("ingest/pdf.ts", () => {
    let root: string;

    beforeEach(async () => {
        root = await makeTempDir();
    });

    afterEach(async () => {
        await fs.rm(root, { recursive: true, force: true });
    });

    it("extracts normalised text page by page", async () => {
        const filePath = path.join(root, "two-pages.pdf");
        await fs.writeFile(
            filePath,
            buildPdf([
                "BT /F1 12 Tf 72 720 Td (Hello first page) Tj ET",
                "BT /F1 12 Tf 72 720 Td (Second   page) Tj 0 -14 Td (continues here) Tj ET",
            ]),
            "latin1"
        );

        const pages = await new PdfTextExtractor().extractPages(filePath);

        expect(pages).toEqual([
            { pageNumber: 1, text: "Hello first page" },
            { pageNumber: 2, text: "Second page continues here" },
        ]);
    });

    it("returns an empty string for a page without text", async () => {
        const filePath = path.join(root, "blank.pdf");
        await fs.writeFile(filePath, buildPdf(["", "BT /F1 12 Tf 72 720 Td (Only text) Tj ET"]), "latin1");

        const pages = await new PdfTextExtractor().extractPages(filePath);

        expect(pages).toEqual([
            { pageNumber: 1, text: "" },
            { pageNumber: 2, text: "Only text" },
        ]);
    });

    it("rejects a file that is not a PDF", async () => {
        const filePath = path.join(root, "notes.pdf");
        await fs.writeFile(filePath, "plain text pretending to be a PDF");

        await expect(new PdfTextExtractor().extractPages(filePath)).rejects.toThrow();
    });
});
