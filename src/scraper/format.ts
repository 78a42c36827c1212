/**
 * Scraper — human-readable summary of a scraped document.
 */

import type { ScrapedDocument } from "./types.js";

const numberFormat = new Intl.NumberFormat("en-US");

export function formatScrapeSummary(document: ScrapedDocument): string {
    const title = document.title || "(untitled)";
    return [
        `Successfully scraped: ${title}`,
        "",
        `- Content length: ${numberFormat.format(document.text.length)} characters`,
        `- Links found: ${numberFormat.format(document.links.length)}`,
        `- Tables found: ${numberFormat.format(document.tables.length)}`,
    ].join("\n");
}
