/**
 * Scraper — HTML to ScrapedDocument.
 *
 * Pure and total: any string parses, missing elements give empty fields.
 */

import * as cheerio from "cheerio";
import type { ScrapedDocument } from "./types.js";

/** Elements whose text makes up `ScrapedDocument.text`. */
const TEXT_SELECTOR = "p, div, span, td, th, tr";

/** Never rendered, so never part of the visible text. */
const HIDDEN_SELECTOR = "script, style, noscript, template";

function collapse(text: string): string {
    return text.replace(/\s+/g, " ").trim();
}

export function extractDocument(html: string): ScrapedDocument {
    const $ = cheerio.load(html);
    $(HIDDEN_SELECTOR).remove();

    const text = $(TEXT_SELECTOR)
        .toArray()
        .map((el) => collapse($(el).text()))
        .filter(Boolean)
        .join(" ");

    const links = $("a[href]")
        .toArray()
        .map((el) => $(el).attr("href") ?? "");

    const tables = $("table")
        .toArray()
        .map((el) => collapse($(el).text()));

    return {
        title: collapse($("title").first().text()),
        text,
        links,
        metadata: {
            description: $('meta[name="description"]').first().attr("content") ?? "",
            keywords: $('meta[name="keywords"]').first().attr("content") ?? "",
        },
        tables,
    };
}
