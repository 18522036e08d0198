import { load } from "cheerio";
import { Lexer, Parser } from "marked";

/**
 * Standard Markdown (GFM) to HTML.
 */
export function renderMarkdown(markdown: string): string {
    return Parser.parse(Lexer.lex(markdown));
}

/**
 * Text content of a Markdown document, whitespace collapsed. Formatting
 * markers never leak into the result since only text nodes are read.
 */
export function markdownToPlainText(markdown: string): string {
    const $ = load(renderMarkdown(markdown));
    return $.root().text().replace(/\s+/g, " ").trim();
}
