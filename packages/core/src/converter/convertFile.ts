import fs from "fs/promises";
import path from "path";

import { extractMetadata } from "../metadata/MetadataExtractor";
import { renderMarkdown } from "../renderer/markdown";
import { FALLBACK_PAGE_TEMPLATE } from "../renderer/template";
import { DocumentReadError } from "../utils/err";
import { escapeHtml, fillTemplate } from "../utils/html";
import { readUtf8 } from "../utils/walk";

export function defaultHtmlPath(markdownFile: string): string {
    const ext = path.extname(markdownFile);
    return markdownFile.slice(0, markdownFile.length - ext.length) + ".html";
}

/**
 * Converts one Markdown file to a standalone page.
 *
 * @returns path of the written HTML file
 */
export async function convertMarkdownFile(
    markdownFile: string,
    htmlFile = defaultHtmlPath(markdownFile),
    template = FALLBACK_PAGE_TEMPLATE,
): Promise<string> {
    let raw: string;
    try {
        raw = await readUtf8(markdownFile);
    } catch (e) {
        throw new DocumentReadError(markdownFile, e);
    }

    const metadata = extractMetadata(raw);
    const hasHeader = metadata.body !== raw;
    const title = hasHeader ? metadata.title : path.basename(markdownFile);

    const html = fillTemplate(template, {
        TITLE: escapeHtml(title),
        META: "",
        CONTENT: renderMarkdown(metadata.body),
    });

    await fs.mkdir(path.dirname(path.resolve(htmlFile)), { recursive: true });
    await fs.writeFile(htmlFile, html, "utf-8");
    return htmlFile;
}
