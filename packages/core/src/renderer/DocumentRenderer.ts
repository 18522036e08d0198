import fs from "fs/promises";
import path from "path";

import { DocumentRecord } from "../types/document";
import { escapeHtml, fillTemplate, formatLongDate } from "../utils/html";
import { renderMarkdown } from "./markdown";

export interface SiteInfo {
    siteTitle: string;
    /**
     * Year shown in the copyright line
     */
    year: number;
}

export function copyright(site: SiteInfo): string {
    return `© ${site.year} ${site.siteTitle}`;
}

/**
 * "By Jane | March 01, 2024 | Status: published", the author part omitted
 * when there is none.
 */
export function byline(record: DocumentRecord): string {
    const parts: string[] = [];
    if (record.author) {
        parts.push(`By ${escapeHtml(record.author)}`);
    }
    parts.push(formatLongDate(record.publicationDate));
    parts.push(`Status: ${record.publicationState}`);
    return parts.join(" | ");
}

/**
 * Renders an already rewritten body into the page template.
 */
export function renderDocument(
    record: DocumentRecord,
    body: string,
    pageTemplate: string,
    site: SiteInfo,
): string {
    return fillTemplate(pageTemplate, {
        TITLE: escapeHtml(record.title),
        SITE_TITLE: escapeHtml(site.siteTitle),
        AUTHOR: escapeHtml(record.author),
        DATE: formatLongDate(record.publicationDate),
        STATUS: record.publicationState,
        TAGS: escapeHtml(record.tags.join(", ")),
        META: byline(record),
        NAVIGATION: "",
        CONTENT: renderMarkdown(body),
        COPYRIGHT: escapeHtml(copyright(site)),
    });
}

/**
 * Writes a page at `record.outputPath` below `outputRoot`.
 */
export async function writeDocument(
    outputRoot: string,
    record: DocumentRecord,
    html: string,
): Promise<string> {
    const file = path.join(outputRoot, ...record.outputPath.split("/"));
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, html, "utf-8");
    return file;
}
