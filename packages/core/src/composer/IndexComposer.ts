import fs from "fs/promises";
import path from "path";

import { CorpusEntry } from "../types/document";
import { escapeHtml, fillTemplate, formatLongDate } from "../utils/html";
import { copyright, SiteInfo } from "../renderer/DocumentRenderer";
import { markdownToPlainText } from "../renderer/markdown";

export const DEFAULT_HOME_ENTRIES = 10;
export const DEFAULT_EXCERPT_LENGTH = 150;

export interface Teaser {
    title: string;
    date: string;
    excerpt: string;
    link: string;
}

export interface ComposeOptions extends SiteInfo {
    homeEntries?: number;
    excerptLength?: number;
}

/**
 * Plain-text teaser of a body, cut at `length` characters with "..."
 * appended only when something was cut.
 */
export function deriveExcerpt(
    body: string,
    length = DEFAULT_EXCERPT_LENGTH,
): string {
    const chars = Array.from(markdownToPlainText(body));
    return chars.length > length
        ? chars.slice(0, length).join("") + "..."
        : chars.join("");
}

export function buildTeasers(
    ordering: readonly CorpusEntry[],
    homeEntries = DEFAULT_HOME_ENTRIES,
    excerptLength = DEFAULT_EXCERPT_LENGTH,
): Teaser[] {
    return ordering.slice(0, homeEntries).map(({ record, body }) => ({
        title: record.title,
        date: formatLongDate(record.publicationDate),
        excerpt: deriveExcerpt(body, excerptLength),
        link: record.outputPath,
    }));
}

export function renderTeaser(teaser: Teaser): string {
    const link = escapeHtml(teaser.link);
    return `
                <article class="article-card">
                    <div class="article-content">
                        <h3 class="article-title"><a href="${link}">${escapeHtml(teaser.title)}</a></h3>
                        <div class="article-date">${teaser.date}</div>
                        <p class="article-excerpt">${escapeHtml(teaser.excerpt)}</p>
                        <a href="${link}" class="read-more">Read More &rarr;</a>
                    </div>
                </article>`;
}

/**
 * Fills the home page template with teasers for the first entries of the
 * published ordering, in that order.
 */
export function composeIndex(
    ordering: readonly CorpusEntry[],
    template: string,
    options: ComposeOptions,
): string {
    const teasers = buildTeasers(
        ordering,
        options.homeEntries,
        options.excerptLength,
    );

    return fillTemplate(template, {
        SITE_TITLE: escapeHtml(options.siteTitle),
        ARTICLES_CONTENT: teasers.map(renderTeaser).join("\n"),
        COPYRIGHT: escapeHtml(copyright(options)),
    });
}

export async function writeIndex(
    outputRoot: string,
    html: string,
): Promise<string> {
    const file = path.join(outputRoot, "index.html");
    await fs.mkdir(outputRoot, { recursive: true });
    await fs.writeFile(file, html, "utf-8");
    return file;
}
