import { load } from "cheerio";
import fs from "fs/promises";
import yaml from "js-yaml";
import path from "path";
import TurndownService from "turndown";

import { Logger, silentLogger } from "../utils/logger";

const CONTENT_SELECTORS = ["main", "article", "div.content", "body"];

function createTurndown(): TurndownService {
    return new TurndownService({
        headingStyle: "atx",
        codeBlockStyle: "fenced",
        bulletListMarker: "-",
        emDelimiter: "*",
    });
}

/**
 * Best-effort extraction of a saved HTML page into a Markdown document with
 * a published header dated `today` (YYYY-MM-DD).
 */
export function htmlToMarkdown(html: string, today: string): string {
    const $ = load(html);
    const title = $("title").first().text().trim() || "Untitled";

    const content = CONTENT_SELECTORS.map((s) => $(s).first()).find(
        (el) => el.length > 0,
    );
    const inner = content?.html();
    if (!content || inner === null || inner === undefined) {
        return `# ${title}\n\nNo content found.`;
    }

    const header = yaml.dump(
        { title, date: today, status: "published" },
        { schema: yaml.CORE_SCHEMA },
    );
    const body = createTurndown().turndown(inner).trim();

    return `---\n${header}---\n\n${body}\n`;
}

export function todayIso(now: Date = new Date()): string {
    return now.toISOString().slice(0, 10);
}

/**
 * Converts every `*.html` file of `inputDir` into `outputDir` and copies the
 * `*_files` asset folders browsers save beside them.
 *
 * @returns names of the written Markdown files
 */
export async function importHtmlDirectory(
    inputDir: string,
    outputDir: string,
    logger: Logger = silentLogger,
    now: Date = new Date(),
): Promise<string[]> {
    await fs.mkdir(outputDir, { recursive: true });
    const entries = await fs.readdir(inputDir, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
        if (entry.isDirectory() && entry.name.endsWith("_files")) {
            const dest = path.join(outputDir, entry.name);
            await fs.rm(dest, { recursive: true, force: true });
            await fs.cp(path.join(inputDir, entry.name), dest, {
                recursive: true,
            });
            logger.info(`Copied images: ${entry.name}`);
        }
    }

    const written: string[] = [];
    for (const entry of entries) {
        if (!entry.isFile() || !entry.name.endsWith(".html")) continue;

        const html = await fs.readFile(path.join(inputDir, entry.name), "utf-8");
        const mdName = entry.name.replace(/\.html$/, ".md");
        await fs.writeFile(
            path.join(outputDir, mdName),
            htmlToMarkdown(html, todayIso(now)),
            "utf-8",
        );
        written.push(mdName);
        logger.info(`Converted: ${entry.name} -> ${mdName}`);
    }

    return written;
}
