import fs from "fs/promises";
import path from "path";

import { ConfigurationError, hasErrorCode } from "../utils/err";
import { Logger, silentLogger } from "../utils/logger";

export const FALLBACK_PAGE_TEMPLATE = `<!DOCTYPE html>
<html>
<head>
    <meta charset="utf-8">
    <title>{{TITLE}}</title>
</head>
<body>
    <div class="nav"><a href="../index.html">&larr; Back to Home</a></div>
    <div class="meta"><strong>{{TITLE}}</strong><br>{{META}}</div>
{{CONTENT}}
</body>
</html>
`;

export interface Templates {
    page: string;
    index: string;
}

async function readTemplate(file: string): Promise<string | null> {
    try {
        return await fs.readFile(file, "utf-8");
    } catch (e) {
        if (hasErrorCode(e, "ENOENT")) {
            return null;
        }
        throw e;
    }
}

/**
 * Reads the page template, or the built-in page when the file is absent.
 */
export async function loadPageTemplate(
    file: string,
    logger: Logger = silentLogger,
): Promise<string> {
    const page = await readTemplate(file);
    if (page === null) {
        logger.warn(
            `Page template '${file}' not found, using the built-in page.`,
        );
        return FALLBACK_PAGE_TEMPLATE;
    }
    return page;
}

export async function loadTemplates(
    templatesDir: string,
    names: { page: string; index: string },
    logger: Logger = silentLogger,
): Promise<Templates> {
    const indexFile = path.join(templatesDir, names.index);
    const index = await readTemplate(indexFile);
    if (index === null) {
        throw new ConfigurationError(
            `Index template '${indexFile}' not found`,
            "Pass --templates pointing at a directory that holds it",
        );
    }

    const page = await loadPageTemplate(
        path.join(templatesDir, names.page),
        logger,
    );

    return { page, index };
}
