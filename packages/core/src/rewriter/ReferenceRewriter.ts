import path from "path";

import { AssetRenameMap } from "../types/document";

export const DEFAULT_ASSET_PREFIX = "../images/";

const IMAGE_EMBED = /!\[([^\]]*)\]\(([^)]+)\)/g;
const TITLED_TARGET = /^(\S+)(\s+(?:"[^"]*"|'[^']*'))$/;
// Remote targets (scheme or protocol-relative) are left as written instead of
// being pointed at a local basename under the prefix.
const REMOTE_TARGET = /^(?:[a-zA-Z][a-zA-Z\d+.-]*:|\/\/)/;

export interface RewriteOptions {
    /**
     * Directory of the document, relative to the content directory
     */
    documentDir?: string;
    assetPrefix?: string;
}

function lookup(
    target: string,
    renameMap: AssetRenameMap,
    documentDir: string | undefined,
): string {
    const fileName = path.posix.basename(target);

    if (documentDir !== undefined) {
        const resolved = path.posix.normalize(
            path.posix.join(documentDir, target),
        );
        const byPath = renameMap.byPath.get(resolved);
        if (byPath !== undefined) {
            return byPath;
        }
    }

    return renameMap.byName.get(fileName) ?? fileName;
}

/**
 * Points every local `![alt](path)` embed at the flat image directory.
 * Alt text, titles and everything outside the embeds are left untouched.
 */
export function rewriteReferences(
    body: string,
    renameMap: AssetRenameMap,
    options: RewriteOptions = {},
): string {
    const prefix = options.assetPrefix ?? DEFAULT_ASSET_PREFIX;

    return body.replace(IMAGE_EMBED, (match, alt: string, inner: string) => {
        const trimmed = inner.trim();
        const titled = TITLED_TARGET.exec(trimmed);
        const target = titled ? titled[1] : trimmed;
        const title = titled ? titled[2] : "";

        if (REMOTE_TARGET.test(target)) {
            return match;
        }

        const assigned = lookup(
            target.replace(/\\/g, "/"),
            renameMap,
            options.documentDir,
        );
        return `![${alt}](${prefix}${assigned}${title})`;
    });
}
