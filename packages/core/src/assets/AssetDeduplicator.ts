import fs from "fs/promises";
import path from "path";

import { AssetRenameMap } from "../types/document";
import { Logger, silentLogger } from "../utils/logger";
import { listFiles, pathExists } from "../utils/walk";

export const ASSET_EXTENSIONS: ReadonlySet<string> = new Set([
    ".jpg",
    ".jpeg",
    ".png",
    ".gif",
    ".svg",
    ".webp",
    ".bmp",
    ".ico",
]);

export function isAsset(fileName: string): boolean {
    return ASSET_EXTENSIONS.has(path.extname(fileName).toLowerCase());
}

/**
 * Picks `name.ext`, or the first free `name_N.ext` when taken.
 */
async function freeName(dir: string, fileName: string): Promise<string> {
    const ext = path.extname(fileName);
    const stem = fileName.slice(0, fileName.length - ext.length);

    let candidate = fileName;
    let counter = 1;
    while (await pathExists(path.join(dir, candidate))) {
        candidate = `${stem}_${counter}${ext}`;
        counter++;
    }

    return candidate;
}

/**
 * Copies every image under `contentDir` into the flat `imagesDir`.
 *
 * Files are visited in sorted path order. A name already present in
 * `imagesDir` gets a numeric suffix, so no copy ever overwrites another.
 */
export async function dedupeAssets(
    contentDir: string,
    imagesDir: string,
    logger: Logger = silentLogger,
): Promise<AssetRenameMap> {
    await fs.mkdir(imagesDir, { recursive: true });

    const byName = new Map<string, string>();
    const byPath = new Map<string, string>();

    const assets = await listFiles(contentDir, isAsset);
    for (const relativePath of assets) {
        const original = path.posix.basename(relativePath);
        const assigned = await freeName(imagesDir, original);
        const source = path.join(contentDir, relativePath);
        const target = path.join(imagesDir, assigned);

        await fs.copyFile(source, target);
        const stat = await fs.stat(source);
        await fs.utimes(target, stat.atime, stat.mtime);

        if (!byName.has(original)) {
            byName.set(original, assigned);
        }
        byPath.set(relativePath, assigned);

        logger.info(`Copied image: ${original} -> images/${assigned}`);
    }

    return Object.freeze({ byName, byPath });
}
