import fs from "fs/promises";
import path from "path";

import { hasErrorCode } from "./err";

const utf8 = new TextDecoder("utf-8", { fatal: true });

export function toPosix(p: string): string {
    return p.split(path.sep).join("/");
}

function compareCodeUnits(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

async function isLinkedFile(full: string): Promise<boolean> {
    try {
        return (await fs.stat(full)).isFile();
    } catch (e) {
        if (hasErrorCode(e, "ENOENT")) {
            return false;
        }
        throw e;
    }
}

/**
 * Recursively lists files under `root` as POSIX paths relative to it,
 * sorted by code unit so that every run sees the same order. Symlinked
 * files are listed; symlinked directories are not descended into.
 */
export async function listFiles(
    root: string,
    filter: (relativePath: string) => boolean = () => true,
): Promise<string[]> {
    const found: string[] = [];

    const visit = async (dir: string): Promise<void> => {
        const entries = await fs.readdir(dir, { withFileTypes: true });
        for (const entry of entries) {
            const full = path.join(dir, entry.name);
            if (entry.isDirectory()) {
                await visit(full);
            } else if (
                entry.isFile() ||
                (entry.isSymbolicLink() && (await isLinkedFile(full)))
            ) {
                const relative = toPosix(path.relative(root, full));
                if (filter(relative)) {
                    found.push(relative);
                }
            }
        }
    };

    await visit(root);
    return found.sort(compareCodeUnits);
}

export async function pathExists(p: string): Promise<boolean> {
    try {
        await fs.access(p);
        return true;
    } catch {
        return false;
    }
}

export async function isDirectory(p: string): Promise<boolean> {
    try {
        return (await fs.stat(p)).isDirectory();
    } catch {
        return false;
    }
}

/**
 * Reads a file as strict UTF-8, rejecting on malformed byte sequences.
 */
export async function readUtf8(file: string): Promise<string> {
    return utf8.decode(await fs.readFile(file));
}
