import { spawn } from "child_process";
import fs from "fs/promises";
import os from "os";
import path from "path";

import { Logger, SourceAcquisitionError } from "@inkpress/core";

const REMOTE_PATTERN = /^(?:https?:\/\/|ssh:\/\/|git:\/\/|git@)/;

export interface AcquiredSource {
    dir: string;
    /**
     * Repository or directory name, used for the default output dir and title
     */
    name: string;
    cleanup: () => Promise<void>;
}

export function isRemoteSource(location: string): boolean {
    return REMOTE_PATTERN.test(location);
}

export function extractRepoName(url: string): string {
    const last = url.replace(/\/+$/, "").split(/[/:]/).pop() ?? "";
    return last.endsWith(".git") ? last.slice(0, -4) : last;
}

export function cloneRepository(url: string, target: string): Promise<void> {
    return new Promise((resolve, reject) => {
        const child = spawn("git", ["clone", "--depth", "1", url, target], {
            stdio: ["ignore", "ignore", "pipe"],
        });

        let stderr = "";
        child.stderr?.on("data", (chunk: Buffer) => {
            stderr += chunk.toString();
        });

        child.on("error", (e) =>
            reject(new SourceAcquisitionError(url, e.message)),
        );
        child.on("close", (code) => {
            if (code === 0) {
                resolve();
            } else {
                reject(
                    new SourceAcquisitionError(
                        url,
                        stderr.trim() || `git exited with code ${code}`,
                    ),
                );
            }
        });
    });
}

/**
 * Materializes a local tree for `location`: remote repositories are cloned
 * into a temporary directory removed by `cleanup`.
 */
export async function acquireSource(
    location: string,
    logger: Logger,
): Promise<AcquiredSource> {
    if (!isRemoteSource(location)) {
        const dir = path.resolve(location);
        try {
            await fs.access(dir);
        } catch {
            throw new SourceAcquisitionError(location, "Directory not found");
        }
        return {
            dir,
            name: path.basename(dir),
            cleanup: async () => {},
        };
    }

    const tmp = await fs.mkdtemp(path.join(os.tmpdir(), "inkpress-"));
    const dir = path.join(tmp, "repo");
    const cleanup = () => fs.rm(tmp, { recursive: true, force: true });

    logger.info(`Cloning repository: ${location}`);
    try {
        await cloneRepository(location, dir);
    } catch (e) {
        await cleanup();
        throw e;
    }

    return { dir, name: extractRepoName(location), cleanup };
}
