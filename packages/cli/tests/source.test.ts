import fs from "fs/promises";
import os from "os";
import path from "path";

import { silentLogger, SourceAcquisitionError } from "@inkpress/core";

import { acquireSource, extractRepoName, isRemoteSource } from "../src/source";

describe("source", () => {
    test("extractRepoName", () => {
        expect(extractRepoName("https://github.com/user/my-blog.git")).toBe(
            "my-blog",
        );
        expect(extractRepoName("https://github.com/user/my-blog/")).toBe(
            "my-blog",
        );
        expect(extractRepoName("git@github.com:user/site.git")).toBe("site");
    });

    test("isRemoteSource", () => {
        expect(isRemoteSource("./local/blog")).toBe(false);
        expect(isRemoteSource("/abs/blog")).toBe(false);
        expect(isRemoteSource("https://example.com/user/blog")).toBe(true);
        expect(isRemoteSource("git@example.com:user/blog.git")).toBe(true);
    });

    test("local directories are used in place", async () => {
        const tmp = await fs.mkdtemp(path.join(os.tmpdir(), "inkpress-src-"));
        try {
            const source = await acquireSource(tmp, silentLogger);
            expect(source.dir).toBe(path.resolve(tmp));
            expect(source.name).toBe(path.basename(tmp));
            await source.cleanup();
            expect((await fs.stat(tmp)).isDirectory()).toBe(true);
        } finally {
            await fs.rm(tmp, { recursive: true, force: true });
        }
    });

    test("a missing local directory is reported", async () => {
        await expect(
            acquireSource(
                path.join(os.tmpdir(), "inkpress-absent-dir"),
                silentLogger,
            ),
        ).rejects.toBeInstanceOf(SourceAcquisitionError);
    });
});
