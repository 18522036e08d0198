import fs from "fs/promises";
import os from "os";
import path from "path";

import { dedupeAssets, isAsset } from "../src/assets/AssetDeduplicator";

async function writeFile(file: string, content: string): Promise<void> {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, content);
}

describe("AssetDeduplicator", () => {
    let tmp: string;
    let contentDir: string;
    let imagesDir: string;

    beforeEach(async () => {
        tmp = await fs.mkdtemp(path.join(os.tmpdir(), "inkpress-assets-"));
        contentDir = path.join(tmp, "blogs");
        imagesDir = path.join(tmp, "site", "images");
    });

    afterEach(async () => {
        await fs.rm(tmp, { recursive: true, force: true });
    });

    test("recognizes image extensions case-insensitively", () => {
        expect(isAsset("photo.JPG")).toBe(true);
        expect(isAsset("icon.ico")).toBe(true);
        expect(isAsset("post.md")).toBe(false);
        expect(isAsset("archive.png.zip")).toBe(false);
    });

    test("keeps both files when basenames collide", async () => {
        await writeFile(path.join(contentDir, "a.png"), "root");
        await writeFile(path.join(contentDir, "sub", "a.png"), "nested");
        await writeFile(path.join(contentDir, "b.JPG"), "b");
        await writeFile(path.join(contentDir, "notes.txt"), "skip");

        const map = await dedupeAssets(contentDir, imagesDir);

        expect((await fs.readdir(imagesDir)).sort()).toEqual([
            "a.png",
            "a_1.png",
            "b.JPG",
        ]);
        expect(await fs.readFile(path.join(imagesDir, "a.png"), "utf-8")).toBe(
            "root",
        );
        expect(
            await fs.readFile(path.join(imagesDir, "a_1.png"), "utf-8"),
        ).toBe("nested");

        expect([...map.byPath.entries()]).toEqual([
            ["a.png", "a.png"],
            ["b.JPG", "b.JPG"],
            ["sub/a.png", "a_1.png"],
        ]);
        const values = [...map.byPath.values()];
        expect(new Set(values).size).toBe(values.length);
    });

    test("the first occurrence owns the basename key", async () => {
        await writeFile(path.join(contentDir, "a", "pic.gif"), "1");
        await writeFile(path.join(contentDir, "b", "pic.gif"), "2");
        await writeFile(path.join(contentDir, "c", "pic.gif"), "3");

        const map = await dedupeAssets(contentDir, imagesDir);

        expect(map.byName.get("pic.gif")).toBe("pic.gif");
        expect(map.byPath.get("b/pic.gif")).toBe("pic_1.gif");
        expect(map.byPath.get("c/pic.gif")).toBe("pic_2.gif");
        expect(
            await fs.readFile(path.join(imagesDir, "pic_2.gif"), "utf-8"),
        ).toBe("3");
    });

    test("never overwrites a file already in the output", async () => {
        await writeFile(path.join(imagesDir, "logo.svg"), "old");
        await writeFile(path.join(contentDir, "logo.svg"), "new");

        const map = await dedupeAssets(contentDir, imagesDir);

        expect(map.byName.get("logo.svg")).toBe("logo_1.svg");
        expect(
            await fs.readFile(path.join(imagesDir, "logo.svg"), "utf-8"),
        ).toBe("old");
        expect(
            await fs.readFile(path.join(imagesDir, "logo_1.svg"), "utf-8"),
        ).toBe("new");
    });

    test("returns an empty map for a tree without images", async () => {
        await writeFile(path.join(contentDir, "post.md"), "# Post");
        const map = await dedupeAssets(contentDir, imagesDir);
        expect(map.byName.size).toBe(0);
        expect(await fs.readdir(imagesDir)).toEqual([]);
    });
});
