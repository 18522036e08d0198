import fs from "fs/promises";
import os from "os";
import path from "path";

import { silentLogger } from "@inkpress/core";

import { runBuild } from "../src/commands/build";
import { runConvert } from "../src/commands/convert";
import { runImport } from "../src/commands/import";
import { runInit } from "../src/commands/init";

async function writeFile(file: string, content: string): Promise<void> {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, content);
}

async function exists(p: string): Promise<boolean> {
    try {
        await fs.access(p);
        return true;
    } catch {
        return false;
    }
}

const HELLO = "---\ntitle: Hello\ndate: 2024-03-01\nstatus: published\n---\nHi";

describe("commands", () => {
    let tmp: string;
    let source: string;
    let out: string;

    beforeEach(async () => {
        tmp = await fs.mkdtemp(path.join(os.tmpdir(), "inkpress-cli-"));
        source = path.join(tmp, "my-blog");
        out = path.join(tmp, "out");
    });

    afterEach(async () => {
        await fs.rm(tmp, { recursive: true, force: true });
    });

    test("build uses the bundled templates", async () => {
        await writeFile(path.join(source, "blogs", "a.md"), HELLO);

        expect(await runBuild({ source, out }, silentLogger)).toBe(0);

        const index = await fs.readFile(path.join(out, "index.html"), "utf-8");
        expect(index).toContain("<title>my-blog</title>");
        expect(index).toContain('href="published/a.html"');
        const page = await fs.readFile(
            path.join(out, "published", "a.html"),
            "utf-8",
        );
        expect(page).toContain("<title>Hello | my-blog</title>");
    });

    test("inkpress.yml and flags configure the build", async () => {
        await writeFile(path.join(source, "posts", "a.md"), HELLO);
        await writeFile(
            path.join(source, "inkpress.yml"),
            "siteTitle: Notes\ncontentDir: posts\n",
        );

        expect(await runBuild({ source, out }, silentLogger)).toBe(0);
        const index = await fs.readFile(path.join(out, "index.html"), "utf-8");
        expect(index).toContain("<title>Notes</title>");

        expect(
            await runBuild({ source, out, siteTitle: "Flag" }, silentLogger),
        ).toBe(0);
        const flagged = await fs.readFile(path.join(out, "index.html"), "utf-8");
        expect(flagged).toContain("<title>Flag</title>");
    });

    test("a missing content directory exits cleanly without output", async () => {
        await fs.mkdir(source, { recursive: true });

        expect(await runBuild({ source, out }, silentLogger)).toBe(0);
        expect(await exists(out)).toBe(false);
    });

    test("missing templates fail the build", async () => {
        await writeFile(path.join(source, "blogs", "a.md"), HELLO);
        const templates = path.join(tmp, "empty");
        await fs.mkdir(templates);

        expect(
            await runBuild({ source, out, templates }, silentLogger),
        ).toBe(1);
        expect(await exists(out)).toBe(false);
    });

    test("an explicit config file must exist", async () => {
        await writeFile(path.join(source, "blogs", "a.md"), HELLO);
        const config = path.join(tmp, "absent.yml");

        expect(await runBuild({ source, out, config }, silentLogger)).toBe(1);
    });

    test("init scaffolds a buildable tree", async () => {
        const project = path.join(tmp, "fresh");

        expect(await runInit({ name: project }, silentLogger)).toBe(0);
        expect(await runBuild({ source: project, out }, silentLogger)).toBe(0);

        expect(await exists(path.join(out, "draft", "hello-world.html"))).toBe(
            true,
        );
        const index = await fs.readFile(path.join(out, "index.html"), "utf-8");
        expect(index).toContain("<title>My Blog</title>");
        expect(index).not.toContain('<article class="article-card">');
    });

    test("convert writes a single page", async () => {
        const input = path.join(tmp, "note.md");
        await writeFile(input, "# Note");

        expect(await runConvert({ input }, silentLogger)).toBe(0);
        const html = await fs.readFile(path.join(tmp, "note.html"), "utf-8");
        expect(html).toContain("<h1>Note</h1>");
    });

    test("import converts saved pages", async () => {
        const input = path.join(tmp, "saved");
        await writeFile(
            path.join(input, "page.html"),
            "<html><head><title>Saved</title></head><body><p>Text</p></body></html>",
        );

        expect(await runImport({ input, output: out }, silentLogger)).toBe(0);
        expect(await exists(path.join(out, "page.md"))).toBe(true);
    });
});
