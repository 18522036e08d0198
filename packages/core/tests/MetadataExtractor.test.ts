import {
    extractMetadata,
    parseIsoDate,
} from "../src/metadata/MetadataExtractor";

const utc = (y: number, m: number, d: number) => new Date(Date.UTC(y, m - 1, d));

describe("MetadataExtractor", () => {
    test("reads every recognized field", () => {
        const raw = [
            "---",
            "title: Hello",
            "date: 2024-03-01",
            "status: published",
            "author: Ada",
            "tags:",
            "  - a",
            "  - b",
            "extra: ignored",
            "---",
            "",
            "# Body",
            "",
        ].join("\n");

        expect(extractMetadata(raw)).toEqual({
            title: "Hello",
            date: utc(2024, 3, 1),
            state: "published",
            author: "Ada",
            tags: ["a", "b"],
            body: "# Body",
        });
    });

    test("returns defaults and the untouched text without a header", () => {
        const raw = "# Just text\n\nNo header here.\n";
        expect(extractMetadata(raw)).toEqual({
            title: "Untitled",
            date: null,
            state: "draft",
            author: "",
            tags: [],
            body: raw,
        });
    });

    test("an unclosed header falls back to defaults", () => {
        const raw = "---\ntitle: Lonely\nstatus: published\n";
        const meta = extractMetadata(raw);
        expect(meta.title).toBe("Untitled");
        expect(meta.state).toBe("draft");
        expect(meta.body).toBe(raw);
    });

    test("malformed YAML degrades the whole result", () => {
        const raw = "---\ntitle: [unclosed\nstatus: published\n---\nBody";
        const meta = extractMetadata(raw);
        expect(meta.title).toBe("Untitled");
        expect(meta.state).toBe("draft");
        expect(meta.body).toBe(raw);
    });

    test("a header that is not a mapping degrades to defaults", () => {
        const list = "---\n- a\n- b\n---\nBody";
        expect(extractMetadata(list).body).toBe(list);

        const empty = "---\n---\nBody";
        expect(extractMetadata(empty).title).toBe("Untitled");
        expect(extractMetadata(empty).body).toBe(empty);
    });

    test("an invalid date only clears the date", () => {
        const meta = extractMetadata(
            "---\ntitle: Leap\ndate: 2024-02-30\nstatus: published\n---\nx",
        );
        expect(meta.date).toBeNull();
        expect(meta.title).toBe("Leap");
        expect(meta.state).toBe("published");
        expect(meta.body).toBe("x");
    });

    test("only the exact 'published' status publishes", () => {
        expect(extractMetadata("---\nstatus: Published\n---\n").state).toBe(
            "draft",
        );
        expect(extractMetadata("---\nstatus: review\n---\n").state).toBe(
            "draft",
        );
    });

    test("a delimiter inside the body is not a header boundary", () => {
        const meta = extractMetadata(
            "---\ntitle: Rules\n---\nintro\n---\nmore",
        );
        expect(meta.title).toBe("Rules");
        expect(meta.body).toBe("intro\n---\nmore");
    });

    test("the sentinel must be a whole line", () => {
        const raw = "--- not a header\ntitle: x\n---\n";
        expect(extractMetadata(raw).body).toBe(raw);
    });

    test("handles CRLF line endings", () => {
        const meta = extractMetadata(
            "---\r\ntitle: Windows\r\nstatus: published\r\n---\r\nbody\r\n",
        );
        expect(meta.title).toBe("Windows");
        expect(meta.state).toBe("published");
        expect(meta.body).toBe("body");
    });

    test("scalar values are stringified", () => {
        const meta = extractMetadata("---\ntitle: 2024\ntags: solo\n---\n");
        expect(meta.title).toBe("2024");
        expect(meta.tags).toEqual(["solo"]);
    });

    test("parseIsoDate", () => {
        expect(parseIsoDate("2024-06-01")).toEqual(utc(2024, 6, 1));
        expect(parseIsoDate("03/01/2024")).toBeNull();
        expect(parseIsoDate("2024-13-01")).toBeNull();
        expect(parseIsoDate(20240601)).toBeNull();
    });
});
