import yaml from "js-yaml";

import { DocumentMetadata, PublicationState } from "../types/document";

export const HEADER_SENTINEL = "---";

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function defaultMetadata(body: string): DocumentMetadata {
    return {
        title: "Untitled",
        date: null,
        state: "draft",
        author: "",
        tags: [],
        body,
    };
}

interface HeaderBlock {
    header: string;
    body: string;
}

/**
 * Finds a header that opens on the very first line and closes on the next
 * line consisting of the sentinel alone.
 */
function splitHeader(rawText: string): HeaderBlock | null {
    const text = rawText.startsWith("\uFEFF") ? rawText.slice(1) : rawText;
    const lines = text.split("\n");
    const isSentinel = (line: string) =>
        line.replace(/\r$/, "") === HEADER_SENTINEL;

    if (lines.length === 0 || !isSentinel(lines[0])) {
        return null;
    }

    for (let i = 1; i < lines.length; i++) {
        if (isSentinel(lines[i])) {
            return {
                header: lines.slice(1, i).join("\n"),
                body: lines.slice(i + 1).join("\n").trim(),
            };
        }
    }

    return null;
}

/**
 * Parses a strict `YYYY-MM-DD` calendar date at UTC midnight.
 */
export function parseIsoDate(value: unknown): Date | null {
    if (typeof value !== "string") {
        return null;
    }

    const match = DATE_PATTERN.exec(value.trim());
    if (!match) {
        return null;
    }

    const [year, month, day] = match.slice(1).map(Number);
    const date = new Date(Date.UTC(year, month - 1, day));

    // Rejects rollovers such as 2024-02-30
    if (
        date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day
    ) {
        return null;
    }

    return date;
}

function isScalar(value: unknown): value is string | number | boolean {
    return (
        typeof value === "string" ||
        typeof value === "number" ||
        typeof value === "boolean"
    );
}

function asText(value: unknown, fallback: string): string {
    return isScalar(value) ? String(value) : fallback;
}

function asTags(value: unknown): string[] {
    if (Array.isArray(value)) {
        return value.filter(isScalar).map(String);
    }

    return isScalar(value) ? [String(value)] : [];
}

export function toPublicationState(value: unknown): PublicationState {
    return value === "published" ? "published" : "draft";
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Extracts the front-matter header of a document.
 *
 * Missing or broken headers never throw: the whole result falls back to the
 * defaults and the body is the untouched input. A bad `date` only clears the
 * date.
 */
export function extractMetadata(rawText: string): DocumentMetadata {
    const block = splitHeader(rawText);
    if (!block) {
        return defaultMetadata(rawText);
    }

    let parsed: unknown;
    try {
        parsed = yaml.load(block.header, { schema: yaml.CORE_SCHEMA });
    } catch {
        return defaultMetadata(rawText);
    }

    if (!isRecord(parsed)) {
        return defaultMetadata(rawText);
    }

    return {
        title: asText(parsed.title, "Untitled"),
        date: parseIsoDate(parsed.date),
        state: toPublicationState(parsed.status),
        author: asText(parsed.author, ""),
        tags: asTags(parsed.tags),
        body: block.body,
    };
}
