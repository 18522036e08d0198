import path from "path";

import {
    Corpus,
    CorpusEntry,
    DocumentMetadata,
    DocumentRecord,
    PublicationState,
} from "../types/document";
import { OutputCollisionError } from "../utils/err";

export function outputPathFor(
    state: PublicationState,
    relativePath: string,
): string {
    const name = path.posix.basename(relativePath).replace(/\.md$/, "");
    return `${state}/${name}.html`;
}

export function createRecord(
    metadata: DocumentMetadata,
    sourcePath: string,
    relativePath: string,
    order: number,
): DocumentRecord {
    return Object.freeze({
        title: metadata.title,
        publicationDate: metadata.date,
        publicationState: metadata.state,
        author: metadata.author,
        tags: Object.freeze([...metadata.tags]),
        sourcePath,
        relativePath,
        outputPath: outputPathFor(metadata.state, relativePath),
        order,
    });
}

export interface Partition {
    published: CorpusEntry[];
    drafts: CorpusEntry[];
}

export function partitionCorpus(corpus: Corpus): Partition {
    return {
        published: corpus.filter(
            (e) => e.record.publicationState === "published",
        ),
        drafts: corpus.filter((e) => e.record.publicationState === "draft"),
    };
}

/**
 * Published entries, newest first. Undated entries sort last and ties keep
 * discovery order.
 */
export function publishedOrdering(corpus: Corpus): CorpusEntry[] {
    const time = (e: CorpusEntry) =>
        e.record.publicationDate?.getTime() ?? Number.NEGATIVE_INFINITY;

    return partitionCorpus(corpus).published.sort((a, b) => {
        const ta = time(a);
        const tb = time(b);
        if (ta === tb) {
            return a.record.order - b.record.order;
        }
        return tb > ta ? 1 : -1;
    });
}

/**
 * Throws when two documents would be written to the same page.
 */
export function assertUniqueOutputs(corpus: Corpus): void {
    const owners = new Map<string, string[]>();
    for (const { record } of corpus) {
        const list = owners.get(record.outputPath) ?? [];
        list.push(record.relativePath);
        owners.set(record.outputPath, list);
    }

    for (const [outputPath, sources] of owners) {
        if (sources.length > 1) {
            throw new OutputCollisionError(outputPath, sources);
        }
    }
}
