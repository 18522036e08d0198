export type PublicationState = "published" | "draft";

export interface DocumentMetadata {
    title: string;
    date: Date | null;
    state: PublicationState;
    author: string;
    tags: string[];
    /**
     * Document text with the header block removed
     */
    body: string;
}

export interface DocumentRecord {
    readonly title: string;
    readonly publicationDate: Date | null;
    readonly publicationState: PublicationState;
    readonly author: string;
    readonly tags: readonly string[];
    /**
     * Absolute path of the source file
     */
    readonly sourcePath: string;
    /**
     * Path relative to the content directory, POSIX separators
     */
    readonly relativePath: string;
    /**
     * `{published|draft}/{basename}.html`, relative to the output root
     */
    readonly outputPath: string;
    /**
     * Position in discovery order
     */
    readonly order: number;
}

export interface CorpusEntry {
    readonly record: DocumentRecord;
    readonly body: string;
}

export type Corpus = readonly CorpusEntry[];

export interface AssetRenameMap {
    /**
     * Original basename -> assigned basename, first occurrence wins
     */
    readonly byName: ReadonlyMap<string, string>;
    /**
     * Relative source path -> assigned basename
     */
    readonly byPath: ReadonlyMap<string, string>;
}
