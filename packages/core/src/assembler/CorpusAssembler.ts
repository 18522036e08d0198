import fs from "fs/promises";
import path from "path";

import { SiteConfig } from "../config/SiteConfig";
import { dedupeAssets } from "../assets/AssetDeduplicator";
import { composeIndex, writeIndex } from "../composer/IndexComposer";
import { extractMetadata } from "../metadata/MetadataExtractor";
import {
    renderDocument,
    SiteInfo,
    writeDocument,
} from "../renderer/DocumentRenderer";
import { loadTemplates, Templates } from "../renderer/template";
import { rewriteReferences } from "../rewriter/ReferenceRewriter";
import { AssetRenameMap, Corpus, CorpusEntry } from "../types/document";
import { DocumentReadError } from "../utils/err";
import { Logger, silentLogger } from "../utils/logger";
import { isDirectory, listFiles, readUtf8 } from "../utils/walk";
import {
    assertUniqueOutputs,
    createRecord,
    partitionCorpus,
    publishedOrdering,
} from "./corpus";

export enum PipelineStage {
    Init = "Init",
    AssetsCopied = "AssetsCopied",
    DocumentsClassified = "DocumentsClassified",
    DocumentsRendered = "DocumentsRendered",
    IndexComposed = "IndexComposed",
    Done = "Done",
}

const STAGE_ORDER: readonly PipelineStage[] = [
    PipelineStage.Init,
    PipelineStage.AssetsCopied,
    PipelineStage.DocumentsClassified,
    PipelineStage.DocumentsRendered,
    PipelineStage.IndexComposed,
    PipelineStage.Done,
];

export interface AssemblerOptions {
    /**
     * Root of the source tree, the content directory lives below it
     */
    sourceDir: string;
    outputRoot: string;
    config: SiteConfig;
    logger?: Logger;
    now?: () => Date;
}

export type BuildResult =
    | { status: "skipped"; reason: string }
    | {
          status: "built";
          outputRoot: string;
          published: number;
          drafts: number;
          total: number;
          assets: number;
      };

export const IMAGES_DIR = "images";

/**
 * Runs the whole pipeline for one source tree.
 *
 * Everything is written to a staging directory beside the output root, which
 * replaces the output root only once every page exists. A fatal error removes
 * the staging directory and leaves the previous output as it was.
 */
export class CorpusAssembler {
    private stage: PipelineStage = PipelineStage.Init;
    private logger: Logger;

    constructor(private options: AssemblerOptions) {
        this.logger = options.logger ?? silentLogger;
    }

    public get currentStage(): PipelineStage {
        return this.stage;
    }

    public async run(): Promise<BuildResult> {
        if (this.stage !== PipelineStage.Init) {
            throw new Error(
                `Assembler already ran (stage ${this.stage}), create a new one`,
            );
        }

        const { config, sourceDir } = this.options;
        const contentDir = path.join(sourceDir, config.contentDir);

        if (!(await isDirectory(contentDir))) {
            const reason = `No '${config.contentDir}' directory found in ${sourceDir}`;
            this.logger.warn(reason);
            return { status: "skipped", reason };
        }

        const templates = await loadTemplates(
            config.templatesDir,
            { page: config.pageTemplate, index: config.indexTemplate },
            this.logger,
        );

        const outputRoot = path.resolve(this.options.outputRoot);
        const parent = path.dirname(outputRoot);
        await fs.mkdir(parent, { recursive: true });
        const staging = await fs.mkdtemp(
            path.join(parent, `.${path.basename(outputRoot)}-staging-`),
        );

        try {
            await fs.chmod(staging, 0o755);
            const counts = await this.build(contentDir, staging, templates);

            await fs.rm(outputRoot, { recursive: true, force: true });
            await fs.rename(staging, outputRoot);
            this.advance(PipelineStage.Done);

            this.logger.success(`Generated blog site in '${outputRoot}'`);
            this.logger.success(
                `Found ${counts.published} published blogs and ${counts.total} total blogs`,
            );

            return { status: "built", outputRoot, ...counts };
        } catch (e) {
            await fs.rm(staging, { recursive: true, force: true });
            throw e;
        }
    }

    private async build(
        contentDir: string,
        staging: string,
        templates: Templates,
    ) {
        const { config } = this.options;
        const site: SiteInfo = {
            siteTitle: config.siteTitle,
            year: (this.options.now?.() ?? new Date()).getFullYear(),
        };

        const renameMap = await dedupeAssets(
            contentDir,
            path.join(staging, IMAGES_DIR),
            this.logger,
        );
        for (const state of ["published", "draft"]) {
            await fs.mkdir(path.join(staging, state), { recursive: true });
        }
        this.advance(PipelineStage.AssetsCopied);

        const corpus = await this.readCorpus(contentDir);
        assertUniqueOutputs(corpus);
        const { published, drafts } = partitionCorpus(corpus);
        this.advance(PipelineStage.DocumentsClassified);

        const concurrency = Math.max(1, config.concurrency);
        for (let i = 0; i < corpus.length; i += concurrency) {
            await Promise.all(
                corpus
                    .slice(i, i + concurrency)
                    .map((entry) =>
                        this.renderEntry(
                            entry,
                            renameMap,
                            staging,
                            templates.page,
                            site,
                        ),
                    ),
            );
        }
        this.advance(PipelineStage.DocumentsRendered);

        const index = composeIndex(publishedOrdering(corpus), templates.index, {
            ...site,
            homeEntries: config.homeEntries,
            excerptLength: config.excerptLength,
        });
        await writeIndex(staging, index);
        this.advance(PipelineStage.IndexComposed);

        return {
            published: published.length,
            drafts: drafts.length,
            total: corpus.length,
            assets: renameMap.byPath.size,
        };
    }

    private async readCorpus(contentDir: string): Promise<Corpus> {
        const files = await listFiles(contentDir, (p) => p.endsWith(".md"));
        const entries: CorpusEntry[] = [];

        for (const [order, relativePath] of files.entries()) {
            const sourcePath = path.join(contentDir, relativePath);

            let raw: string;
            try {
                raw = await readUtf8(sourcePath);
            } catch (e) {
                throw new DocumentReadError(sourcePath, e);
            }

            const metadata = extractMetadata(raw);
            entries.push(
                Object.freeze({
                    record: createRecord(
                        metadata,
                        sourcePath,
                        relativePath,
                        order,
                    ),
                    body: metadata.body,
                }),
            );
        }

        return Object.freeze(entries);
    }

    private async renderEntry(
        entry: CorpusEntry,
        renameMap: AssetRenameMap,
        staging: string,
        pageTemplate: string,
        site: SiteInfo,
    ): Promise<void> {
        const body = rewriteReferences(entry.body, renameMap, {
            documentDir: path.posix.dirname(entry.record.relativePath),
            assetPrefix: this.options.config.assetPrefix,
        });
        const html = renderDocument(entry.record, body, pageTemplate, site);
        await writeDocument(staging, entry.record, html);
        this.logger.debug(
            `Rendered ${entry.record.relativePath} -> ${entry.record.outputPath}`,
        );
    }

    private advance(next: PipelineStage): void {
        const expected = STAGE_ORDER[STAGE_ORDER.indexOf(this.stage) + 1];
        if (next !== expected) {
            throw new Error(
                `Invalid pipeline transition ${this.stage} -> ${next}`,
            );
        }
        this.stage = next;
        this.logger.debug(`[Assembler] ${next}`);
    }
}
