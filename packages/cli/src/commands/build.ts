import path from "path";

import {
    CONFIG_FILE_NAME,
    CorpusAssembler,
    loadSiteConfig,
    Logger,
    resolveSiteConfig,
    SiteConfig,
} from "@inkpress/core";

import { DEFAULT_TEMPLATES_DIR } from "../paths";
import { AcquiredSource, acquireSource } from "../source";
import { reportFailure } from "./report";

export interface BuildArgs {
    source: string;
    out?: string;
    templates?: string;
    config?: string;
    contentDir?: string;
    siteTitle?: string;
}

/**
 * Flags given on the command line, without the unset ones
 */
function flagOverrides(args: BuildArgs): Partial<SiteConfig> {
    const overrides: Partial<SiteConfig> = {};
    if (args.templates) overrides.templatesDir = path.resolve(args.templates);
    if (args.contentDir) overrides.contentDir = args.contentDir;
    if (args.siteTitle) overrides.siteTitle = args.siteTitle;
    return overrides;
}

/**
 * Builds the site for a local directory or git repository.
 *
 * @returns process exit code
 */
export async function runBuild(
    args: BuildArgs,
    logger: Logger,
): Promise<number> {
    let source: AcquiredSource;
    try {
        source = await acquireSource(args.source, logger);
    } catch (e) {
        return reportFailure(logger, e);
    }

    try {
        const configFile = args.config
            ? path.resolve(args.config)
            : path.join(source.dir, CONFIG_FILE_NAME);
        const fileConfig = await loadSiteConfig(configFile, !!args.config);

        if (fileConfig.templatesDir && !args.templates) {
            fileConfig.templatesDir = path.resolve(
                path.dirname(configFile),
                fileConfig.templatesDir,
            );
        }

        const config = resolveSiteConfig({
            siteTitle: source.name,
            templatesDir: DEFAULT_TEMPLATES_DIR,
            ...fileConfig,
            ...flagOverrides(args),
        });

        const outputRoot = path.resolve(
            args.out ?? path.join("dist", source.name),
        );
        const result = await new CorpusAssembler({
            sourceDir: source.dir,
            outputRoot,
            config,
            logger,
        }).run();

        if (result.status === "skipped") {
            logger.warn("Nothing to build.");
        }
        return 0;
    } catch (e) {
        return reportFailure(logger, e);
    } finally {
        await source.cleanup();
    }
}
