import { importHtmlDirectory, Logger } from "@inkpress/core";

import { reportFailure } from "./report";

export interface ImportArgs {
    input: string;
    output: string;
}

export async function runImport(
    args: ImportArgs,
    logger: Logger,
): Promise<number> {
    try {
        const written = await importHtmlDirectory(
            args.input,
            args.output,
            logger,
        );
        logger.success(`Converted ${written.length} HTML files.`);
        return 0;
    } catch (e) {
        return reportFailure(logger, e);
    }
}
