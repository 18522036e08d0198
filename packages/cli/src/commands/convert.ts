import path from "path";

import { convertMarkdownFile, loadPageTemplate, Logger } from "@inkpress/core";

import { DEFAULT_TEMPLATES_DIR } from "../paths";
import { reportFailure } from "./report";

export interface ConvertArgs {
    input: string;
    output?: string;
    template?: string;
}

export async function runConvert(
    args: ConvertArgs,
    logger: Logger,
): Promise<number> {
    try {
        const template = await loadPageTemplate(
            args.template
                ? path.resolve(args.template)
                : path.join(DEFAULT_TEMPLATES_DIR, "simple.template"),
            logger,
        );
        const written = await convertMarkdownFile(
            args.input,
            args.output,
            template,
        );
        logger.success(
            `Successfully converted '${args.input}' to '${written}'`,
        );
        return 0;
    } catch (e) {
        return reportFailure(logger, e);
    }
}
