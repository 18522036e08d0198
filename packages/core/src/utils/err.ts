import chalk from "chalk";

/**
 * Base error for every fatal condition in the pipeline.
 *
 * `message` carries the chalk-formatted report, `rawMessage` the plain text.
 */
export class InkpressError extends Error {
    public rawMessage: string;
    public hint?: string;

    constructor(message: string, hint?: string) {
        const output = [`${chalk.red.bold("Error:")} ${chalk.bold(message)}`];

        if (hint) {
            output.push(`${chalk.blue("  =")} ${hint}`);
        }

        super(output.join("\n"));
        this.name = "InkpressError";
        this.rawMessage = message;
        this.hint = hint;
    }
}

/**
 * Missing template, invalid config file or malformed invocation.
 * Raised before any output is written.
 */
export class ConfigurationError extends InkpressError {
    constructor(message: string, hint?: string) {
        super(message, hint);
        this.name = "ConfigurationError";
    }
}

export class DocumentReadError extends InkpressError {
    public path: string;

    constructor(path: string, cause: unknown) {
        super(
            `Failed to read document '${path}'`,
            errorMessage(cause),
        );
        this.name = "DocumentReadError";
        this.path = path;
    }
}

export class OutputCollisionError extends InkpressError {
    public outputPath: string;
    public sources: string[];

    constructor(outputPath: string, sources: string[]) {
        super(
            `Several documents render to '${outputPath}'`,
            `Rename one of: ${sources.join(", ")}`,
        );
        this.name = "OutputCollisionError";
        this.outputPath = outputPath;
        this.sources = sources;
    }
}

export class SourceAcquisitionError extends InkpressError {
    constructor(location: string, reason: string) {
        super(`Could not fetch source '${location}'`, reason);
        this.name = "SourceAcquisitionError";
    }
}

// Errors raised by Node's own modules may come from another realm, so
// these checks look at shape rather than `instanceof Error`.
export function errorMessage(e: unknown): string {
    return typeof e === "object" &&
        e !== null &&
        "message" in e &&
        typeof e.message === "string"
        ? e.message
        : String(e);
}

export function hasErrorCode(e: unknown, code: string): boolean {
    return typeof e === "object" && e !== null && "code" in e && e.code === code;
}
