import fs from "fs/promises";
import yaml from "js-yaml";

import {
    DEFAULT_EXCERPT_LENGTH,
    DEFAULT_HOME_ENTRIES,
} from "../composer/IndexComposer";
import { DEFAULT_ASSET_PREFIX } from "../rewriter/ReferenceRewriter";
import { ConfigurationError, errorMessage, hasErrorCode } from "../utils/err";

export const CONFIG_FILE_NAME = "inkpress.yml";

export interface SiteConfig {
    siteTitle: string;
    /**
     * Directory under the source root holding the Markdown tree
     */
    contentDir: string;
    templatesDir: string;
    pageTemplate: string;
    indexTemplate: string;
    /**
     * Number of teasers on the home page
     */
    homeEntries: number;
    excerptLength: number;
    assetPrefix: string;
    /**
     * Documents rendered in parallel
     */
    concurrency: number;
}

export const DEFAULT_SITE_CONFIG: Omit<SiteConfig, "templatesDir"> = {
    siteTitle: "Blog",
    contentDir: "blogs",
    pageTemplate: "blog_post.template",
    indexTemplate: "blog_home.template",
    homeEntries: DEFAULT_HOME_ENTRIES,
    excerptLength: DEFAULT_EXCERPT_LENGTH,
    assetPrefix: DEFAULT_ASSET_PREFIX,
    concurrency: 8,
};

const STRING_KEYS = [
    "siteTitle",
    "contentDir",
    "templatesDir",
    "pageTemplate",
    "indexTemplate",
    "assetPrefix",
] as const;

const NUMBER_KEYS = ["homeEntries", "excerptLength", "concurrency"] as const;

export function resolveSiteConfig(
    partial: Partial<SiteConfig> & Pick<SiteConfig, "templatesDir">,
): SiteConfig {
    return { ...DEFAULT_SITE_CONFIG, ...partial };
}

/**
 * Validates a parsed config document. Unknown keys are ignored.
 */
export function parseSiteConfig(
    value: unknown,
    source = CONFIG_FILE_NAME,
): Partial<SiteConfig> {
    if (value === null || value === undefined) {
        return {};
    }
    if (typeof value !== "object" || Array.isArray(value)) {
        throw new ConfigurationError(
            `${source} must be a mapping of settings`,
        );
    }

    const entries = new Map<string, unknown>(Object.entries(value));
    const config: Partial<SiteConfig> = {};

    for (const key of STRING_KEYS) {
        const v = entries.get(key);
        if (v === undefined) continue;
        if (typeof v !== "string" || v.length === 0) {
            throw new ConfigurationError(
                `${source}: '${key}' must be a non-empty string`,
            );
        }
        config[key] = v;
    }

    for (const key of NUMBER_KEYS) {
        const v = entries.get(key);
        if (v === undefined) continue;
        if (typeof v !== "number" || !Number.isInteger(v) || v < 1) {
            throw new ConfigurationError(
                `${source}: '${key}' must be a positive integer`,
                `Got ${JSON.stringify(v)}`,
            );
        }
        config[key] = v;
    }

    return config;
}

/**
 * Reads an `inkpress.yml`. A missing file yields an empty config unless
 * `required` is set.
 */
export async function loadSiteConfig(
    file: string,
    required = false,
): Promise<Partial<SiteConfig>> {
    let content: string;
    try {
        content = await fs.readFile(file, "utf-8");
    } catch (e) {
        if (!required && hasErrorCode(e, "ENOENT")) {
            return {};
        }
        throw new ConfigurationError(
            `Cannot read config file '${file}'`,
            errorMessage(e),
        );
    }

    let parsed: unknown;
    try {
        parsed = yaml.load(content);
    } catch (e) {
        throw new ConfigurationError(
            `Invalid YAML in '${file}'`,
            errorMessage(e),
        );
    }

    return parseSiteConfig(parsed, file);
}
