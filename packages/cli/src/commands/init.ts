import fs from "fs/promises";
import path from "path";

import { CONFIG_FILE_NAME, Logger } from "@inkpress/core";

import { reportFailure } from "./report";

const DEFAULT_CONFIG = `siteTitle: "My Blog"
contentDir: "blogs"
# templatesDir: "templates"
homeEntries: 10
excerptLength: 150
`;

const DEFAULT_POST = `---
title: Hello World
date: 2024-01-01
status: draft
author: ""
tags:
    - intro
---

# Hello World

Set \`status: published\` in the header to list this post on the home page.
`;

export interface InitArgs {
    name: string;
}

export async function runInit(args: InitArgs, logger: Logger): Promise<number> {
    const projectDir = path.resolve(args.name);

    try {
        // 1. Create directories
        await fs.mkdir(path.join(projectDir, "blogs", "images"), {
            recursive: true,
        });
        logger.success(`Created directory ${args.name}/blogs/`);

        // 2. Create .gitignore
        await fs.writeFile(path.join(projectDir, ".gitignore"), "dist/\n");
        logger.info(`Created ${args.name}/.gitignore`);

        // 3. Create inkpress.yml
        await fs.writeFile(
            path.join(projectDir, CONFIG_FILE_NAME),
            DEFAULT_CONFIG,
        );
        logger.info(`Created ${args.name}/${CONFIG_FILE_NAME}`);

        // 4. Create a first post
        await fs.writeFile(
            path.join(projectDir, "blogs", "hello-world.md"),
            DEFAULT_POST,
        );
        await fs.writeFile(
            path.join(projectDir, "blogs", "images", ".gitkeep"),
            "",
        );
        logger.info(`Created ${args.name}/blogs/hello-world.md`);

        logger.success(`\nProject '${args.name}' initialized successfully!`);
        logger.info(`Build with: inkpress build ${args.name}`);
        return 0;
    } catch (e) {
        return reportFailure(logger, e);
    }
}
