#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { createConsoleLogger } from "@inkpress/core";

import { runBuild } from "./commands/build";
import { runConvert } from "./commands/convert";
import { runImport } from "./commands/import";
import { runInit } from "./commands/init";

yargs(hideBin(process.argv))
    .scriptName("inkpress")
    .usage("$0 <cmd> [args]")
    .option("verbose", {
        alias: "v",
        type: "boolean",
        default: false,
        describe: "Log every pipeline step",
    })
    .command(
        "build <source>",
        "Build a static site from a local directory or git repository",
        (yargs) =>
            yargs
                .positional("source", {
                    describe: "Directory or git URL holding a 'blogs' folder",
                    type: "string",
                    demandOption: true,
                })
                .option("out", {
                    alias: "o",
                    type: "string",
                    describe: "Output directory (default: dist/<name>)",
                })
                .option("templates", {
                    type: "string",
                    describe: "Directory with blog_post and blog_home templates",
                })
                .option("config", {
                    type: "string",
                    describe: "Path to an inkpress.yml",
                })
                .option("content-dir", {
                    type: "string",
                    describe: "Content directory below the source root",
                })
                .option("site-title", {
                    type: "string",
                    describe: "Title shown in page headers",
                }),
        async (argv) => {
            process.exitCode = await runBuild(
                argv,
                createConsoleLogger({ verbose: argv.verbose }),
            );
        },
    )
    .command(
        "convert <input> [output]",
        "Convert a single Markdown file to HTML",
        (yargs) =>
            yargs
                .positional("input", {
                    describe: "Markdown file",
                    type: "string",
                    demandOption: true,
                })
                .positional("output", {
                    describe: "HTML file (default: input with .html)",
                    type: "string",
                })
                .option("template", {
                    type: "string",
                    describe: "Page template with {{TITLE}} and {{CONTENT}}",
                }),
        async (argv) => {
            process.exitCode = await runConvert(
                argv,
                createConsoleLogger({ verbose: argv.verbose }),
            );
        },
    )
    .command(
        "import <input> <output>",
        "Convert saved HTML pages into Markdown posts",
        (yargs) =>
            yargs
                .positional("input", {
                    describe: "Directory with .html files",
                    type: "string",
                    demandOption: true,
                })
                .positional("output", {
                    describe: "Directory receiving .md files",
                    type: "string",
                    demandOption: true,
                }),
        async (argv) => {
            process.exitCode = await runImport(
                argv,
                createConsoleLogger({ verbose: argv.verbose }),
            );
        },
    )
    .command(
        "init <name>",
        "Initialize a new blog source tree",
        (yargs) =>
            yargs.positional("name", {
                describe: "Name of the new project directory",
                type: "string",
                demandOption: true,
            }),
        async (argv) => {
            process.exitCode = await runInit(
                argv,
                createConsoleLogger({ verbose: argv.verbose }),
            );
        },
    )
    .demandCommand(1)
    .strict()
    .help()
    .parseAsync()
    .catch((e: unknown) => {
        console.error(e);
        process.exit(1);
    });
