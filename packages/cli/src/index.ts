#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { initProject } from "./commands/init";
import { runCommand } from "./commands/run";
import { Logger } from "./logger";

yargs(hideBin(process.argv))
    .scriptName("blockbasic")
    .usage("$0 [file] [options]")
    .command(
        "$0 [file]",
        "Run a BASIC program; reads standard input when no file is given",
        (yargs) =>
            yargs
                .positional("file", {
                    describe: "Program to run, or - for standard input",
                    type: "string",
                })
                .option("config", {
                    alias: "c",
                    describe: "Project file (defaults to ./blockbasic.yml)",
                    type: "string",
                })
                .option("prompt", {
                    describe: "Text written before each INPUT",
                    type: "string",
                })
                .option("trace", {
                    describe: "Log each statement's line before it runs",
                    type: "boolean",
                })
                .option("verbose", {
                    alias: "v",
                    describe: "Log what the runner is doing",
                    type: "boolean",
                    default: false,
                }),
        async (argv) => {
            process.exitCode = await runCommand(argv);
        },
    )
    .command(
        "init <name>",
        "Create a new project directory",
        (yargs) =>
            yargs.positional("name", {
                describe: "Name of the new project directory",
                type: "string",
                demandOption: true,
            }),
        async (argv) => {
            process.exitCode = await initProject(
                argv.name,
                process.cwd(),
                new Logger(),
            );
        },
    )
    .strict()
    .help()
    .version()
    .parseAsync()
    .catch((e: unknown) => {
        new Logger().error(
            `Internal error: ${e instanceof Error ? e.message : String(e)}`,
        );
        process.exitCode = 1;
    });
