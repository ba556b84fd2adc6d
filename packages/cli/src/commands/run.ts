import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import {
    BasicError,
    InputSource,
    interpret,
    OutputSink,
    Statement,
} from "@blockbasic/core";
import { ConfigError, LoadedConfig, loadConfig } from "../config";
import { exhaustedInput, LineInput, readStream, stdoutSink } from "../io";
import { Logger } from "../logger";

export interface RunArguments {
    file?: string;
    config?: string;
    prompt?: string;
    trace?: boolean;
    verbose?: boolean;
}

export interface RunEnvironment {
    cwd: string;
    output: OutputSink;
    input: InputSource;
    logger: Logger;
    readStdin: () => Promise<string>;
}

interface ProgramLocation {
    /** Name shown in diagnostics. */
    filename: string;
    /** Absolute path, or undefined to read standard input. */
    path?: string;
}

const STDIN_NAME = "<stdin>";

function locateProgram(
    args: RunArguments,
    loaded: LoadedConfig,
    cwd: string,
): ProgramLocation {
    if (args.file === "-") return { filename: STDIN_NAME };
    if (args.file !== undefined) {
        return { filename: args.file, path: resolve(cwd, args.file) };
    }

    const { entrypoint } = loaded.config;
    if (entrypoint !== undefined && loaded.path !== undefined) {
        return {
            filename: entrypoint,
            path: resolve(dirname(loaded.path), entrypoint),
        };
    }
    return { filename: STDIN_NAME };
}

function describeError(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

/** Runs one program and returns the process exit code. */
export async function runProgram(
    args: RunArguments,
    env: RunEnvironment,
): Promise<number> {
    const { logger } = env;

    let loaded: LoadedConfig;
    try {
        loaded = await loadConfig(env.cwd, args.config);
    } catch (e) {
        if (!(e instanceof ConfigError)) throw e;
        logger.error(`Configuration error: ${e.message}`);
        return 1;
    }
    if (loaded.path) logger.verbose(`Using configuration ${loaded.path}`);

    const program = locateProgram(args, loaded, env.cwd);
    let source: string;
    try {
        source =
            program.path === undefined
                ? await env.readStdin()
                : await readFile(program.path, "utf-8");
    } catch (e) {
        logger.error(`Can't open ${program.filename} for reading`);
        logger.verbose(describeError(e));
        return 1;
    }

    const traceEnabled = args.trace ?? loaded.config.trace ?? false;
    const trace = traceEnabled
        ? (statement: Statement) =>
              logger.detail(`TRACE line ${statement.loc.line}`)
        : undefined;

    logger.verbose(`Running ${program.filename}`);
    try {
        await interpret(source, {
            filename: program.filename,
            output: env.output,
            // Standard input was consumed reading the program.
            input: program.path === undefined ? exhaustedInput : env.input,
            prompt: args.prompt ?? loaded.config.prompt,
            trace,
        });
    } catch (e) {
        if (e instanceof BasicError) {
            logger.info(e.format(source));
        } else {
            logger.error(`Internal error: ${describeError(e)}`);
        }
        return 1;
    }

    logger.verbose("Program finished");
    return 0;
}

/** Wires a run to the real process streams. */
export async function runCommand(args: RunArguments): Promise<number> {
    const input = new LineInput(process.stdin);
    try {
        return await runProgram(args, {
            cwd: process.cwd(),
            output: stdoutSink,
            input,
            logger: new Logger(args.verbose ?? false),
            readStdin: () => readStream(process.stdin),
        });
    } finally {
        input.close();
    }
}
