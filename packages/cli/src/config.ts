import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { load, YAMLException } from "js-yaml";

export const DEFAULT_CONFIG_FILE = "blockbasic.yml";

export interface ProjectConfig {
    /** Program file, relative to the configuration file. */
    entrypoint?: string;
    prompt?: string;
    trace?: boolean;
}

export interface LoadedConfig {
    config: ProjectConfig;
    /** Absolute path of the file the configuration came from, if any. */
    path?: string;
}

export class ConfigError extends Error {
    constructor(
        message: string,
        public readonly path: string,
    ) {
        super(`${path}: ${message}`);
        this.name = "ConfigError";
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isMissingFile(e: unknown): boolean {
    return e instanceof Error && "code" in e && e.code === "ENOENT";
}

export function parseConfig(text: string, path: string): ProjectConfig {
    let data: unknown;
    try {
        data = load(text, { filename: path });
    } catch (e) {
        if (e instanceof YAMLException) throw new ConfigError(e.reason, path);
        throw e;
    }

    // An empty file is an empty configuration.
    if (data === undefined || data === null) return {};
    if (!isRecord(data)) {
        throw new ConfigError("expected a mapping at the top level", path);
    }

    const config: ProjectConfig = {};
    for (const [key, value] of Object.entries(data)) {
        switch (key) {
            case "entrypoint":
            case "prompt":
                if (typeof value !== "string") {
                    throw new ConfigError(`'${key}' must be a string`, path);
                }
                config[key] = value;
                break;
            case "trace":
                if (typeof value !== "boolean") {
                    throw new ConfigError("'trace' must be a boolean", path);
                }
                config.trace = value;
                break;
            default:
                throw new ConfigError(`unknown key '${key}'`, path);
        }
    }
    return config;
}

/**
 * Reads the configuration named on the command line, or the default file
 * in `cwd`. Only the default file may be absent.
 */
export async function loadConfig(
    cwd: string,
    explicitPath?: string,
): Promise<LoadedConfig> {
    const path = resolve(cwd, explicitPath ?? DEFAULT_CONFIG_FILE);

    let text: string;
    try {
        text = await readFile(path, "utf-8");
    } catch (e) {
        if (explicitPath === undefined && isMissingFile(e)) {
            return { config: {} };
        }
        const reason = e instanceof Error ? e.message : String(e);
        throw new ConfigError(`cannot read configuration file (${reason})`, path);
    }

    return { config: parseConfig(text, path), path };
}
