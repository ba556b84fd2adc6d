import { mkdir, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { DEFAULT_CONFIG_FILE } from "../config";
import { Logger } from "../logger";

const ENTRYPOINT = "main.bas";

const DEFAULT_CONFIG = `entrypoint: ${ENTRYPOINT}
# prompt: "? "
# trace: false
`;

const DEFAULT_PROGRAM = `REM Asks for a name and greets it
INPUT name$
PRINT "Hello, " & name$
`;

/** Creates a project directory with a configuration file and a starter program. */
export async function initProject(
    name: string,
    cwd: string,
    logger: Logger,
): Promise<number> {
    const projectDir = resolve(cwd, name);

    try {
        await mkdir(projectDir, { recursive: true });
        logger.success(`Created directory ${name}/`);

        // "wx" refuses to overwrite an existing project.
        await writeFile(join(projectDir, DEFAULT_CONFIG_FILE), DEFAULT_CONFIG, {
            flag: "wx",
        });
        logger.detail(`Created ${name}/${DEFAULT_CONFIG_FILE}`);

        await writeFile(join(projectDir, ENTRYPOINT), DEFAULT_PROGRAM, {
            flag: "wx",
        });
        logger.detail(`Created ${name}/${ENTRYPOINT}`);
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        logger.error(`Failed to initialize project: ${reason}`);
        return 1;
    }

    logger.success(`\nProject '${name}' initialized successfully!`);
    logger.info(`Run with: cd ${name} && blockbasic`);
    return 0;
}
