import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { InputSource, OutputSink } from "@blockbasic/core";
import { RunEnvironment } from "../src/commands/run";
import { Logger } from "../src/logger";

export const plain = (text: string) => text.replace(/\x1B\[[0-9;]*[a-zA-Z]/g, "");

export async function makeTempDir(): Promise<string> {
    return mkdtemp(join(tmpdir(), "blockbasic-"));
}

export async function removeDir(dir: string): Promise<void> {
    await rm(dir, { recursive: true, force: true });
}

export class Captured {
    public text = "";
    public readonly write = (text: string): void => {
        this.text += text;
    };
}

export interface TestEnvironment extends RunEnvironment {
    stdout: Captured;
    stderr: Captured;
}

export function makeEnvironment(
    cwd: string,
    inputs: string[] = [],
    stdin = "",
    verbose = false,
): TestEnvironment {
    const stdout = new Captured();
    const stderr = new Captured();
    const queue = [...inputs];
    const output: OutputSink = { write: stdout.write };
    const input: InputSource = { readLine: async () => queue.shift() };

    return {
        cwd,
        output,
        input,
        logger: new Logger(verbose, stderr.write),
        readStdin: async () => stdin,
        stdout,
        stderr,
    };
}
