import { createInterface, Interface } from "node:readline";
import { Readable } from "node:stream";
import { InputSource, OutputSink } from "@blockbasic/core";

export const stdoutSink: OutputSink = {
    write: (text) => {
        process.stdout.write(text);
    },
};

/** Input that has already run out, for when stdin carried the program. */
export const exhaustedInput: InputSource = {
    readLine: async () => undefined,
};

/**
 * Line-at-a-time input over a stream. The stream is only opened on the first
 * read, so programs that never ask for input don't hold stdin open.
 */
export class LineInput implements InputSource {
    private readonly buffered: string[] = [];
    private readonly waiting: ((line: string | undefined) => void)[] = [];
    private reader?: Interface;
    private opened = false;
    private ended = false;

    constructor(private readonly stream: Readable) {}

    public readLine(): Promise<string | undefined> {
        this.open();

        const line = this.buffered.shift();
        if (line !== undefined) return Promise.resolve(line);
        if (this.ended) return Promise.resolve(undefined);

        return new Promise((resolve) => this.waiting.push(resolve));
    }

    public close(): void {
        this.reader?.close();
    }

    private open(): void {
        if (this.opened) return;
        this.opened = true;

        // readline never closes over a stream that has already ended.
        if (this.stream.readableEnded) {
            this.ended = true;
            return;
        }

        this.reader = createInterface({ input: this.stream, terminal: false });
        this.reader.on("line", (line: string) => {
            const resolve = this.waiting.shift();
            if (resolve) resolve(line);
            else this.buffered.push(line);
        });
        this.reader.on("close", () => {
            this.ended = true;
            for (const resolve of this.waiting.splice(0)) resolve(undefined);
        });
    }
}

export async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
        chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
    }
    return Buffer.concat(chunks).toString("utf-8");
}
