export interface OutputSink {
    write(text: string): void;
}

export interface InputSource {
    /** Resolves to undefined once the input is exhausted. */
    readLine(): Promise<string | undefined>;
}
