import chalk from "chalk";

export interface ErrorLocation {
    filename: string;
    line: number;
    col: number;
}

export type BasicErrorKind = "lexer" | "syntax" | "runtime";

const KIND_LABELS: Record<BasicErrorKind, string> = {
    lexer: "Lexer error",
    syntax: "Syntax error",
    runtime: "Runtime error",
};

function describe(message: string, loc?: ErrorLocation): string {
    if (!loc) return message;
    return `${loc.filename}, line ${loc.line}, column ${loc.col}: ${message}`;
}

export class BasicError extends Error {
    public readonly kind: BasicErrorKind;
    public readonly rawMessage: string;
    public loc?: ErrorLocation;
    public hint?: string;

    constructor(
        kind: BasicErrorKind,
        message: string,
        loc?: ErrorLocation,
        hint?: string,
    ) {
        super(describe(message, loc));
        this.name = "BasicError";
        this.kind = kind;
        this.rawMessage = message;
        this.loc = loc;
        this.hint = hint;
    }

    public get label(): string {
        return KIND_LABELS[this.kind];
    }

    /**
     * Attaches a location to an error raised without one. An error that
     * already points somewhere keeps its original location.
     */
    public locate(loc: ErrorLocation): this {
        if (!this.loc) {
            this.loc = loc;
            this.message = describe(this.rawMessage, loc);
        }
        return this;
    }

    /**
     * Renders the error for a terminal, quoting the offending source line
     * when both the source and a location are known.
     *
     *  Runtime error: Division by zero
     *   --> prog.bas, line 3:7
     *    |
     *  3 | print 1 / 0
     *    |       ^
     */
    public format(source?: string): string {
        const header = `${chalk.red.bold(`${this.label}:`)} ${chalk.bold(this.rawMessage)}`;
        if (!this.loc) {
            return this.hint
                ? `${header}\n${chalk.blue("=")} ${this.hint}`
                : header;
        }

        const lineNumStr = String(this.loc.line);
        const padding = " ".repeat(lineNumStr.length);
        const output = [
            header,
            `${padding} ${chalk.blue("-->")} ${this.loc.filename}, line ${this.loc.line}:${this.loc.col}`,
        ];

        const lineContent =
            source !== undefined
                ? source.split("\n")[this.loc.line - 1]
                : undefined;
        if (lineContent !== undefined) {
            const pipeLine = `${padding} ${chalk.blue("|")}`;
            const pointerSpace = " ".repeat(Math.max(0, this.loc.col - 1));
            output.push(
                pipeLine,
                `${chalk.blue(lineNumStr)} ${chalk.blue("|")} ${lineContent.replace(/\r$/, "")}`,
                `${pipeLine} ${pointerSpace}${chalk.red.bold("^")}`,
            );
        }

        if (this.hint) {
            output.push(`${padding} ${chalk.blue("=")} ${this.hint}`);
        }

        return output.join("\n");
    }
}

export class LexerError extends BasicError {
    constructor(message: string, loc?: ErrorLocation, hint?: string) {
        super("lexer", message, loc, hint);
        this.name = "LexerError";
    }
}

export class BasicSyntaxError extends BasicError {
    constructor(message: string, loc?: ErrorLocation, hint?: string) {
        super("syntax", message, loc, hint);
        this.name = "BasicSyntaxError";
    }
}

export class BasicRuntimeError extends BasicError {
    constructor(message: string, loc?: ErrorLocation, hint?: string) {
        super("runtime", message, loc, hint);
        this.name = "BasicRuntimeError";
    }
}
