import { Lexeme } from "./Lexeme";
import { LexemeType } from "./LexemeType";
import { LexerError } from "../utils/Error";

// Symbols that can be lexed without looking at what follows them.
const SIMPLE_SYMBOLS = new Set(["+", "-", "*", "/", "&", "=", ":", ",", "(", ")"]);

/**
 * Produces lexemes one at a time, on demand. A run of newlines (including
 * lines holding only whitespace) collapses into a single end-of-line lexeme,
 * and an unterminated last line still ends with one.
 */
export class Lexer {
    private input: string;
    private filename: string;
    private position: number = 0;
    private line: number = 1;
    private col: number = 1;
    private lastType?: LexemeType;

    constructor(input: string, filename: string = "<input>") {
        this.input = input;
        this.filename = filename;
    }

    /** Returns the next lexeme, or undefined once the input is exhausted. */
    public next(): Lexeme | undefined {
        const lexeme = this.read();
        if (lexeme) this.lastType = lexeme.type;
        return lexeme;
    }

    /** Discards the rest of the current physical line, leaving the newline. */
    public ignoreLine(): void {
        while (!this.isAtEnd() && this.currentChar() !== "\n") {
            this.advance();
        }
    }

    private read(): Lexeme | undefined {
        this.skipWhitespace();

        if (this.isAtEnd()) {
            if (this.lastType !== undefined && this.lastType !== LexemeType.End) {
                return this.createLexeme(LexemeType.End, "");
            }
            return undefined;
        }

        const char = this.currentChar();

        if (char === "\n") {
            const lexeme = this.createLexeme(LexemeType.End, "");
            while (!this.isAtEnd() && this.currentChar() === "\n") {
                this.advance();
                this.skipWhitespace();
            }
            return lexeme;
        }

        if (this.isDigit(char)) {
            return this.readNumber();
        }

        if (char === '"') {
            return this.readString();
        }

        if (SIMPLE_SYMBOLS.has(char)) {
            const lexeme = this.createLexeme(LexemeType.Symbol, char);
            this.advance();
            return lexeme;
        }

        if (char === "<" || char === ">") {
            return this.readComparison(char);
        }

        if (this.isAlpha(char)) {
            return this.readWord();
        }

        throw new LexerError(
            `Invalid character at input: '${char}' (${char.charCodeAt(0)})`,
            this.location(),
        );
    }

    private readComparison(first: string): Lexeme {
        const start = this.createLexeme(LexemeType.Symbol, first);
        this.advance();

        const second = this.peekChar(0);
        if (second !== ">" && second !== "=") {
            return start;
        }

        this.advance();
        if (second === "=" || first === "<") {
            return { ...start, value: first + second };
        }
        throw new LexerError(`Invalid operator: ${first}${second}`, start);
    }

    private readNumber(): Lexeme {
        const start = this.createLexeme(LexemeType.Number, "");
        let whole = "";

        while (!this.isAtEnd() && this.isDigit(this.currentChar())) {
            whole += this.currentChar();
            this.advance();
        }

        // Strip leading zeroes, keeping at least one digit.
        whole = whole.replace(/^0+(?=\d)/, "");

        if (this.isAtEnd() || this.currentChar() !== ".") {
            return { ...start, value: whole };
        }

        this.advance(); // consume dot
        let fraction = "";
        while (!this.isAtEnd() && this.isDigit(this.currentChar())) {
            fraction += this.currentChar();
            this.advance();
        }

        return { ...start, value: `${whole}.${fraction}` };
    }

    private readString(): Lexeme {
        const start = this.createLexeme(LexemeType.String, "");
        this.advance(); // skip quote

        let value = "";
        while (!this.isAtEnd() && this.currentChar() !== '"') {
            if (this.currentChar() === "\n") break;
            value += this.currentChar();
            this.advance();
        }

        if (this.isAtEnd() || this.currentChar() !== '"') {
            throw new LexerError("Unterminated string", start);
        }
        this.advance(); // skip close quote

        return { ...start, value };
    }

    private readWord(): Lexeme {
        const start = this.createLexeme(LexemeType.Word, "");
        let value = "";

        while (!this.isAtEnd() && this.isWordChar(this.currentChar())) {
            value += this.currentChar();
            this.advance();
        }

        return { ...start, value: value.toLowerCase() };
    }

    private skipWhitespace() {
        while (!this.isAtEnd() && this.isWhitespace(this.currentChar())) {
            this.advance();
        }
    }

    private createLexeme(type: LexemeType, value: string): Lexeme {
        return { type, value, ...this.location() };
    }

    private location() {
        return { filename: this.filename, line: this.line, col: this.col };
    }

    private advance() {
        if (this.currentChar() === "\n") {
            this.line++;
            this.col = 1;
        } else {
            this.col++;
        }
        this.position++;
    }

    private isAtEnd(): boolean {
        return this.position >= this.input.length;
    }

    private currentChar(): string {
        return this.input[this.position];
    }

    private peekChar(offset = 1): string {
        if (this.position + offset >= this.input.length) return "";
        return this.input[this.position + offset];
    }

    private isWhitespace(char: string): boolean {
        return char === " " || char === "\t" || char === "\r";
    }

    private isAlpha(char: string): boolean {
        return /[a-zA-Z]/.test(char);
    }

    private isWordChar(char: string): boolean {
        return /[a-zA-Z0-9_$]/.test(char);
    }

    private isDigit(char: string): boolean {
        return /[0-9]/.test(char);
    }
}
