import { Lexer } from "./lexer/Lexer";
import { Parser } from "./parser/Parser";
import { Interpreter, InterpreterOptions } from "./interpreter/Interpreter";

export { Lexer } from "./lexer/Lexer";
export { LexemeType, describeLexemeType } from "./lexer/LexemeType";
export type { Lexeme } from "./lexer/Lexeme";
export { Parser, parse } from "./parser/Parser";
export { isStringIdentifier, BLOCK_TERMINATORS } from "./parser/TypeHelpers";
export * from "./parser/statements";
export * from "./types/ast";
export * from "./types/expression";
export { BasicNumber } from "./number/BasicNumber";
export { Interpreter } from "./interpreter/Interpreter";
export type {
    InterpreterOptions,
    InterpreterState,
} from "./interpreter/Interpreter";
export type { InputSource, OutputSink } from "./interpreter/io";
export {
    evaluateNumeric,
    evaluateString,
    getRepresentation,
} from "./interpreter/evaluate";
export {
    BasicError,
    BasicRuntimeError,
    BasicSyntaxError,
    LexerError,
} from "./utils/Error";
export type { BasicErrorKind, ErrorLocation } from "./utils/Error";

export interface InterpretOptions extends InterpreterOptions {
    filename?: string;
}

/** Lexes, parses and runs a program in one go. */
export async function interpret(
    code: string,
    options: InterpretOptions,
): Promise<void> {
    const lexer = new Lexer(code, options.filename);
    const program = new Parser(lexer).parse();

    const interpreter = new Interpreter(program, options);
    await interpreter.run();
}
