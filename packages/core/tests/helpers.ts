import { Lexer } from "../src/lexer/Lexer";
import { Parser } from "../src/parser/Parser";
import { Interpreter } from "../src/interpreter/Interpreter";
import { InputSource, OutputSink } from "../src/interpreter/io";
import { Program } from "../src/types/ast";

export function parseSource(source: string): Program {
    return new Parser(new Lexer(source, "test.bas")).parse();
}

export class CapturedOutput implements OutputSink {
    public text = "";

    public write(text: string): void {
        this.text += text;
    }
}

export function queuedInput(lines: string[]): InputSource {
    const queue = [...lines];
    return {
        readLine: async () => queue.shift(),
    };
}

/** Runs a program and returns everything it printed. */
export async function run(source: string, inputs: string[] = []): Promise<string> {
    const output = new CapturedOutput();
    const interpreter = new Interpreter(parseSource(source), {
        output,
        input: queuedInput(inputs),
    });
    await interpreter.run();
    return output.text;
}
