import { BasicNumber } from "../number/BasicNumber";
import { Block, Program, Statement } from "../types/ast";
import {
    ForStatement,
    IfBlockStatement,
    IfGotoStatement,
    InputStatement,
    LetStatement,
    PrintStatement,
} from "../parser/statements";
import { isStringIdentifier } from "../parser/TypeHelpers";
import { BasicError, BasicRuntimeError } from "../utils/Error";
import {
    evaluateNumeric,
    evaluateString,
    getRepresentation,
    VariableScope,
} from "./evaluate";
import { Frame, LoopActivation } from "./Frame";
import { InputSource, OutputSink } from "./io";

export type InterpreterState = "running" | "blocked-on-input" | "stopped";

export interface InterpreterOptions {
    output: OutputSink;
    input: InputSource;
    /** Written before every INPUT read. Defaults to "? ". */
    prompt?: string;
    /** Called before each statement executes. */
    trace?: (statement: Statement) => void;
}

const DEFAULT_PROMPT = "? ";
const INTEGER_INPUT = /^\s*([+-]?\d+)/;

/**
 * Walks a parsed program with an explicit stack of frames, innermost last.
 * Jumps and EXITs unwind that stack directly; nothing here recurses into
 * nested blocks.
 */
export class Interpreter implements VariableScope {
    private frames: Frame[] = [];
    private stopped: boolean = false;
    private blocked: boolean = false;
    private current?: Statement;

    private readonly output: OutputSink;
    private readonly input: InputSource;
    private readonly prompt: string;
    private readonly trace?: (statement: Statement) => void;

    constructor(program: Program, options: InterpreterOptions) {
        this.output = options.output;
        this.input = options.input;
        this.prompt = options.prompt ?? DEFAULT_PROMPT;
        this.trace = options.trace;
        this.enterBlock(program);
    }

    public get state(): InterpreterState {
        if (this.stopped || this.frames.length === 0) return "stopped";
        return this.blocked ? "blocked-on-input" : "running";
    }

    /** Number of active frames, the program's own frame included. */
    public get depth(): number {
        return this.frames.length;
    }

    public async run(): Promise<void> {
        this.stopped = false;

        try {
            while (this.frames.length > 0 && !this.stopped) {
                const frame = this.frames[this.frames.length - 1];

                if (!frame.finished) {
                    const statement = frame.advance();
                    this.current = statement;
                    this.trace?.(statement);
                    await this.execute(statement);
                    continue;
                }

                // Falling off the end of a loop body is what drives the loop.
                this.frames.pop();
                if (frame.owner) {
                    this.current = frame.owner.statement;
                    this.iterate(frame.owner);
                }
            }
        } catch (e) {
            if (e instanceof BasicError && this.current) {
                e.locate(this.current.loc);
            }
            throw e;
        }
    }

    /**
     * Moves control to `label` in the innermost active block that defines
     * it. Frames nested inside that block are discarded without iterating.
     */
    public jump(label: string): void {
        for (let i = this.frames.length - 1; i >= 0; i--) {
            const target = this.frames[i].block.jumpTable.get(label);
            if (target !== undefined) {
                this.frames.length = i + 1;
                this.frames[i].cursor = target;
                return;
            }
        }

        throw new BasicRuntimeError(`Jump to undefined label ${label}`);
    }

    public enterBlock(block: Block, owner?: LoopActivation): void {
        this.frames.push(new Frame(block, owner));
    }

    /** Pops frames up to and including the innermost loop named `name`. */
    public exitBlock(name: string): void {
        while (this.frames.length > 0) {
            const frame = this.frames.pop();
            if (frame?.owner?.statement.name === name) return;
        }

        throw new BasicRuntimeError(`Cannot EXIT ${name}: No such block`);
    }

    public stop(): void {
        this.frames = [];
        this.stopped = true;
    }

    public getNumeric(name: string): BasicNumber {
        const value = this.findFrame((frame) => frame.numbers.has(name))
            ?.numbers.get(name);
        if (value === undefined) {
            throw this.undefinedVariable(name);
        }
        return value;
    }

    public setNumeric(name: string, value: BasicNumber): void {
        const frame =
            this.findFrame((f) => f.numbers.has(name)) ?? this.innermost();
        frame.numbers.set(name, value);
    }

    public getString(name: string): string {
        const value = this.findFrame((frame) => frame.strings.has(name))
            ?.strings.get(name);
        if (value === undefined) {
            throw this.undefinedVariable(name);
        }
        return value;
    }

    public setString(name: string, value: string): void {
        const frame =
            this.findFrame((f) => f.strings.has(name)) ?? this.innermost();
        frame.strings.set(name, value);
    }

    private async execute(statement: Statement): Promise<void> {
        switch (statement.kind) {
            case "IfGotoStatement":
                return this.executeIfGoto(statement);
            case "IfBlockStatement":
                return this.executeIfBlock(statement);
            case "DoStatement":
                return this.iterate({ statement });
            case "ForStatement":
                return this.executeFor(statement);
            case "PrintStatement":
                return this.executePrint(statement);
            case "InputStatement":
                return this.executeInput(statement);
            case "LetStatement":
                return this.executeLet(statement);
            case "GotoStatement":
                return this.jump(statement.label);
            case "StopStatement":
                return this.stop();
            case "ExitStatement":
                return this.exitBlock(statement.blockName);
            case "EmptyStatement":
                return;
        }
    }

    /**
     * Runs the next pass of a loop whose body just completed. A DO loop
     * starts the same way, so its first execution is an iteration too.
     */
    private iterate(activation: LoopActivation): void {
        if ("step" in activation) {
            const { statement, step, final } = activation;
            const value = this.getNumeric(statement.variable).add(step);
            this.setNumeric(statement.variable, value);
            if (this.withinBounds(value, step, final)) {
                this.enterBlock(statement.body, activation);
            }
            return;
        }

        const { statement } = activation;
        if (evaluateNumeric(statement.condition, this).isTrue()) {
            this.enterBlock(statement.body, activation);
        }
    }

    private executeIfGoto(statement: IfGotoStatement): void {
        if (evaluateNumeric(statement.condition, this).isTrue()) {
            this.jump(statement.thenLabel);
        } else if (statement.elseLabel) {
            this.jump(statement.elseLabel);
        }
    }

    private executeIfBlock(statement: IfBlockStatement): void {
        const index = statement.conditions.findIndex((condition) =>
            evaluateNumeric(condition, this).isTrue(),
        );
        const body =
            index >= 0 ? statement.blocks[index] : statement.elseBlock;
        if (body) this.enterBlock(body);
    }

    // Step and final value are evaluated once, when the loop starts.
    private executeFor(statement: ForStatement): void {
        const initial = evaluateNumeric(statement.initial, this);
        this.setNumeric(statement.variable, initial);
        const step = evaluateNumeric(statement.step, this);
        const final = evaluateNumeric(statement.final, this);

        if (this.withinBounds(initial, step, final)) {
            this.enterBlock(statement.body, { statement, step, final });
        }
    }

    private withinBounds(
        value: BasicNumber,
        step: BasicNumber,
        final: BasicNumber,
    ): boolean {
        if (step.greaterThan(BasicNumber.ZERO)) return value.lessOrEqual(final);
        if (step.lessThan(BasicNumber.ZERO)) return value.greaterOrEqual(final);
        return false;
    }

    private executePrint(statement: PrintStatement): void {
        const text = statement.expressions
            .map((expr) => getRepresentation(expr, this))
            .join("");
        this.output.write(`${text}\n`);
    }

    private async executeInput(statement: InputStatement): Promise<void> {
        this.output.write(this.prompt);

        let line: string | undefined;
        this.blocked = true;
        try {
            line = await this.input.readLine();
        } finally {
            this.blocked = false;
        }

        if (isStringIdentifier(statement.variable)) {
            if (line === undefined) {
                throw new BasicRuntimeError(
                    "User input error: unexpected end of input",
                );
            }
            this.setString(statement.variable, line);
            return;
        }

        const match = line === undefined ? null : INTEGER_INPUT.exec(line);
        if (!match) {
            throw new BasicRuntimeError("User input error: expected an integer");
        }
        this.setNumeric(statement.variable, BasicNumber.integer(Number(match[1])));
    }

    private executeLet(statement: LetStatement): void {
        const { variable, value } = statement;
        if (value.family === "string") {
            this.setString(variable, evaluateString(value.expression, this));
        } else {
            this.setNumeric(variable, evaluateNumeric(value.expression, this));
        }
    }

    // Variables bound inside a loop or IF body go away when the body ends.
    private undefinedVariable(name: string): BasicRuntimeError {
        return new BasicRuntimeError(
            `Variable ${name} undefined`,
            undefined,
            "Assign it with LET in this block or an enclosing one before reading it",
        );
    }

    private findFrame(predicate: (frame: Frame) => boolean): Frame | undefined {
        for (let i = this.frames.length - 1; i >= 0; i--) {
            if (predicate(this.frames[i])) return this.frames[i];
        }
        return undefined;
    }

    private innermost(): Frame {
        const frame = this.frames[this.frames.length - 1];
        if (!frame) {
            throw new BasicRuntimeError("No active block to hold variables");
        }
        return frame;
    }
}
