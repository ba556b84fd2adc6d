import { Lexeme } from "../lexer/Lexeme";
import { Lexer } from "../lexer/Lexer";
import { describeLexemeType, LexemeType } from "../lexer/LexemeType";
import { BasicNumber } from "../number/BasicNumber";
import { Block, Program, SourceLocation, Statement } from "../types/ast";
import {
    ArithmeticOperator,
    Expression,
    NumericExpression,
    RelationalOperator,
    StringExpression,
} from "../types/expression";
import {
    DoStatement,
    EmptyStatement,
    ExitStatement,
    ForStatement,
    GotoStatement,
    IfBlockStatement,
    IfGotoStatement,
    InputStatement,
    LetStatement,
    PrintStatement,
    StopStatement,
} from "./statements";
import { BLOCK_TERMINATORS, isStringIdentifier } from "./TypeHelpers";
import { BasicSyntaxError } from "../utils/Error";

type ParsedLine =
    | { kind: "statement"; label?: string; statement: Statement }
    | { kind: "terminator"; keyword: Lexeme };

interface ParsedBlock {
    block: Block;
    /** Keyword that closed the block, or "" when the input ran out. */
    terminator: string;
    terminatorLexeme?: Lexeme;
}

const RELATIONAL_OPERATORS: readonly RelationalOperator[] = [
    "=",
    "<>",
    "<",
    "<=",
    ">",
    ">=",
];

export class Parser {
    private lexer: Lexer;
    private lookahead?: Lexeme;
    private readonly statementParsers: ReadonlyMap<
        string,
        (keyword: Lexeme) => Statement
    >;

    constructor(lexer: Lexer) {
        this.lexer = lexer;
        this.statementParsers = new Map<string, (keyword: Lexeme) => Statement>([
            ["if", (keyword: Lexeme) => this.ifStatement(keyword)],
            ["do", (keyword: Lexeme) => this.doStatement(keyword)],
            ["for", (keyword: Lexeme) => this.forStatement(keyword)],
            ["print", (keyword: Lexeme) => this.printStatement(keyword)],
            ["input", (keyword: Lexeme) => this.inputStatement(keyword)],
            ["let", (keyword: Lexeme) => this.letStatement(keyword)],
            ["goto", (keyword: Lexeme) => this.gotoStatement(keyword)],
            ["stop", (keyword: Lexeme) => new StopStatement(this.getLoc(keyword))],
            ["exit", (keyword: Lexeme) => this.exitStatement(keyword)],
        ]);
    }

    public parse(): Program {
        this.lookahead = this.lexer.next();
        const { block, terminator, terminatorLexeme } = this.block();

        if (terminator === "end") {
            while (this.check(LexemeType.End)) this.advance();
        }

        if (terminator !== "" && (terminator !== "end" || this.lookahead)) {
            throw this.error(
                `Unexpected ${terminator.toUpperCase()}, expected END or end-of-file`,
                terminatorLexeme,
            );
        }

        return block;
    }

    /**
     * Picks the string grammar when the expression starts with a string
     * literal or a string identifier, the numeric grammar otherwise.
     */
    public expression(): Expression {
        const next = this.lookahead;
        if (
            next &&
            (next.type === LexemeType.String ||
                (next.type === LexemeType.Word &&
                    isStringIdentifier(next.value)))
        ) {
            return this.stringExpression();
        }
        return this.numericExpression();
    }

    private block(): ParsedBlock {
        const statements: Statement[] = [];
        const jumpTable = new Map<string, number>();

        while (this.lookahead) {
            const line = this.line();
            if (line.kind === "terminator") {
                return {
                    block: { statements, jumpTable },
                    terminator: line.keyword.value,
                    terminatorLexeme: line.keyword,
                };
            }

            // First definition of a label wins.
            if (line.label !== undefined && !jumpTable.has(line.label)) {
                jumpTable.set(line.label, statements.length);
            }
            statements.push(line.statement);
        }

        return { block: { statements, jumpTable }, terminator: "" };
    }

    private line(): ParsedLine {
        let label: string | undefined;
        let start: Lexeme | undefined;

        for (;;) {
            const number = this.accept(LexemeType.Number);
            if (number) {
                label = number.value;
                start = number;
            }

            if (this.skipComment()) continue;

            let keyword = this.accept(LexemeType.Word);
            if (!keyword) {
                const end = this.expect(LexemeType.End);
                return {
                    kind: "statement",
                    label,
                    statement: new EmptyStatement(this.getLoc(start ?? end)),
                };
            }

            if (this.check(LexemeType.Symbol, ":")) {
                label = keyword.value;
                start = keyword;
                this.advance();

                // Blank lines may separate a named label from its statement.
                while (this.check(LexemeType.End)) this.advance();
                if (this.skipComment()) continue;

                keyword = this.expect(LexemeType.Word);
            }

            const parseStatement = this.statementParsers.get(keyword.value);
            if (parseStatement) {
                const statement = parseStatement(keyword);
                this.expect(LexemeType.End);
                return { kind: "statement", label, statement };
            }

            if (BLOCK_TERMINATORS.includes(keyword.value)) {
                return { kind: "terminator", keyword };
            }

            throw this.error(`Unrecognised keyword: ${keyword.value}`, keyword);
        }
    }

    // REM discards the rest of the physical line. The lookahead is the REM
    // word itself, so the lexer still sits right behind it.
    private skipComment(): boolean {
        if (!this.check(LexemeType.Word, "rem")) return false;
        this.lexer.ignoreLine();
        this.lookahead = this.lexer.next();
        return true;
    }

    private ifStatement(keyword: Lexeme): Statement {
        const condition = this.numericExpression();
        this.expect(LexemeType.Word, "then");

        const target =
            this.accept(LexemeType.Number) ?? this.accept(LexemeType.Word);
        if (target) {
            let elseLabel: string | undefined;
            if (this.accept(LexemeType.Word, "else")) {
                elseLabel = (
                    this.accept(LexemeType.Number) ??
                    this.expect(LexemeType.Word)
                ).value;
            }
            return new IfGotoStatement(
                condition,
                target.value,
                elseLabel,
                this.getLoc(keyword),
            );
        }

        if (!this.check(LexemeType.End)) {
            throw this.error(
                "Expected a label or newline after THEN",
                this.lookahead,
            );
        }
        this.advance();

        const conditions: NumericExpression[] = [condition];
        const blocks: Block[] = [];
        let seenElse = false;
        let terminator: string;

        do {
            const clause = this.block();
            blocks.push(clause.block);
            terminator = clause.terminator;

            if (!seenElse && terminator === "elseif") {
                conditions.push(this.numericExpression());
                this.expect(LexemeType.Word, "then");
                this.expect(LexemeType.End);
            } else if (!seenElse && terminator === "else") {
                seenElse = true;
                this.expect(LexemeType.End);
            } else if (terminator !== "end") {
                const found = terminator
                    ? `keyword ${terminator.toUpperCase()}`
                    : "end of input";
                const expected = seenElse
                    ? "END IF"
                    : "ELSE, ELSEIF or END IF";
                throw this.error(
                    `Unexpected ${found}, expected ${expected}`,
                    clause.terminatorLexeme,
                );
            }
        } while (terminator !== "end");

        this.expect(LexemeType.Word, "if");

        return new IfBlockStatement(conditions, blocks, this.getLoc(keyword));
    }

    private doStatement(keyword: Lexeme): Statement {
        this.expect(LexemeType.Word, "while");
        const condition = this.numericExpression();
        this.expect(LexemeType.End);

        const { block, terminator, terminatorLexeme } = this.block();
        if (terminator !== "loop") {
            throw this.error(
                `Expected LOOP, got ${this.describeTerminator(terminator)}`,
                terminatorLexeme,
            );
        }

        return new DoStatement(condition, block, this.getLoc(keyword));
    }

    private forStatement(keyword: Lexeme): Statement {
        const variable = this.expect(LexemeType.Word);
        if (isStringIdentifier(variable.value)) {
            throw this.error(
                "String identifier cannot be a FOR loop variable",
                variable,
                "Names ending in $ hold text; count with a numeric name",
            );
        }

        this.expect(LexemeType.Symbol, "=");
        const initial = this.numericExpression();
        this.expect(LexemeType.Word, "to");
        const final = this.numericExpression();

        let step: NumericExpression = {
            type: "Constant",
            value: BasicNumber.ONE,
        };
        if (this.accept(LexemeType.Word, "step")) {
            step = this.numericExpression();
        }
        this.expect(LexemeType.End);

        const { block, terminator, terminatorLexeme } = this.block();
        if (terminator !== "next") {
            throw this.error(
                `Expected NEXT ${variable.value.toUpperCase()}, got ${this.describeTerminator(terminator)}`,
                terminatorLexeme,
            );
        }
        this.expect(LexemeType.Word, variable.value);

        return new ForStatement(
            variable.value,
            initial,
            final,
            step,
            block,
            this.getLoc(keyword),
        );
    }

    private printStatement(keyword: Lexeme): Statement {
        const expressions: Expression[] = [];
        if (this.lookahead && !this.check(LexemeType.End)) {
            do {
                expressions.push(this.expression());
            } while (this.accept(LexemeType.Symbol, ","));
        }
        return new PrintStatement(expressions, this.getLoc(keyword));
    }

    private inputStatement(keyword: Lexeme): Statement {
        const variable = this.expect(LexemeType.Word);
        return new InputStatement(variable.value, this.getLoc(keyword));
    }

    private letStatement(keyword: Lexeme): Statement {
        const variable = this.expect(LexemeType.Word).value;
        this.expect(LexemeType.Symbol, "=");

        const value = isStringIdentifier(variable)
            ? { family: "string" as const, expression: this.stringExpression() }
            : {
                  family: "numeric" as const,
                  expression: this.numericExpression(),
              };

        return new LetStatement(variable, value, this.getLoc(keyword));
    }

    private gotoStatement(keyword: Lexeme): Statement {
        const label =
            this.accept(LexemeType.Word) ?? this.accept(LexemeType.Number);
        if (!label) throw this.error("Expected a label", this.lookahead);
        return new GotoStatement(label.value, this.getLoc(keyword));
    }

    private exitStatement(keyword: Lexeme): Statement {
        const blockName = this.expect(LexemeType.Word);
        return new ExitStatement(blockName.value, this.getLoc(keyword));
    }

    // Numeric grammar, loosest binding first.

    private numericExpression(): NumericExpression {
        if (this.accept(LexemeType.Word, "not")) {
            return {
                type: "Boolean",
                operator: "not",
                left: this.numericExpression(),
            };
        }

        const left = this.relational();

        let operator: "and" | "or";
        if (this.accept(LexemeType.Word, "and")) operator = "and";
        else if (this.accept(LexemeType.Word, "or")) operator = "or";
        else return left;

        const right = this.numericExpression();
        return { type: "Boolean", operator, left, right };
    }

    private relational(): NumericExpression {
        const left = this.additive();

        const operator = RELATIONAL_OPERATORS.find((op) =>
            this.check(LexemeType.Symbol, op),
        );
        if (!operator) return left;
        this.advance();

        const right = this.additive();
        return { type: "Relational", operator, left, right };
    }

    private additive(): NumericExpression {
        const left = this.term();

        let operator: ArithmeticOperator;
        if (this.accept(LexemeType.Symbol, "+")) operator = "+";
        else if (this.accept(LexemeType.Symbol, "-")) operator = "-";
        else return left;

        const right = this.additive();
        return { type: "Arithmetic", operator, left, right };
    }

    private term(): NumericExpression {
        let left = this.factor();

        for (;;) {
            let operator: ArithmeticOperator;
            if (this.accept(LexemeType.Symbol, "*")) operator = "*";
            else if (this.accept(LexemeType.Symbol, "/")) operator = "/";
            else if (this.accept(LexemeType.Word, "mod")) operator = "mod";
            else return left;

            const right = this.factor();
            left = { type: "Arithmetic", operator, left, right };
        }
    }

    private factor(): NumericExpression {
        const negative = this.accept(LexemeType.Symbol, "-") !== undefined;

        const number = this.accept(LexemeType.Number);
        if (number) {
            const value = BasicNumber.parse(number.value);
            return { type: "Constant", value: negative ? value.negate() : value };
        }

        const word = this.accept(LexemeType.Word);
        if (word) {
            if (isStringIdentifier(word.value)) {
                throw this.error(
                    "String identifier in numeric expression",
                    word,
                    "Names ending in $ hold text and cannot be used in arithmetic",
                );
            }
            return this.applySign(negative, {
                type: "Variable",
                name: word.value,
            });
        }

        if (this.accept(LexemeType.Symbol, "(")) {
            const inner = this.numericExpression();
            this.expect(LexemeType.Symbol, ")");
            return this.applySign(negative, inner);
        }

        const string = this.accept(LexemeType.String);
        if (string) {
            throw this.error(
                "String literal in numeric expression",
                string,
                "Join text with &, or assign it to a name ending in $",
            );
        }

        throw this.error(
            "Expected a numeric constant, a variable name, or an opening parenthesis",
            this.lookahead,
        );
    }

    private applySign(
        negative: boolean,
        operand: NumericExpression,
    ): NumericExpression {
        if (!negative) return operand;
        return {
            type: "Arithmetic",
            operator: "*",
            left: { type: "Constant", value: BasicNumber.integer(-1) },
            right: operand,
        };
    }

    // String grammar: atoms joined by right-associative `&`.

    private stringExpression(): StringExpression {
        const left = this.stringAtom();
        if (!this.accept(LexemeType.Symbol, "&")) return left;

        const right = this.stringExpression();
        return { type: "Concat", left, right };
    }

    private stringAtom(): StringExpression {
        const literal = this.accept(LexemeType.String);
        if (literal) return { type: "StringLiteral", value: literal.value };

        const word = this.accept(LexemeType.Word);
        if (word) {
            if (!isStringIdentifier(word.value)) {
                throw this.error(
                    "Expected a string identifier",
                    word,
                    `String variable names end in $, as in ${word.value}$`,
                );
            }
            return { type: "StringVariable", name: word.value };
        }

        if (this.accept(LexemeType.Symbol, "(")) {
            const inner = this.stringExpression();
            this.expect(LexemeType.Symbol, ")");
            return inner;
        }

        throw this.error(
            "Expected a string literal, string identifier or opening parenthesis",
            this.lookahead,
        );
    }

    // Lookahead protocol.

    private check(type: LexemeType, value?: string): boolean {
        const next = this.lookahead;
        if (!next || next.type !== type) return false;
        return value === undefined || next.value === value;
    }

    private advance(): Lexeme | undefined {
        const current = this.lookahead;
        this.lookahead = this.lexer.next();
        return current;
    }

    private accept(type: LexemeType, value?: string): Lexeme | undefined {
        return this.check(type, value) ? this.advance() : undefined;
    }

    private expect(type: LexemeType, value?: string): Lexeme {
        const accepted = this.accept(type, value);
        if (accepted) return accepted;

        const expected =
            value !== undefined ? `'${value}'` : describeLexemeType(type);
        throw this.error(
            `Expected ${expected}, got ${this.describeFound(value !== undefined)}`,
            this.lookahead,
        );
    }

    private describeFound(quoteText: boolean): string {
        const found = this.lookahead;
        if (!found) return "end of input";
        if (
            quoteText &&
            (found.type === LexemeType.Word || found.type === LexemeType.Symbol)
        ) {
            return `'${found.value}'`;
        }
        return describeLexemeType(found.type);
    }

    private describeTerminator(terminator: string): string {
        return terminator ? terminator.toUpperCase() : "end of input";
    }

    private getLoc(lexeme: Lexeme): SourceLocation {
        return {
            filename: lexeme.filename,
            line: lexeme.line,
            col: lexeme.col,
        };
    }

    private error(
        message: string,
        where?: Lexeme,
        hint?: string,
    ): BasicSyntaxError {
        return new BasicSyntaxError(
            message,
            where ? this.getLoc(where) : undefined,
            hint,
        );
    }
}

export function parse(lexer: Lexer): Program {
    return new Parser(lexer).parse();
}
