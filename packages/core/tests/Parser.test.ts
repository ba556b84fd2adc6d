import { BasicNumber } from "../src/number/BasicNumber";
import {
    DoStatement,
    EmptyStatement,
    ForStatement,
    IfBlockStatement,
    IfGotoStatement,
    LetStatement,
    PrintStatement,
} from "../src/parser/statements";
import { Block } from "../src/types/ast";
import { BasicSyntaxError } from "../src/utils/Error";
import { parseSource } from "./helpers";

function statementAt<T>(
    block: Block,
    index: number,
    type: new (...args: never[]) => T,
): T {
    const statement = block.statements[index];
    if (!(statement instanceof type)) {
        throw new Error(`Statement ${index} is a ${statement?.kind}`);
    }
    return statement;
}

function syntaxError(source: string): BasicSyntaxError {
    try {
        parseSource(source);
    } catch (e) {
        if (e instanceof BasicSyntaxError) return e;
        throw e;
    }
    throw new Error(`No syntax error in ${JSON.stringify(source)}`);
}

describe("Parser", () => {
    test("numbered lines go into the jump table", () => {
        const program = parseSource("10 PRINT 1\n20 GOTO 10\n");
        expect(program.statements.map((s) => s.kind)).toEqual([
            "PrintStatement",
            "GotoStatement",
        ]);
        expect(program.jumpTable.get("10")).toBe(0);
        expect(program.jumpTable.get("20")).toBe(1);
    });

    test("named labels may sit on their own line", () => {
        const program = parseSource("start:\n\n  PRINT 1\nagain: GOTO start");
        expect(program.jumpTable.get("start")).toBe(0);
        expect(program.jumpTable.get("again")).toBe(1);
    });

    test("the first definition of a label wins", () => {
        const program = parseSource("10 PRINT 1\n10 PRINT 2\n");
        expect(program.statements).toHaveLength(2);
        expect(program.jumpTable.get("10")).toBe(0);
    });

    test("each block has its own jump table", () => {
        const program = parseSource(
            "FOR i = 1 TO 3\n  inner: PRINT i\nNEXT i\nouter: STOP",
        );
        const loop = statementAt(program, 0, ForStatement);
        expect(loop.body.jumpTable.get("inner")).toBe(0);
        expect(program.jumpTable.has("inner")).toBe(false);
        expect(program.jumpTable.get("outer")).toBe(1);
    });

    test("comments and empty labelled lines become empty statements", () => {
        const program = parseSource('REM say "hi: there\n10\nPRINT 1');
        expect(program.statements[0]).toBeInstanceOf(EmptyStatement);
        expect(program.statements[1]).toBeInstanceOf(EmptyStatement);
        expect(program.jumpTable.get("10")).toBe(1);
        expect(program.statements[2]).toBeInstanceOf(PrintStatement);
    });

    test("FOR defaults its step to one", () => {
        const loop = statementAt(
            parseSource("FOR i = 1 TO 10\nNEXT i"),
            0,
            ForStatement,
        );
        expect(loop.variable).toBe("i");
        expect(loop.step).toEqual({ type: "Constant", value: BasicNumber.ONE });
        expect(loop.body.statements).toHaveLength(0);
    });

    test("DO WHILE keeps its condition and body", () => {
        const loop = statementAt(
            parseSource("DO WHILE n > 0\n  LET n = n - 1\nLOOP"),
            0,
            DoStatement,
        );
        expect(loop.name).toBe("do");
        expect(loop.condition.type).toBe("Relational");
        expect(loop.body.statements[0]).toBeInstanceOf(LetStatement);
    });

    test("IF with ELSEIF and ELSE", () => {
        const statement = statementAt(
            parseSource(
                "IF x = 1 THEN\nPRINT 1\nELSEIF x = 2 THEN\nPRINT 2\nELSE\nPRINT 3\nEND IF",
            ),
            0,
            IfBlockStatement,
        );
        expect(statement.conditions).toHaveLength(2);
        expect(statement.blocks).toHaveLength(3);
        expect(statement.elseBlock?.statements).toHaveLength(1);
    });

    test("IF without ELSE has no else block", () => {
        const statement = statementAt(
            parseSource("IF x THEN\nPRINT 1\nEND IF"),
            0,
            IfBlockStatement,
        );
        expect(statement.elseBlock).toBeUndefined();
    });

    test("IF ... THEN label ELSE label", () => {
        const statement = statementAt(
            parseSource("IF x THEN 10 ELSE done"),
            0,
            IfGotoStatement,
        );
        expect(statement.thenLabel).toBe("10");
        expect(statement.elseLabel).toBe("done");
    });

    test("LET picks the grammar from the variable name", () => {
        const program = parseSource('LET a$ = "x" & b$\nLET n = 1');
        expect(statementAt(program, 0, LetStatement).value.family).toBe(
            "string",
        );
        expect(statementAt(program, 1, LetStatement).value.family).toBe(
            "numeric",
        );
    });

    test("unary minus folds into constants", () => {
        const program = parseSource("LET a = -5\nLET b = -x");
        expect(statementAt(program, 0, LetStatement).value.expression).toEqual({
            type: "Constant",
            value: BasicNumber.integer(-5),
        });
        expect(statementAt(program, 1, LetStatement).value.expression).toEqual({
            type: "Arithmetic",
            operator: "*",
            left: { type: "Constant", value: BasicNumber.integer(-1) },
            right: { type: "Variable", name: "x" },
        });
    });

    test("subtraction groups to the right", () => {
        const statement = statementAt(
            parseSource("LET a = 10 - 2 - 3"),
            0,
            LetStatement,
        );
        expect(statement.value.expression).toEqual({
            type: "Arithmetic",
            operator: "-",
            left: { type: "Constant", value: BasicNumber.integer(10) },
            right: {
                type: "Arithmetic",
                operator: "-",
                left: { type: "Constant", value: BasicNumber.integer(2) },
                right: { type: "Constant", value: BasicNumber.integer(3) },
            },
        });
    });

    test("END may be followed by blank lines", () => {
        expect(parseSource("PRINT 1\nEND\n\n\n").statements).toHaveLength(1);
    });

    describe("errors", () => {
        test.each([
            ["PRINT 1 +", "test.bas, line 1, column 10: Expected a numeric constant, a variable name, or an opening parenthesis"],
            ["LET x 5", "test.bas, line 1, column 7: Expected '=', got numeric literal"],
            ["FROB 1", "test.bas, line 1, column 1: Unrecognised keyword: frob"],
            ["PRINT 1\nEND\nPRINT 2", "test.bas, line 2, column 1: Unexpected END, expected END or end-of-file"],
            ["PRINT 1\nLOOP", "test.bas, line 2, column 1: Unexpected LOOP, expected END or end-of-file"],
            ["FOR i = 1 TO 2\nPRINT i\n", "Expected NEXT I, got end of input"],
            ["FOR i = 1 TO 2\nNEXT j", "test.bas, line 2, column 6: Expected 'i', got 'j'"],
            ["FOR a$ = 1 TO 2\nNEXT a$", "String identifier cannot be a FOR loop variable"],
            ["DO WHILE 1\nNEXT i", "test.bas, line 2, column 1: Expected LOOP, got NEXT"],
            ["IF 1 THEN\nELSE\nELSEIF 1 THEN\nEND IF", "Unexpected keyword ELSEIF, expected END IF"],
            ["IF 1 THEN\nPRINT 1\n", "Unexpected end of input, expected ELSE, ELSEIF or END IF"],
            ["IF 1 THEN +", "Expected a label or newline after THEN"],
            ["GOTO", "Expected a label"],
            ["LET a$ = 5", "Expected a string literal, string identifier or opening parenthesis"],
            ["LET x = \"hi\"", "String literal in numeric expression"],
            ["LET x = a$", "String identifier in numeric expression"],
            ["LET a$ = x", "Expected a string identifier"],
        ])("%j", (source, message) => {
            expect(() => parseSource(source)).toThrow(BasicSyntaxError);
            expect(() => parseSource(source)).toThrow(message);
        });
    });

    describe("hints", () => {
        test.each([
            ["LET x = a$", "Names ending in $ hold text and cannot be used in arithmetic"],
            ['LET x = "hi"', "Join text with &, or assign it to a name ending in $"],
            ["LET a$ = x", "String variable names end in $, as in x$"],
            ["FOR a$ = 1 TO 2\nNEXT a$", "Names ending in $ hold text; count with a numeric name"],
        ])("%j", (source, hint) => {
            expect(syntaxError(source).hint).toBe(hint);
        });
    });
});
