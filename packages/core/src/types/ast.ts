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
} from "../parser/statements";

export type Statement =
    | IfGotoStatement
    | IfBlockStatement
    | DoStatement
    | ForStatement
    | PrintStatement
    | InputStatement
    | LetStatement
    | GotoStatement
    | StopStatement
    | ExitStatement
    | EmptyStatement;

export interface SourceLocation {
    filename: string;
    line: number;
    col: number;
}

/**
 * An ordered statement sequence with its label table. A label maps to the
 * index of the first statement that carried it.
 */
export interface Block {
    readonly statements: readonly Statement[];
    readonly jumpTable: ReadonlyMap<string, number>;
}

export type Program = Block;
