import { LexemeType } from "./LexemeType";

export interface Lexeme {
    type: LexemeType;
    value: string;
    filename: string;
    line: number;
    col: number;
}
