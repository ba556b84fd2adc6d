export enum LexemeType {
    Word = "Word", // keywords, identifiers and labels, lower-cased
    Symbol = "Symbol", // + - * / & = : , ( ) < > <= >= <>
    Number = "Number",
    String = "String",
    End = "End", // end of a logical line
}

const DESCRIPTIONS: Record<LexemeType, string> = {
    [LexemeType.Word]: "identifier or keyword",
    [LexemeType.Symbol]: "operator",
    [LexemeType.Number]: "numeric literal",
    [LexemeType.String]: "string literal",
    [LexemeType.End]: "end of line",
};

export function describeLexemeType(type: LexemeType): string {
    return DESCRIPTIONS[type];
}
