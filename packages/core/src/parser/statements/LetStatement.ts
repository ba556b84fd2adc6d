import { BaseStatement } from "./BaseStatement";
import { NumericExpression, StringExpression } from "../../types/expression";
import { SourceLocation } from "../../types/ast";

// The parser picks the family from the variable name's suffix.
export type LetValue =
    | { family: "numeric"; expression: NumericExpression }
    | { family: "string"; expression: StringExpression };

export class LetStatement implements BaseStatement {
    readonly kind = "LetStatement" as const;

    constructor(
        public readonly variable: string,
        public readonly value: LetValue,
        public readonly loc: SourceLocation,
    ) {}
}
