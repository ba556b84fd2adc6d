import { BaseStatement } from "./BaseStatement";
import { NumericExpression } from "../../types/expression";
import { SourceLocation } from "../../types/ast";

/** IF <condition> THEN <label> [ELSE <label>] */
export class IfGotoStatement implements BaseStatement {
    readonly kind = "IfGotoStatement" as const;

    constructor(
        public readonly condition: NumericExpression,
        public readonly thenLabel: string,
        public readonly elseLabel: string | undefined,
        public readonly loc: SourceLocation,
    ) {}
}
