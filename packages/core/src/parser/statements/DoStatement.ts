import { BaseStatement } from "./BaseStatement";
import { NumericExpression } from "../../types/expression";
import { Block, SourceLocation } from "../../types/ast";

export class DoStatement implements BaseStatement {
    readonly kind = "DoStatement" as const;
    readonly name = "do" as const;

    constructor(
        public readonly condition: NumericExpression,
        public readonly body: Block,
        public readonly loc: SourceLocation,
    ) {}
}
