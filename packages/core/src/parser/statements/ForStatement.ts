import { BaseStatement } from "./BaseStatement";
import { NumericExpression } from "../../types/expression";
import { Block, SourceLocation } from "../../types/ast";

export class ForStatement implements BaseStatement {
    readonly kind = "ForStatement" as const;
    readonly name = "for" as const;

    constructor(
        public readonly variable: string,
        public readonly initial: NumericExpression,
        public readonly final: NumericExpression,
        public readonly step: NumericExpression,
        public readonly body: Block,
        public readonly loc: SourceLocation,
    ) {}
}
