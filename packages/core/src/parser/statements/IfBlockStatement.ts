import { BaseStatement } from "./BaseStatement";
import { NumericExpression } from "../../types/expression";
import { Block, SourceLocation } from "../../types/ast";

/**
 * IF / ELSEIF / ELSE / END IF. `blocks[i]` belongs to `conditions[i]`; one
 * extra trailing block, when present, is the ELSE body.
 */
export class IfBlockStatement implements BaseStatement {
    readonly kind = "IfBlockStatement" as const;

    constructor(
        public readonly conditions: readonly NumericExpression[],
        public readonly blocks: readonly Block[],
        public readonly loc: SourceLocation,
    ) {}

    public get elseBlock(): Block | undefined {
        return this.blocks.length > this.conditions.length
            ? this.blocks[this.blocks.length - 1]
            : undefined;
    }
}
