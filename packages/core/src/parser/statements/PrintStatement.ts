import { BaseStatement } from "./BaseStatement";
import { Expression } from "../../types/expression";
import { SourceLocation } from "../../types/ast";

export class PrintStatement implements BaseStatement {
    readonly kind = "PrintStatement" as const;

    constructor(
        public readonly expressions: readonly Expression[],
        public readonly loc: SourceLocation,
    ) {}
}
