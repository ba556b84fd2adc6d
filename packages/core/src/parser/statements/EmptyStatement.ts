import { BaseStatement } from "./BaseStatement";
import { SourceLocation } from "../../types/ast";

export class EmptyStatement implements BaseStatement {
    readonly kind = "EmptyStatement" as const;

    constructor(public readonly loc: SourceLocation) {}
}
