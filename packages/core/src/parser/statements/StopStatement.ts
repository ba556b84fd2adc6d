import { BaseStatement } from "./BaseStatement";
import { SourceLocation } from "../../types/ast";

export class StopStatement implements BaseStatement {
    readonly kind = "StopStatement" as const;

    constructor(public readonly loc: SourceLocation) {}
}
