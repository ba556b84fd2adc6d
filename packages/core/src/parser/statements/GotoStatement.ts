import { BaseStatement } from "./BaseStatement";
import { SourceLocation } from "../../types/ast";

export class GotoStatement implements BaseStatement {
    readonly kind = "GotoStatement" as const;

    constructor(
        public readonly label: string,
        public readonly loc: SourceLocation,
    ) {}
}
