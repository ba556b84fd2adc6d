import { BaseStatement } from "./BaseStatement";
import { SourceLocation } from "../../types/ast";

export class InputStatement implements BaseStatement {
    readonly kind = "InputStatement" as const;

    constructor(
        public readonly variable: string,
        public readonly loc: SourceLocation,
    ) {}
}
