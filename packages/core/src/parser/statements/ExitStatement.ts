import { BaseStatement } from "./BaseStatement";
import { SourceLocation } from "../../types/ast";

/** EXIT <name>, where name matches a loop statement's name (`do`, `for`). */
export class ExitStatement implements BaseStatement {
    readonly kind = "ExitStatement" as const;

    constructor(
        public readonly blockName: string,
        public readonly loc: SourceLocation,
    ) {}
}
