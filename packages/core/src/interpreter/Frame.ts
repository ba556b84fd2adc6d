import { BasicNumber } from "../number/BasicNumber";
import { Block, Statement } from "../types/ast";
import { DoStatement, ForStatement } from "../parser/statements";

/**
 * The loop statement that opened a frame. A FOR activation carries the step
 * and final value captured when the loop started.
 */
export type LoopActivation =
    | { statement: DoStatement }
    | { statement: ForStatement; step: BasicNumber; final: BasicNumber };

/** Runtime activation of a block: cursor, owning loop and local variables. */
export class Frame {
    public cursor: number = 0;
    public readonly numbers: Map<string, BasicNumber> = new Map();
    public readonly strings: Map<string, string> = new Map();

    constructor(
        public readonly block: Block,
        public readonly owner?: LoopActivation,
    ) {}

    public get finished(): boolean {
        return this.cursor >= this.block.statements.length;
    }

    /** Returns the statement under the cursor and moves past it. */
    public advance(): Statement {
        return this.block.statements[this.cursor++];
    }
}
