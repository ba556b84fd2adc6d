import { BasicNumber } from "../number/BasicNumber";

export type ArithmeticOperator = "+" | "-" | "*" | "/" | "mod";
export type RelationalOperator = "=" | "<>" | "<" | "<=" | ">" | ">=";
export type BooleanOperator = "and" | "or" | "not";

export interface ConstantExpression {
    type: "Constant";
    value: BasicNumber;
}

export interface VariableExpression {
    type: "Variable";
    name: string;
}

export interface ArithmeticExpression {
    type: "Arithmetic";
    operator: ArithmeticOperator;
    left: NumericExpression;
    right: NumericExpression;
}

/** Evaluates to 1 or 0. */
export interface RelationalExpression {
    type: "Relational";
    operator: RelationalOperator;
    left: NumericExpression;
    right: NumericExpression;
}

/** `right` is absent exactly when the operator is `not`. */
export type BooleanExpression =
    | {
          type: "Boolean";
          operator: "and" | "or";
          left: NumericExpression;
          right: NumericExpression;
      }
    | {
          type: "Boolean";
          operator: "not";
          left: NumericExpression;
          right?: undefined;
      };

export type NumericExpression =
    | ConstantExpression
    | VariableExpression
    | ArithmeticExpression
    | RelationalExpression
    | BooleanExpression;

export interface StringLiteral {
    type: "StringLiteral";
    value: string;
}

export interface StringVariableExpression {
    type: "StringVariable";
    name: string;
}

export interface ConcatExpression {
    type: "Concat";
    left: StringExpression;
    right: StringExpression;
}

export type StringExpression =
    | StringLiteral
    | StringVariableExpression
    | ConcatExpression;

/** Anything PRINT accepts. */
export type Expression = NumericExpression | StringExpression;

export function isStringExpression(expr: Expression): expr is StringExpression {
    return (
        expr.type === "StringLiteral" ||
        expr.type === "StringVariable" ||
        expr.type === "Concat"
    );
}
