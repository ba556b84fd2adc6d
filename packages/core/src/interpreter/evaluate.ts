import { BasicNumber } from "../number/BasicNumber";
import {
    ArithmeticOperator,
    Expression,
    isStringExpression,
    NumericExpression,
    RelationalOperator,
    StringExpression,
} from "../types/expression";

export interface VariableScope {
    getNumeric(name: string): BasicNumber;
    getString(name: string): string;
}

function applyArithmetic(
    operator: ArithmeticOperator,
    left: BasicNumber,
    right: BasicNumber,
): BasicNumber {
    switch (operator) {
        case "+":
            return left.add(right);
        case "-":
            return left.subtract(right);
        case "*":
            return left.multiply(right);
        case "/":
            return left.divide(right);
        case "mod":
            return left.modulo(right);
    }
}

function compare(
    operator: RelationalOperator,
    left: BasicNumber,
    right: BasicNumber,
): boolean {
    switch (operator) {
        case "=":
            return left.equals(right);
        case "<>":
            return !left.equals(right);
        case "<":
            return left.lessThan(right);
        case "<=":
            return left.lessOrEqual(right);
        case ">":
            return left.greaterThan(right);
        case ">=":
            return left.greaterOrEqual(right);
    }
}

export function evaluateNumeric(
    expr: NumericExpression,
    scope: VariableScope,
): BasicNumber {
    switch (expr.type) {
        case "Constant":
            return expr.value;
        case "Variable":
            return scope.getNumeric(expr.name);
        case "Arithmetic":
            return applyArithmetic(
                expr.operator,
                evaluateNumeric(expr.left, scope),
                evaluateNumeric(expr.right, scope),
            );
        case "Relational":
            return BasicNumber.fromBoolean(
                compare(
                    expr.operator,
                    evaluateNumeric(expr.left, scope),
                    evaluateNumeric(expr.right, scope),
                ),
            );
        case "Boolean": {
            // `and` / `or` short-circuit.
            if (expr.operator === "not") {
                return BasicNumber.fromBoolean(
                    !evaluateNumeric(expr.left, scope).isTrue(),
                );
            }
            const left = evaluateNumeric(expr.left, scope).isTrue();
            if (expr.operator === "and") {
                return BasicNumber.fromBoolean(
                    left && evaluateNumeric(expr.right, scope).isTrue(),
                );
            }
            return BasicNumber.fromBoolean(
                left || evaluateNumeric(expr.right, scope).isTrue(),
            );
        }
    }
}

export function evaluateString(
    expr: StringExpression,
    scope: VariableScope,
): string {
    switch (expr.type) {
        case "StringLiteral":
            return expr.value;
        case "StringVariable":
            return scope.getString(expr.name);
        case "Concat":
            return (
                evaluateString(expr.left, scope) +
                evaluateString(expr.right, scope)
            );
    }
}

/** Text PRINT shows for an expression. */
export function getRepresentation(
    expr: Expression,
    scope: VariableScope,
): string {
    return isStringExpression(expr)
        ? evaluateString(expr, scope)
        : evaluateNumeric(expr, scope).toString();
}
