import { BasicNumber } from "../src/number/BasicNumber";
import { BasicRuntimeError } from "../src/utils/Error";

const int = BasicNumber.integer;
const float = BasicNumber.float;

describe("BasicNumber", () => {
    test("parse picks integer or float from the literal text", () => {
        expect(BasicNumber.parse("42").integral).toBe(true);
        expect(BasicNumber.parse("42").value).toBe(42);
        expect(BasicNumber.parse("3.").integral).toBe(false);
        expect(BasicNumber.parse("3.").toString()).toBe("3.00000");
        expect(BasicNumber.parse("0.25").value).toBe(0.25);
    });

    test("arithmetic stays integral only when both sides are", () => {
        const sum = int(7).add(int(2));
        expect(sum.integral).toBe(true);
        expect(sum.toString()).toBe("9");

        const mixed = int(2).add(float(0.5));
        expect(mixed.integral).toBe(false);
        expect(mixed.value).toBe(2.5);

        expect(int(6).multiply(int(7)).toString()).toBe("42");
        expect(int(3).subtract(int(10)).toString()).toBe("-7");
    });

    test("division is integral only when exact", () => {
        const exact = int(6).divide(int(3));
        expect(exact.integral).toBe(true);
        expect(exact.toString()).toBe("2");

        const inexact = int(3).divide(int(2));
        expect(inexact.integral).toBe(false);
        expect(inexact.toString()).toBe("1.50000");

        expect(int(1).divide(int(2)).toString()).toBe("0.500000");
        expect(float(3).divide(int(3)).integral).toBe(false);
    });

    test("division by zero is a runtime error", () => {
        expect(() => int(10).divide(int(0))).toThrow(BasicRuntimeError);
        expect(() => int(10).divide(float(0))).toThrow("Division by zero");
        expect(() => int(5).modulo(int(0))).toThrow("Division by zero");
    });

    test("modulo needs whole numbers and follows the dividend's sign", () => {
        expect(int(7).modulo(int(3)).toString()).toBe("1");
        expect(int(-7).modulo(int(3)).toString()).toBe("-1");
        expect(() => float(5.5).modulo(int(2))).toThrow(
            "Modulo operation is only defined on whole number types.",
        );
    });

    test("floating values print with six significant digits and a point", () => {
        expect(float(-2.5).toString()).toBe("-2.50000");
        expect(float(100).toString()).toBe("100.000");
        expect(float(123456.7).toString()).toBe("123457.");
        expect(float(0).toString()).toBe("0.00000");
        expect(float(0.0001).toString()).toBe("0.000100000");
        expect(float(0.00001).toString()).toBe("1.00000e-05");
        expect(float(1e10).toString()).toBe("1.00000e+10");
        expect(float(Infinity).toString()).toBe("inf");
    });

    test("equality on floating values tolerates rounding", () => {
        expect(float(0.1 + 0.2).equals(float(0.3))).toBe(true);
        expect(int(1).equals(float(1))).toBe(true);
        expect(int(1).equals(int(2))).toBe(false);
    });

    test("ordering", () => {
        expect(int(2).lessOrEqual(int(2))).toBe(true);
        expect(int(2).greaterThan(int(2))).toBe(false);
        expect(int(3).greaterOrEqual(int(2))).toBe(true);
        expect(float(1.5).lessThan(int(2))).toBe(true);
    });

    test("truthiness is nonzero", () => {
        expect(int(0).isTrue()).toBe(false);
        expect(int(-3).isTrue()).toBe(true);
        expect(float(0.5).isTrue()).toBe(true);
        expect(float(1e-20).isTrue()).toBe(false);
    });

    test("negate keeps the kind", () => {
        expect(int(4).negate().toString()).toBe("-4");
        expect(float(4).negate().toString()).toBe("-4.00000");
    });
});
