import { BasicRuntimeError } from "../utils/Error";

// Significant digits used when printing floating values.
const PRECISION = 6;

function formatFloating(value: number): string {
    if (Number.isNaN(value)) return "nan";
    if (!Number.isFinite(value)) return value < 0 ? "-inf" : "inf";

    const [mantissa, exponentText] = value
        .toExponential(PRECISION - 1)
        .split("e");
    const exponent = Number(exponentText);

    if (exponent < -4 || exponent >= PRECISION) {
        const sign = exponent < 0 ? "-" : "+";
        const digits = String(Math.abs(exponent)).padStart(2, "0");
        return `${mantissa}e${sign}${digits}`;
    }

    // The decimal point is always shown, even with no fraction digits.
    const fixed = value.toFixed(PRECISION - 1 - exponent);
    return fixed.includes(".") ? fixed : `${fixed}.`;
}

/**
 * A numeric value that is either integral or floating. Integral values stay
 * integral through `+`, `-` and `*` as long as both operands are integral,
 * and through `/` only when the division is exact.
 */
export class BasicNumber {
    public static readonly ZERO = new BasicNumber(0, true);
    public static readonly ONE = new BasicNumber(1, true);

    private constructor(
        public readonly value: number,
        public readonly integral: boolean,
    ) {}

    public static integer(value: number): BasicNumber {
        return new BasicNumber(Math.trunc(value), true);
    }

    public static float(value: number): BasicNumber {
        return new BasicNumber(value, false);
    }

    public static fromBoolean(value: boolean): BasicNumber {
        return value ? BasicNumber.ONE : BasicNumber.ZERO;
    }

    /** Parses literal text: without a `.` it is an integer, otherwise a float. */
    public static parse(text: string): BasicNumber {
        return text.includes(".")
            ? BasicNumber.float(parseFloat(text))
            : BasicNumber.integer(parseInt(text, 10));
    }

    public isTrue(): boolean {
        if (this.integral) return this.value !== 0;
        return Math.abs(this.value) >= Number.EPSILON;
    }

    public negate(): BasicNumber {
        return new BasicNumber(-this.value, this.integral);
    }

    public add(other: BasicNumber): BasicNumber {
        return this.combine(other, this.value + other.value);
    }

    public subtract(other: BasicNumber): BasicNumber {
        return this.combine(other, this.value - other.value);
    }

    public multiply(other: BasicNumber): BasicNumber {
        return this.combine(other, this.value * other.value);
    }

    public divide(other: BasicNumber): BasicNumber {
        if (other.value === 0) {
            throw new BasicRuntimeError("Division by zero");
        }
        if (
            this.integral &&
            other.integral &&
            this.value % other.value === 0
        ) {
            return BasicNumber.integer(this.value / other.value);
        }
        return BasicNumber.float(this.value / other.value);
    }

    public modulo(other: BasicNumber): BasicNumber {
        if (!this.integral || !other.integral) {
            throw new BasicRuntimeError(
                "Modulo operation is only defined on whole number types.",
            );
        }
        if (other.value === 0) {
            throw new BasicRuntimeError("Division by zero");
        }
        return BasicNumber.integer(this.value % other.value);
    }

    public equals(other: BasicNumber): boolean {
        if (this.integral && other.integral) return this.value === other.value;
        return Math.abs(this.value - other.value) < Number.EPSILON;
    }

    public lessThan(other: BasicNumber): boolean {
        return this.value < other.value;
    }

    public lessOrEqual(other: BasicNumber): boolean {
        return this.lessThan(other) || this.equals(other);
    }

    public greaterThan(other: BasicNumber): boolean {
        return !this.lessOrEqual(other);
    }

    public greaterOrEqual(other: BasicNumber): boolean {
        return !this.lessThan(other);
    }

    public toString(): string {
        return this.integral ? String(this.value) : formatFloating(this.value);
    }

    private combine(other: BasicNumber, value: number): BasicNumber {
        return this.integral && other.integral
            ? BasicNumber.integer(value)
            : BasicNumber.float(value);
    }
}
