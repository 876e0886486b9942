import NetworkError from "./NetworkError";

export default class DimensionMismatchError extends NetworkError {
    readonly expected: number;
    readonly actual: number;

    constructor(expected: number, actual: number) {
        super(`Expected ${expected} inputs, got ${actual}`, "DIMENSION_MISMATCH");
        this.name = "DimensionMismatchError";
        this.expected = expected;
        this.actual = actual;
    }
}
