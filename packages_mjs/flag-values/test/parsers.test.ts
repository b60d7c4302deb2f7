import {
    InvalidValueError,
    formatDuration,
    formatFloat,
    parseBool,
    parseDuration,
    parseFloat,
    parseInt,
    parseUint
} from "../src";

describe("parseBool", () => {
    it.each(["1", "t", "T", "TRUE", "true", "True"])("parses %s as true", input => {
        expect(parseBool(input)).toBe(true);
    });

    it.each(["0", "f", "F", "FALSE", "false", "False"])("parses %s as false", input => {
        expect(parseBool(input)).toBe(false);
    });

    it("rejects other spellings", () => {
        expect(() => parseBool("yes")).toThrow(InvalidValueError);
        expect(() => parseBool("tRuE")).toThrow('invalid boolean "tRuE"');
    });
});

describe("parseInt", () => {
    it("parses signed decimal integers", () => {
        expect(parseInt("42")).toBe(42);
        expect(parseInt("-7")).toBe(-7);
        expect(parseInt("+3")).toBe(3);
    });

    it("rejects fractions and garbage", () => {
        expect(() => parseInt("1.5")).toThrow('invalid integer "1.5"');
        expect(() => parseInt("")).toThrow(InvalidValueError);
        expect(() => parseInt("12abc")).toThrow(InvalidValueError);
    });

    it("rejects values outside the safe integer range", () => {
        expect(() => parseInt("9007199254740993")).toThrow('integer "9007199254740993" out of range');
    });
});

describe("parseUint", () => {
    it("accepts decimal and prefixed forms", () => {
        expect(parseUint("10")).toBe(10);
        expect(parseUint("0x1F")).toBe(31);
        expect(parseUint("0o17")).toBe(15);
        expect(parseUint("0b101")).toBe(5);
    });

    it("rejects negative numbers", () => {
        expect(() => parseUint("-1")).toThrow('invalid unsigned integer "-1"');
    });
});

describe("parseFloat / formatFloat", () => {
    it("parses decimal and exponent notation", () => {
        expect(parseFloat("1.25")).toBe(1.25);
        expect(parseFloat("-2e3")).toBe(-2000);
        expect(parseFloat(".5")).toBe(0.5);
    });

    it("parses infinities and NaN in any case", () => {
        expect(parseFloat("Inf")).toBe(Infinity);
        expect(parseFloat("-inf")).toBe(-Infinity);
        expect(parseFloat("+Infinity")).toBe(Infinity);
        expect(parseFloat("NaN")).toBeNaN();
    });

    it("rejects garbage", () => {
        expect(() => parseFloat("1.2.3")).toThrow('invalid float "1.2.3"');
    });

    it("formats special values", () => {
        expect(formatFloat(NaN)).toBe("NaN");
        expect(formatFloat(Infinity)).toBe("+Inf");
        expect(formatFloat(-Infinity)).toBe("-Inf");
        expect(formatFloat(0.25)).toBe("0.25");
    });
});

describe("parseDuration", () => {
    it("returns milliseconds", () => {
        expect(parseDuration("33ms")).toBe(33);
        expect(parseDuration("1s")).toBe(1000);
        expect(parseDuration("1.5s")).toBe(1500);
        expect(parseDuration("1h30m")).toBe(5400000);
        expect(parseDuration("2m")).toBe(120000);
    });

    it("accepts a sign and a bare zero", () => {
        expect(parseDuration("-1s")).toBe(-1000);
        expect(parseDuration("+250ms")).toBe(250);
        expect(parseDuration("0")).toBe(0);
    });

    it("accepts sub-millisecond units", () => {
        expect(parseDuration("500us")).toBe(0.5);
        expect(parseDuration("500µs")).toBe(0.5);
    });

    it("requires a unit", () => {
        expect(() => parseDuration("10")).toThrow('missing unit in duration "10"');
    });

    it("rejects unknown units and empty input", () => {
        expect(() => parseDuration("10d")).toThrow('invalid duration "10d"');
        expect(() => parseDuration("")).toThrow('invalid duration ""');
        expect(() => parseDuration("-")).toThrow('invalid duration "-"');
    });
});

describe("formatDuration", () => {
    it("formats like the duration syntax", () => {
        expect(formatDuration(0)).toBe("0s");
        expect(formatDuration(33)).toBe("33ms");
        expect(formatDuration(1000)).toBe("1s");
        expect(formatDuration(1500)).toBe("1.5s");
        expect(formatDuration(90000)).toBe("1m30s");
        expect(formatDuration(5400000)).toBe("1h30m0s");
        expect(formatDuration(0.0015)).toBe("1.5µs");
        expect(formatDuration(0.000002)).toBe("2ns");
        expect(formatDuration(-1000)).toBe("-1s");
    });
});
