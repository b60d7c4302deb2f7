import { ConfigParseError, StringConversionError, flattenDocument, stringifyScalar } from "../src";

function collect(doc: unknown, delimiter?: string): Array<[string, string]> {
    const calls: Array<[string, string]> = [];
    flattenDocument(doc, (name, value) => calls.push([name, value]), { delimiter });
    return calls;
}

describe("flattenDocument", () => {
    it("joins nested keys with the delimiter", () => {
        const doc = { server: { http: { port: 8080 }, name: "api" }, debug: true };
        expect(collect(doc)).toEqual([
            ["server.http.port", "8080"],
            ["server.name", "api"],
            ["debug", "true"]
        ]);
        expect(collect(doc, "-")).toEqual([
            ["server-http-port", "8080"],
            ["server-name", "api"],
            ["debug", "true"]
        ]);
    });

    it("sets a sequence once per element under the same name, in order", () => {
        const set = jest.fn();
        flattenDocument({ x: ["a", "b", "c"] }, set);
        expect(set).toHaveBeenCalledTimes(3);
        expect(set.mock.calls).toEqual([["x", "a"], ["x", "b"], ["x", "c"]]);
    });

    it("converts scalars to canonical strings", () => {
        expect(collect({ i: 42, f: 1.5, neg: -3, big: 1e21, b: false, n: null })).toEqual([
            ["i", "42"],
            ["f", "1.5"],
            ["neg", "-3"],
            ["big", "1000000000000000000000"],
            ["b", "false"],
            ["n", ""]
        ]);
    });

    it("sets nothing for an empty document", () => {
        expect(collect(null)).toEqual([]);
        expect(collect(undefined)).toEqual([]);
        expect(collect({})).toEqual([]);
    });

    it("requires a mapping at the root", () => {
        expect(() => collect(["a"])).toThrow(ConfigParseError);
        expect(() => collect("text")).toThrow("config document must be a mapping, got string");
    });

    it("rejects values it cannot stringify", () => {
        const when = new Date(0);
        expect(() => collect({ when })).toThrow(StringConversionError);
    });

    it("propagates setter errors unchanged", () => {
        const boom = new Error("boom");
        expect(() => flattenDocument({ a: 1 }, () => { throw boom; })).toThrow(boom);
    });
});

describe("stringifyScalar", () => {
    it("handles each scalar kind", () => {
        expect(stringifyScalar("s")).toBe("s");
        expect(stringifyScalar(true)).toBe("true");
        expect(stringifyScalar(BigInt(12))).toBe("12");
        expect(stringifyScalar(0.1)).toBe("0.1");
    });

    it("names the unsupported value", () => {
        expect(() => stringifyScalar(Symbol.iterator)).toThrow(StringConversionError);
        expect(() => stringifyScalar(() => 1)).toThrow("(function) to string");
    });
});
