import {
    FlagSet,
    getLogLevel,
    getLogger,
    isSensitiveKey,
    maskValue,
    parse,
    setLogLevel,
    setLogMask
} from "../src";

describe("logger", () => {
    const initialLevel = getLogLevel();

    afterEach(() => {
        setLogLevel(initialLevel);
        setLogMask(true);
        jest.restoreAllMocks();
    });

    it("filters by level", () => {
        const debug = jest.spyOn(console, "debug").mockImplementation(() => undefined);
        const log = jest.spyOn(console, "log").mockImplementation(() => undefined);

        setLogLevel("debug");
        getLogger("command").trace("hidden");
        getLogger("command").debug("shown");
        expect(log).not.toHaveBeenCalled();
        expect(debug).toHaveBeenCalledWith("[layerflag] command: shown");

        setLogLevel("silent");
        getLogger("command").debug("also hidden");
        expect(debug).toHaveBeenCalledTimes(1);
    });

    it("formats assignments with the target flag when it differs from the key", () => {
        const log = jest.spyOn(console, "log").mockImplementation(() => undefined);
        setLogLevel("trace");

        getLogger("config").assigned("trace", "port", "8080", "-p, --port");
        getLogger("args").assigned("trace", "--port", "8080");
        getLogger("args").assigned("trace", "--port", "9090", "--port");
        expect(log.mock.calls).toEqual([
            ["[layerflag] config: port=8080 -> -p, --port"],
            ["[layerflag] args: --port=8080"],
            ["[layerflag] args: --port=9090"]
        ]);
    });

    it("logs env values applied by parse, masking secrets", () => {
        const debug = jest.spyOn(console, "debug").mockImplementation(() => undefined);
        setLogLevel("debug");
        setLogMask(true);

        const fs = new FlagSet("app");
        const token = fs.string("", "api-token", "", "");
        parse(fs, [], { envVars: true, env: { API_TOKEN: "test-secret" } });

        expect(token.get()).toBe("test-secret");
        expect(debug).toHaveBeenCalledWith("[layerflag] env: API_TOKEN=[REDACTED] -> --api-token");
    });

    it("logs args at trace level only", () => {
        const log = jest.spyOn(console, "log").mockImplementation(() => undefined);
        const fs = new FlagSet("app");
        fs.string("n", "name", "", "");

        setLogLevel("debug");
        fs.parse(["-n", "ann"]);
        expect(log).not.toHaveBeenCalled();

        setLogLevel("trace");
        fs.reset();
        fs.parse(["--name=bob"]);
        expect(log).toHaveBeenCalledWith("[layerflag] args: -n, --name=bob");
    });
});

describe("maskValue", () => {
    afterEach(() => setLogMask(true));

    it("masks values under sensitive keys or with secret-like prefixes", () => {
        setLogMask(true);
        expect(isSensitiveKey("DB_PASSWORD")).toBe(true);
        expect(maskValue("API_TOKEN", "abc")).toBe("[REDACTED]");
        expect(maskValue("header", "Bearer abc")).toBe("[REDACTED]");
        expect(maskValue("host", "localhost")).toBe("localhost");
    });

    it("passes values through when masking is off", () => {
        setLogMask(false);
        expect(maskValue("API_TOKEN", "abc")).toBe("abc");
    });
});
