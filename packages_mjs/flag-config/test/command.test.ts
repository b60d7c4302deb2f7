import {
    AlreadyParsedError,
    AmbiguousNameError,
    Command,
    DuplicateFlagError,
    FlagSet,
    HelpRequestedError,
    InvalidCommandError,
    NoExecError,
    NotParsedError,
    UnknownFlagError,
    isHelpRequested,
    isNoExec
} from "../src";

function newTree() {
    const rootFlags = new FlagSet("textctl");
    const verbose = rootFlags.bool("v", "verbose", false, "increase log verbosity");

    const repeatFlags = new FlagSet("repeat");
    const n = repeatFlags.int("n", "", 3, "how many times");
    const repeatExec = jest.fn();
    const repeat = new Command({
        name: "repeat",
        usage: "textctl repeat [-n TIMES] ARG",
        shortHelp: "repeatedly print the first argument to stdout",
        flags: repeatFlags,
        exec: repeatExec
    });

    const countExec = jest.fn();
    const count = new Command({ name: "count", shortHelp: "count words", exec: countExec });

    const root = new Command({
        name: "textctl",
        usage: "textctl [FLAGS] SUBCOMMAND ...",
        flags: rootFlags,
        subcommands: [repeat, count]
    });

    return { root, repeat, count, verbose, n, repeatExec, countExec };
}

describe("Command", () => {
    it("parses each level and runs the selected command with its leftover args", async () => {
        const { root, repeat, verbose, n, repeatExec } = newTree();
        await root.parseAndRun(["-v", "repeat", "-n", "5", "hello"]);

        expect(verbose.get()).toBe(true);
        expect(n.get()).toBe(5);
        expect(root.getSelected()).toBe(repeat);
        expect(repeat.getParent()).toBe(root);
        expect(repeatExec).toHaveBeenCalledTimes(1);
        expect(repeatExec.mock.calls[0][0]).toEqual(["hello"]);
    });

    it("matches subcommand names case-insensitively", async () => {
        const { root, count, countExec } = newTree();
        await root.parseAndRun(["COUNT", "a", "b"]);
        expect(root.getSelected()).toBe(count);
        expect(countExec.mock.calls[0][0]).toEqual(["a", "b"]);
    });

    it("passes the signal through to exec", async () => {
        const { root, repeatExec } = newTree();
        const controller = new AbortController();
        await root.parseAndRun(["repeat", "x"], {}, controller.signal);
        expect(repeatExec.mock.calls[0][1]).toBe(controller.signal);
    });

    it("keeps unmatched args for the command's own exec", async () => {
        const exec = jest.fn();
        const root = new Command({ name: "root", exec, subcommands: [new Command({ name: "sub" })] });
        await root.parseAndRun(["other", "sub"]);
        expect(root.getSelected()).toBe(root);
        expect(exec.mock.calls[0][0]).toEqual(["other", "sub"]);
    });

    it("returns NoExecError when the selected command has no exec", async () => {
        const { root } = newTree();
        await root.parse([]);

        let caught: unknown;
        try {
            await root.run();
        } catch (error) {
            caught = error;
        }
        expect(caught).toBeInstanceOf(NoExecError);
        expect(isNoExec(caught)).toBe(true);
        expect(caught instanceof Error && caught.message).toBe("textctl: no exec function");
    });

    it("refuses to run before parsing", async () => {
        const { root } = newTree();
        await expect(root.run()).rejects.toThrow(NotParsedError);
        await expect(root.run()).rejects.toThrow("textctl: not parsed");
    });

    it("refuses to parse twice without reset", async () => {
        const { root } = newTree();
        await root.parse([]);
        await expect(root.parse([])).rejects.toThrow(AlreadyParsedError);
    });

    it("resolves child flags from the environment with ancestor flags visible", async () => {
        const { root, verbose, n } = newTree();
        await root.parse(["repeat", "x"], { envVars: true, envVarShortNames: true, env: { N: "9", VERBOSE: "true" } });
        expect(n.get()).toBe(9);
        expect(verbose.get()).toBe(true);
    });

    it("does not let a subcommand take its parent's flags from args", async () => {
        const { root } = newTree();
        await expect(root.parse(["repeat", "-v"])).rejects.toThrow(UnknownFlagError);
    });

    it("reports the failing command from getSelected", async () => {
        const { root, repeat, repeatExec } = newTree();
        await expect(root.parse(["repeat", "-n", "many"])).rejects.toThrow('-n: set "many": invalid integer "many"');
        expect(root.getSelected()).toBe(repeat);
        expect(repeatExec).not.toHaveBeenCalled();
    });

    it("runs postparse before dispatching and aborts on its failure", async () => {
        const order: string[] = [];
        const sub = new Command({ name: "sub", exec: () => { order.push("exec"); } });
        const root = new Command({
            name: "root",
            subcommands: [sub],
            postparse: cmd => { order.push(`postparse ${cmd.name} ${cmd.getArgs().join(" ")}`); }
        });
        await root.parseAndRun(["sub", "x"]);
        expect(order).toEqual(["postparse root sub x", "exec"]);

        const failing = new Command({
            name: "root",
            subcommands: [new Command({ name: "sub" })],
            postparse: () => { throw new Error("not ready"); }
        });
        await expect(failing.parse(["sub"])).rejects.toThrow("not ready");
        expect(failing.getSelected()).toBe(failing);
    });

    it("creates an empty flag set named after the command", async () => {
        const cmd = new Command({ name: "bare" });
        expect(cmd.getFlags().getName()).toBe("bare");

        let caught: unknown;
        try {
            await cmd.parse(["-h"]);
        } catch (error) {
            caught = error;
        }
        expect(caught).toBeInstanceOf(HelpRequestedError);
        expect(isHelpRequested(caught)).toBe(true);
    });

    it("links child flag sets to the parent's", () => {
        const { root, repeat } = newTree();
        expect(repeat.getFlags().getParent()).toBe(root.getFlags());
        expect(repeat.getFlags().getFlag("verbose")?.getFlagSetName()).toBe("textctl");
    });

    it("rejects child flags that collide with the parent's", () => {
        const parentFlags = new FlagSet("root");
        parentFlags.bool("v", "verbose", false, "");
        const childFlags = new FlagSet("child");
        childFlags.bool("v", "version", false, "");
        const child = new Command({ name: "child", flags: childFlags });
        expect(() => new Command({ name: "root", flags: parentFlags, subcommands: [child] })).toThrow(DuplicateFlagError);
    });

    it("rejects empty and duplicate subcommand names", () => {
        expect(() => new Command({ name: "root", subcommands: [new Command({ name: "" })] }))
            .toThrow(InvalidCommandError);
        expect(() => new Command({ name: "root", subcommands: [new Command({ name: "a" }), new Command({ name: "A" })] }))
            .toThrow("root: duplicate subcommand A");
    });

    it("resets the whole tree", async () => {
        const { root, repeat, verbose, n, repeatExec } = newTree();
        await root.parseAndRun(["-v", "repeat", "-n", "5", "hello"]);
        root.reset();

        expect(verbose.get()).toBe(false);
        expect(n.get()).toBe(3);
        expect(root.getSelected()).toBeUndefined();
        expect(repeat.getParent()).toBeUndefined();
        expect(root.isParsed()).toBe(false);

        await root.parseAndRun(["repeat", "again"]);
        expect(repeatExec.mock.calls[1][0]).toEqual(["again"]);
    });
});

describe("Command trees deeper than two levels", () => {
    function newDeepTree() {
        const rootFlags = new FlagSet("ops");
        const region = rootFlags.string("r", "region", "eu", "deployment region");

        const dbFlags = new FlagSet("db");
        const host = dbFlags.string("", "host", "localhost", "database host");

        const migrateFlags = new FlagSet("migrate");
        const steps = migrateFlags.int("n", "steps", 1, "migrations to apply");
        const migrateExec = jest.fn();
        const migrate = new Command({ name: "migrate", flags: migrateFlags, exec: migrateExec });

        const db = new Command({ name: "db", flags: dbFlags, subcommands: [migrate] });
        const root = new Command({ name: "ops", flags: rootFlags, subcommands: [db] });

        return { root, db, migrate, migrateFlags, region, host, steps, migrateExec };
    }

    it("links every level into one chain", () => {
        const { root, migrateFlags } = newDeepTree();
        expect(migrateFlags.getAllFlags().map(f => `${f.getFlagSetName()}:${f.getLongName()}`))
            .toEqual(["migrate:steps", "db:host", "ops:region"]);
        expect(migrateFlags.getFlag("region")?.getFlagSetName()).toBe(root.getFlags().getName());
    });

    it("resolves env values for every level and runs the leaf", async () => {
        const { root, migrate, migrateFlags, region, host, steps, migrateExec } = newDeepTree();
        await root.parseAndRun(["db", "migrate", "up"], {
            envVarPrefix: "OPS",
            env: { OPS_REGION: "us", OPS_HOST: "db.internal", OPS_STEPS: "4" }
        });

        expect(region.get()).toBe("us");
        expect(host.get()).toBe("db.internal");
        expect(steps.get()).toBe(4);
        expect(migrateFlags.getFlag("region")?.getValue()).toBe("us");
        expect(root.getSelected()).toBe(migrate);
        expect(migrateExec.mock.calls[0][0]).toEqual(["up"]);
    });

    it("rejects a leaf flag that collides with the root's", () => {
        const rootFlags = new FlagSet("root");
        rootFlags.bool("v", "verbose", false, "");
        const leafFlags = new FlagSet("leaf");
        leafFlags.bool("v", "verbose", false, "");
        const leaf = new Command({ name: "leaf", flags: leafFlags });
        const mid = new Command({ name: "mid", subcommands: [leaf] });

        expect(() => new Command({ name: "root", flags: rootFlags, subcommands: [mid] }))
            .toThrow("-v, --verbose: duplicate flag (-v, --verbose)");
    });

    it("detects env name clashes with a grandparent only at the leaf", async () => {
        const rootFlags = new FlagSet("root");
        rootFlags.bool("", "dry-run", false, "");
        const leafFlags = new FlagSet("leaf");
        leafFlags.bool("", "dry.run", false, "");
        const leaf = new Command({ name: "leaf", flags: leafFlags });
        const mid = new Command({ name: "mid", subcommands: [leaf] });
        const root = new Command({ name: "root", flags: rootFlags, subcommands: [mid] });

        const parsing = root.parse(["mid", "leaf"], { envVarPrefix: "OPS", env: {} });
        await expect(parsing).rejects.toThrow(AmbiguousNameError);
        await expect(parsing).rejects.toThrow("ambiguous name OPS_DRY_RUN: matches (--dry.run) and (--dry-run)");
        expect(root.getSelected()).toBe(leaf);
        expect(mid.isParsed()).toBe(true);
    });
});
