/**
 * Command tree.
 * Each node parses its own flags, then hands the remaining args to the
 * subcommand named by the first of them, or keeps them for its own exec.
 */

import { AlreadyParsedError, InvalidCommandError, NoExecError, NotParsedError } from './errors.js';
import { FlagSet } from './flag-set.js';
import { getLogger } from './logger.js';
import { ParseOptions } from './options.js';
import { parse as parseFlags } from './parse.js';

const logger = getLogger('command');

export type ExecFunc = (args: string[], signal: AbortSignal) => Promise<void> | void;

/** Runs after a command's flags are parsed, before dispatch continues. */
export type PostparseFunc = (command: Command, signal: AbortSignal) => Promise<void> | void;

export interface CommandConfig {
    name: string;
    /** One line, e.g. "textctl repeat [-n TIMES] <arg>". */
    usage?: string;
    shortHelp?: string;
    longHelp?: string;
    /** Defaults to an empty set named after the command. */
    flags?: FlagSet;
    subcommands?: Command[];
    postparse?: PostparseFunc;
    exec?: ExecFunc;
}

export class Command {
    public readonly name: string;
    public readonly usage: string;
    public readonly shortHelp: string;
    public readonly longHelp: string;
    private readonly flags: FlagSet;
    private readonly subcommands: Command[];
    private readonly postparse: PostparseFunc | undefined;
    private readonly exec: ExecFunc | undefined;

    private parsed: boolean = false;
    private selected: Command | undefined;
    private parent: Command | undefined;
    private args: string[] = [];

    constructor(config: CommandConfig) {
        this.name = config.name;
        this.usage = config.usage ?? '';
        this.shortHelp = config.shortHelp ?? '';
        this.longHelp = config.longHelp ?? '';
        this.flags = config.flags ?? new FlagSet(config.name);
        this.subcommands = [...(config.subcommands ?? [])];
        this.postparse = config.postparse;
        this.exec = config.exec;

        const seen = new Set<string>();
        for (const sub of this.subcommands) {
            if (!sub.name.trim()) {
                throw new InvalidCommandError(`${this.name}: subcommand name is required`);
            }
            const key = sub.name.toLowerCase();
            if (seen.has(key)) {
                throw new InvalidCommandError(`${this.name}: duplicate subcommand ${sub.name}`);
            }
            seen.add(key);

            // Ancestor flags are visible to env and config lookup in the child
            if (!sub.flags.getParent()) {
                sub.flags.setParent(this.flags);
            }
        }
    }

    /**
     * Parses this command's flags, runs postparse, then recurses into the
     * subcommand matching the first leftover arg (case-insensitive).
     * On failure getSelected() reports the command whose parse failed.
     */
    public async parse(
        args: readonly string[],
        options: ParseOptions = {},
        signal: AbortSignal = new AbortController().signal
    ): Promise<void> {
        if (this.parsed) {
            throw new AlreadyParsedError(this.name);
        }

        try {
            parseFlags(this.flags, args, options);
            this.parsed = true;
            this.args = this.flags.getArgs();

            if (this.postparse) {
                await this.postparse(this, signal);
            }
        } catch (error) {
            this.selected = this;
            throw error;
        }

        const first = this.args[0];
        const sub = first === undefined
            ? undefined
            : this.subcommands.find(c => c.name.toLowerCase() === first.toLowerCase());

        if (!sub) {
            this.selected = this;
            return;
        }

        logger.debug(`${this.name}: selected subcommand ${sub.name}`);
        this.selected = sub;
        sub.parent = this;
        await sub.parse(this.args.slice(1), options, signal);
    }

    /**
     * Calls exec on the selected command with its leftover args.
     */
    public async run(signal: AbortSignal = new AbortController().signal): Promise<void> {
        if (!this.parsed || !this.selected) {
            throw new NotParsedError(this.name);
        }
        if (this.selected !== this) {
            return this.selected.run(signal);
        }
        if (!this.exec) {
            throw new NoExecError(this.name);
        }
        await this.exec(this.getArgs(), signal);
    }

    public async parseAndRun(
        args: readonly string[],
        options: ParseOptions = {},
        signal: AbortSignal = new AbortController().signal
    ): Promise<void> {
        await this.parse(args, options, signal);
        await this.run(signal);
    }

    /** The terminal command of the last parse, or undefined before parsing. */
    public getSelected(): Command | undefined {
        if (!this.selected || this.selected === this) {
            return this.selected;
        }
        return this.selected.getSelected();
    }

    /** Set when this command was reached through a parent during parse. */
    public getParent(): Command | undefined {
        return this.parent;
    }

    public getFlags(): FlagSet {
        return this.flags;
    }

    public getSubcommands(): Command[] {
        return [...this.subcommands];
    }

    public getArgs(): string[] {
        return [...this.args];
    }

    public isParsed(): boolean {
        return this.parsed;
    }

    /**
     * Restores every flag in the tree to its default and clears parse state,
     * so the tree can be parsed again.
     */
    public reset(): void {
        this.flags.reset();
        for (const sub of this.subcommands) {
            sub.reset();
        }
        this.parsed = false;
        this.selected = undefined;
        this.parent = undefined;
        this.args = [];
    }
}
