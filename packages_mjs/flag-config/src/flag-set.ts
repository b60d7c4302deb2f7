/**
 * FlagSet
 * Ordered collection of flags with an optional parent for ancestor lookup.
 */

import {
    BoolValue,
    DurationValue,
    EnumValue,
    FlagValue,
    FloatValue,
    FuncValue,
    IntValue,
    List,
    StringValue,
    UniqueList,
    boolValue,
    durationValue,
    floatValue,
    intValue,
    stringEnum,
    stringList,
    stringSet,
    stringValue,
    uintValue
} from '@layerflag/flag-values';
import { AlreadyParsedError, DuplicateFlagError, InvalidFlagError } from './errors.js';
import { CoreFlag, Flag, FlagConfig, describeFlag, namesCollide } from './flag.js';
import { FlagLookup, applyArgs } from './tokenizer.js';

export class FlagSet {
    private readonly flags: CoreFlag[] = [];
    private parent: FlagSet | undefined;
    private readonly children: FlagSet[] = [];
    private parsed: boolean = false;
    private args: string[] = [];

    constructor(private readonly name: string) { }

    public getName(): string {
        return this.name;
    }

    public getParent(): FlagSet | undefined {
        return this.parent;
    }

    /**
     * Makes the parent's flags visible to getFlag and walkFlags.
     * Fails if a flag of this set, or of any set already linked below it,
     * collides with a flag anywhere in the new chain.
     */
    public setParent(parent: FlagSet): this {
        for (let ancestor: FlagSet | undefined = parent; ancestor; ancestor = ancestor.parent) {
            if (ancestor === this) {
                throw new InvalidFlagError(`${this.name}: flag set cannot be its own ancestor`);
            }
        }
        for (const set of this.subtree()) {
            for (const flag of set.flags) {
                parent.assertNoCollision(flag);
            }
        }

        if (this.parent) {
            const siblings = this.parent.children;
            siblings.splice(siblings.indexOf(this), 1);
        }
        this.parent = parent;
        parent.children.push(this);
        return this;
    }

    /**
     * Fails if the flag collides with the chain above, or with any set
     * linked below, since those sets see this one as an ancestor.
     */
    public addFlag(config: FlagConfig): Flag {
        const flag = new CoreFlag(this.name, config);
        this.assertNoCollision(flag);
        for (const set of this.subtree().slice(1)) {
            const existing = set.flags.find(f => namesCollide(flag, f));
            if (existing) {
                throw new DuplicateFlagError(describeFlag(flag), describeFlag(existing));
            }
        }
        this.flags.push(flag);
        return flag;
    }

    public bool(shortName: string, longName: string, def: boolean, usage: string): BoolValue {
        return this.add(shortName, longName, boolValue(def), usage);
    }

    public string(shortName: string, longName: string, def: string, usage: string): StringValue {
        return this.add(shortName, longName, stringValue(def), usage);
    }

    public int(shortName: string, longName: string, def: number, usage: string): IntValue {
        return this.add(shortName, longName, intValue(def), usage);
    }

    public uint(shortName: string, longName: string, def: number, usage: string): IntValue {
        return this.add(shortName, longName, uintValue(def), usage);
    }

    public float(shortName: string, longName: string, def: number, usage: string): FloatValue {
        return this.add(shortName, longName, floatValue(def), usage);
    }

    /** Default in milliseconds. */
    public duration(shortName: string, longName: string, def: number, usage: string): DurationValue {
        return this.add(shortName, longName, durationValue(def), usage);
    }

    public stringList(shortName: string, longName: string, usage: string): List<string> {
        return this.add(shortName, longName, stringList(), usage);
    }

    public stringSet(shortName: string, longName: string, usage: string): UniqueList<string> {
        return this.add(shortName, longName, stringSet(), usage);
    }

    public stringEnum(shortName: string, longName: string, usage: string, ...choices: string[]): EnumValue {
        return this.add(shortName, longName, stringEnum(...choices), usage);
    }

    public func(shortName: string, longName: string, fn: (input: string) => void, usage: string): FuncValue {
        return this.add(shortName, longName, new FuncValue(fn), usage);
    }

    public value<V extends FlagValue>(shortName: string, longName: string, value: V, usage: string): V {
        return this.add(shortName, longName, value, usage);
    }

    /**
     * Applies args to this set's own flags. Ancestor flags are not recognized.
     */
    public parse(args: readonly string[]): void {
        if (this.parsed) {
            throw new AlreadyParsedError(this.name);
        }
        this.args = [];
        this.args = applyArgs(this.ownLookup(), args);
        this.parsed = true;
    }

    public isParsed(): boolean {
        return this.parsed;
    }

    /** Positional args left over from the last parse. */
    public getArgs(): string[] {
        return [...this.args];
    }

    /** Own flags in declaration order. */
    public getFlags(): Flag[] {
        return [...this.flags];
    }

    /** Own flags, then each ancestor's, nearest first. */
    public getAllFlags(): Flag[] {
        const all: Flag[] = [];
        for (let set: FlagSet | undefined = this; set; set = set.parent) {
            all.push(...set.flags);
        }
        return all;
    }

    public walkFlags(fn: (flag: Flag) => void): void {
        this.getAllFlags().forEach(fn);
    }

    /**
     * Finds a flag by long name across the chain, then by short name if the
     * name is a single character.
     */
    public getFlag(name: string): Flag | undefined {
        const all = this.getAllFlags();
        const byLong = all.find(f => f.getLongName() === name);
        if (byLong) {
            return byLong;
        }
        if ([...name].length === 1) {
            return all.find(f => f.getShortName() === name);
        }
        return undefined;
    }

    public reset(): void {
        for (const flag of this.flags) {
            flag.reset();
        }
        this.parsed = false;
        this.args = [];
    }

    private add<V extends FlagValue>(shortName: string, longName: string, value: V, usage: string): V {
        this.addFlag({ shortName, longName, value, usage });
        return value;
    }

    private assertNoCollision(flag: Flag): void {
        const existing = this.getAllFlags().find(f => namesCollide(flag, f));
        if (existing) {
            throw new DuplicateFlagError(describeFlag(flag), describeFlag(existing));
        }
    }

    /** This set and every set linked below it, depth first. */
    private subtree(): FlagSet[] {
        return [this, ...this.children.flatMap(child => child.subtree())];
    }

    private ownLookup(): FlagLookup {
        return {
            findLong: name => this.flags.find(f => f.getLongName() === name),
            findShort: name => this.flags.find(f => f.getShortName() === name)
        };
    }
}
