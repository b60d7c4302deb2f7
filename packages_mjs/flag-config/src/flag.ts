/**
 * Flag model.
 * A flag is a named, typed parameter owned by exactly one flag set.
 */

import { FlagValue } from '@layerflag/flag-values';
import { InvalidFlagError, ParseValueError } from './errors.js';

export interface Flag {
    /** Name of the flag set that declared this flag. */
    getFlagSetName(): string;
    getShortName(): string | undefined;
    getLongName(): string | undefined;
    getUsage(): string;
    getPlaceholder(): string;
    /** Default value as text, or empty when hidden with noDefault. */
    getDefault(): string;
    getValue(): string;
    /** Parse and store input. Throws ParseValueError naming the flag. */
    setValue(input: string): void;
    isSet(): boolean;
    isBoolFlag(): boolean;
    reset(): void;
}

export interface FlagConfig {
    /** Single character, given on the command line as -x. */
    shortName?: string;
    /** Given on the command line as --name. Trimmed before use. */
    longName?: string;
    usage?: string;
    value: FlagValue;
    /** Example value shown in help output after the flag names. */
    placeholder?: string;
    noPlaceholder?: boolean;
    /** Hide the default value in help output. */
    noDefault?: boolean;
}

export class CoreFlag implements Flag {
    private readonly shortName: string | undefined;
    private readonly longName: string | undefined;
    private readonly usage: string;
    private readonly value: FlagValue;
    private readonly initialText: string;
    private readonly boolFlag: boolean;
    private readonly placeholder: string;
    private readonly noDefault: boolean;
    private explicit: boolean = false;

    constructor(
        private readonly flagSetName: string,
        config: FlagConfig
    ) {
        const shortName = config.shortName || undefined;
        const longName = config.longName?.trim() || undefined;
        const boolFlag = config.value.isBoolFlag?.() ?? false;
        const initialText = config.value.toString();

        // 1. Names
        if (shortName !== undefined && !isValidShortName(shortName)) {
            throw new InvalidFlagError(`-${shortName}: invalid short name`);
        }
        if (longName !== undefined && !isValidLongName(longName)) {
            throw new InvalidFlagError(`--${longName}: invalid long name`);
        }
        if (shortName === undefined && longName === undefined) {
            throw new InvalidFlagError('at least one valid name is required');
        }
        if (shortName !== undefined && shortName === longName) {
            throw new InvalidFlagError(`-${shortName}, --${longName}: short name identical to long name`);
        }

        // 2. A true boolean can only be switched off with --name=false
        if (boolFlag && longName === undefined && initialText === 'true') {
            throw new InvalidFlagError(`-${shortName}: default true boolean flag requires a long name`);
        }

        this.shortName = shortName;
        this.longName = longName;
        this.usage = config.usage ?? '';
        this.value = config.value;
        this.initialText = initialText;
        this.boolFlag = boolFlag;
        this.placeholder = derivePlaceholder(config, boolFlag, initialText);
        this.noDefault = config.noDefault ?? false;
    }

    public getFlagSetName(): string {
        return this.flagSetName;
    }

    public getShortName(): string | undefined {
        return this.shortName;
    }

    public getLongName(): string | undefined {
        return this.longName;
    }

    public getUsage(): string {
        return this.usage;
    }

    public getPlaceholder(): string {
        return this.placeholder;
    }

    public getDefault(): string {
        return this.noDefault ? '' : this.initialText;
    }

    public getValue(): string {
        return this.value.toString();
    }

    public setValue(input: string): void {
        try {
            this.value.set(input);
        } catch (error) {
            const cause = error instanceof Error ? error : new Error(String(error));
            throw new ParseValueError(describeFlag(this), input, cause);
        }
        this.explicit = true;
    }

    public isSet(): boolean {
        return this.explicit;
    }

    public isBoolFlag(): boolean {
        return this.boolFlag;
    }

    public reset(): void {
        if (this.value.reset) {
            this.value.reset();
        } else {
            this.value.set(this.initialText);
        }
        this.explicit = false;
    }
}

export function isValidShortName(name: string): boolean {
    return [...name].length === 1 && name !== '-' && name !== '=' && !/\s/.test(name);
}

export function isValidLongName(name: string): boolean {
    return name !== '' && !name.startsWith('-') && !/[\s=]/.test(name);
}

/**
 * Renders flag names for messages, e.g. "-v, --verbose".
 */
export function describeFlag(flag: Flag): string {
    const names: string[] = [];
    const shortName = flag.getShortName();
    const longName = flag.getLongName();
    if (shortName !== undefined) names.push(`-${shortName}`);
    if (longName !== undefined) names.push(`--${longName}`);
    return names.join(', ');
}

/**
 * True if the two flags would answer to the same name on the command line.
 */
export function namesCollide(a: Flag, b: Flag): boolean {
    const aShort = a.getShortName();
    const aLong = a.getLongName();
    const bShort = b.getShortName();
    const bLong = b.getLongName();

    const sameShort = aShort !== undefined && aShort === bShort;
    const sameLong = aLong !== undefined && aLong === bLong;
    const shortIsLong = aShort !== undefined && aShort === bLong;
    const longIsShort = aLong !== undefined && aLong === bShort;

    return sameShort || sameLong || shortIsLong || longIsShort;
}

function derivePlaceholder(config: FlagConfig, boolFlag: boolean, initialText: string): string {
    // 1. Explicitly refused
    if (config.noPlaceholder) {
        return '';
    }

    // 2. Explicitly provided
    if (config.placeholder) {
        return config.placeholder;
    }

    // 3. A `backticked` word in the usage text
    const backticked = /`([^`]*)`/.exec(config.usage ?? '');
    if (backticked) {
        return backticked[1];
    }

    // 4. Booleans that default to false take no value
    if (boolFlag && initialText === 'false') {
        return '';
    }

    // 5. Whatever the value reports for itself
    return config.value.getPlaceholder?.() ?? '';
}
