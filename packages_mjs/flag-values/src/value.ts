/**
 * Flag value holders.
 * A value parses text into a typed value and renders it back for help output.
 */

export interface FlagValue {
    /** Parse input and store it. Throws when the input is not valid for the type. */
    set(input: string): void;
    toString(): string;
    isBoolFlag?(): boolean;
    /** Restore the initial state. Values without reset are re-set from their default text. */
    reset?(): void;
    getPlaceholder?(): string;
}

export type ParseFunc<T> = (input: string) => T;
export type FormatFunc<T> = (value: T) => string;

export interface ValueOptions<T> {
    parse: ParseFunc<T>;
    default: T;
    format?: FormatFunc<T>;
    placeholder?: string;
    /** Boolean values take no argument on the command line. */
    isBool?: boolean;
}

export class Value<T> implements FlagValue {
    private current: T;
    private explicit: boolean = false;
    private readonly parseFunc: ParseFunc<T>;
    private readonly formatFunc: FormatFunc<T>;
    public readonly defaultValue: T;
    private readonly placeholder: string;
    private readonly boolFlag: boolean;

    constructor(options: ValueOptions<T>) {
        this.parseFunc = options.parse;
        this.formatFunc = options.format ?? ((value: T) => String(value));
        this.defaultValue = options.default;
        this.current = options.default;
        this.placeholder = options.placeholder ?? '';
        this.boolFlag = options.isBool ?? false;
    }

    public set(input: string): void {
        this.current = this.parseFunc(input);
        this.explicit = true;
    }

    public get(): T {
        return this.current;
    }

    public reset(): void {
        this.current = this.defaultValue;
        this.explicit = false;
    }

    /** True if set has succeeded at least once since construction or reset. */
    public isSet(): boolean {
        return this.explicit;
    }

    public isBoolFlag(): boolean {
        return this.boolFlag;
    }

    public getPlaceholder(): string {
        return this.placeholder;
    }

    public toString(): string {
        return this.formatFunc(this.current);
    }
}
