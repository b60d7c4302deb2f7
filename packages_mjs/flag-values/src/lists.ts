import { DuplicateValueError } from './errors.js';
import { FlagValue, FormatFunc, ParseFunc } from './value.js';

export interface ListOptions<T> {
    parse: ParseFunc<T>;
    /** Formats a single element. Elements are joined with ", ". */
    format?: FormatFunc<T>;
    placeholder?: string;
}

/**
 * Ordered list of values. Every set appends, so a repeated flag accumulates.
 */
export class List<T> implements FlagValue {
    protected items: T[] = [];
    protected readonly parseFunc: ParseFunc<T>;
    protected readonly formatFunc: FormatFunc<T>;
    private readonly placeholder: string;

    constructor(options: ListOptions<T>) {
        this.parseFunc = options.parse;
        this.formatFunc = options.format ?? ((value: T) => String(value));
        this.placeholder = options.placeholder ?? '';
    }

    public set(input: string): void {
        this.items.push(this.parseFunc(input));
    }

    public get(): T[] {
        return [...this.items];
    }

    public reset(): void {
        this.items = [];
    }

    public getPlaceholder(): string {
        return this.placeholder;
    }

    public toString(): string {
        return this.items.map(this.formatFunc).join(', ');
    }
}

export interface UniqueListOptions<T> extends ListOptions<T> {
    /** Throw DuplicateValueError instead of dropping repeated values. */
    rejectDuplicates?: boolean;
}

/**
 * List that keeps the first occurrence of each value.
 */
export class UniqueList<T> extends List<T> {
    private readonly rejectDuplicates: boolean;

    constructor(options: UniqueListOptions<T>) {
        super(options);
        this.rejectDuplicates = options.rejectDuplicates ?? false;
    }

    public set(input: string): void {
        const value = this.parseFunc(input);
        if (this.items.includes(value)) {
            if (this.rejectDuplicates) {
                throw new DuplicateValueError(input);
            }
            return;
        }
        this.items.push(value);
    }
}
