import { InvalidValueError } from './errors.js';
import { FlagValue } from './value.js';

/**
 * String restricted to a fixed set of choices. The default is the first choice.
 */
export class EnumValue implements FlagValue {
    private current: string;
    private readonly choices: readonly string[];

    constructor(choices: readonly string[]) {
        if (choices.length === 0) {
            throw new Error('enum requires at least one valid value');
        }
        this.choices = [...choices];
        this.current = choices[0];
    }

    public set(input: string): void {
        if (!this.choices.includes(input)) {
            throw new InvalidValueError(
                `invalid value "${input}": must be one of ${this.choices.join(', ')}`,
                input
            );
        }
        this.current = input;
    }

    public get(): string {
        return this.current;
    }

    public getChoices(): readonly string[] {
        return this.choices;
    }

    public reset(): void {
        this.current = this.choices[0];
    }

    public getPlaceholder(): string {
        return 'STRING';
    }

    public toString(): string {
        return this.current;
    }
}

/**
 * Value that hands every input to a callback and keeps nothing itself.
 */
export class FuncValue implements FlagValue {
    constructor(private readonly fn: (input: string) => void) { }

    public set(input: string): void {
        this.fn(input);
    }

    public reset(): void { }

    public toString(): string {
        return '';
    }
}
