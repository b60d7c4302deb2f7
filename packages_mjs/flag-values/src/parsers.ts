import { InvalidValueError } from './errors.js';

const TRUE_STRINGS = ['1', 't', 'T', 'TRUE', 'true', 'True'];
const FALSE_STRINGS = ['0', 'f', 'F', 'FALSE', 'false', 'False'];

const INT_PATTERN = /^[+-]?\d+$/;
const UINT_PATTERN = /^(0[xX][0-9a-fA-F]+|0[oO][0-7]+|0[bB][01]+|\d+)$/;
const FLOAT_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const SPECIAL_FLOAT_PATTERN = /^([+-]?)(inf|infinity|nan)$/i;

export function parseBool(input: string): boolean {
    if (TRUE_STRINGS.includes(input)) {
        return true;
    }
    if (FALSE_STRINGS.includes(input)) {
        return false;
    }
    throw new InvalidValueError(`invalid boolean "${input}"`, input);
}

export function parseInt(input: string): number {
    if (!INT_PATTERN.test(input)) {
        throw new InvalidValueError(`invalid integer "${input}"`, input);
    }
    const value = Number(input);
    if (!Number.isSafeInteger(value)) {
        throw new InvalidValueError(`integer "${input}" out of range`, input);
    }
    return value;
}

export function parseUint(input: string): number {
    if (!UINT_PATTERN.test(input)) {
        throw new InvalidValueError(`invalid unsigned integer "${input}"`, input);
    }
    const value = Number(input.toLowerCase());
    if (!Number.isSafeInteger(value)) {
        throw new InvalidValueError(`unsigned integer "${input}" out of range`, input);
    }
    return value;
}

export function parseFloat(input: string): number {
    const special = SPECIAL_FLOAT_PATTERN.exec(input);
    if (special) {
        if (special[2].toLowerCase() === 'nan') {
            return NaN;
        }
        return special[1] === '-' ? -Infinity : Infinity;
    }
    if (!FLOAT_PATTERN.test(input)) {
        throw new InvalidValueError(`invalid float "${input}"`, input);
    }
    return Number(input);
}

export function parseString(input: string): string {
    return input;
}

export function formatFloat(value: number): string {
    if (Number.isNaN(value)) return 'NaN';
    if (value === Infinity) return '+Inf';
    if (value === -Infinity) return '-Inf';
    return String(value);
}
