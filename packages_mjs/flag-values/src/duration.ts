/**
 * Durations are held as milliseconds and written as unit sequences, e.g. "1h30m", "250ms", "1.5µs".
 */

import { InvalidValueError } from './errors.js';

const NS_PER_MS = 1e6;

// Milliseconds per unit.
const UNITS: Record<string, number> = {
    ns: 1e-6,
    us: 1e-3,
    'µs': 1e-3, // U+00B5 micro sign
    'μs': 1e-3, // U+03BC greek mu
    ms: 1,
    s: 1000,
    m: 60 * 1000,
    h: 60 * 60 * 1000
};

const SEGMENT = /^(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|μs|ms|s|m|h)/;
const NUMBER_ONLY = /^(\d+(?:\.\d*)?|\.\d+)$/;

export function parseDuration(input: string): number {
    let rest = input;
    let sign = 1;

    if (rest.startsWith('-') || rest.startsWith('+')) {
        sign = rest[0] === '-' ? -1 : 1;
        rest = rest.slice(1);
    }

    if (rest === '0') {
        return 0;
    }
    if (rest === '') {
        throw new InvalidValueError(`invalid duration "${input}"`, input);
    }

    let total = 0;
    while (rest.length > 0) {
        const match = SEGMENT.exec(rest);
        if (!match) {
            if (NUMBER_ONLY.test(rest)) {
                throw new InvalidValueError(`missing unit in duration "${input}"`, input);
            }
            throw new InvalidValueError(`invalid duration "${input}"`, input);
        }
        total += Number(match[1]) * UNITS[match[2]];
        rest = rest.slice(match[0].length);
    }

    return sign * total;
}

export function formatDuration(ms: number): string {
    let ns = Math.round(ms * NS_PER_MS);
    if (ns === 0) {
        return '0s';
    }

    const negative = ns < 0;
    if (negative) {
        ns = -ns;
    }

    let text: string;
    if (ns < 1e3) {
        text = `${ns}ns`;
    } else if (ns < 1e6) {
        text = `${fixed(ns, 1e3)}µs`;
    } else if (ns < 1e9) {
        text = `${fixed(ns, 1e6)}ms`;
    } else {
        const hours = Math.floor(ns / 3.6e12);
        ns -= hours * 3.6e12;
        const minutes = Math.floor(ns / 6e10);
        ns -= minutes * 6e10;
        const seconds = fixed(ns, 1e9);

        if (hours > 0) {
            text = `${hours}h${minutes}m${seconds}s`;
        } else if (minutes > 0) {
            text = `${minutes}m${seconds}s`;
        } else {
            text = `${seconds}s`;
        }
    }

    return negative ? `-${text}` : text;
}

function fixed(n: number, unit: number): string {
    const whole = Math.floor(n / unit);
    const fraction = n - whole * unit;
    if (fraction === 0) {
        return String(whole);
    }
    const digits = String(unit).length - 1;
    return `${whole}.${String(fraction).padStart(digits, '0').replace(/0+$/, '')}`;
}
