/**
 * Masking of values that look like secrets, for log output.
 */

const SENSITIVE_KEY_PATTERNS = [
    /KEY/i, /SECRET/i, /PASSWORD/i, /TOKEN/i,
    /CREDENTIAL/i, /AUTH/i, /PRIVATE/i
];

const SENSITIVE_VALUE_PREFIXES = [
    'sk-', 'pk-', 'Bearer ', 'Basic ', 'eyJ'
];

let logMask = true;

if (typeof process !== 'undefined' && process.env.LAYERFLAG_LOG_MASK) {
    logMask = process.env.LAYERFLAG_LOG_MASK.toLowerCase() !== 'false';
}

export function setLogMask(enabled: boolean): void {
    logMask = enabled;
}

export function isSensitiveKey(key: string): boolean {
    return SENSITIVE_KEY_PATTERNS.some(p => p.test(key));
}

export function isSensitiveValue(value: string): boolean {
    if (!value) return false;
    return SENSITIVE_VALUE_PREFIXES.some(p => value.startsWith(p));
}

export function maskValue(key: string, value: string): string {
    if (!logMask || !value) {
        return value;
    }

    if (isSensitiveKey(key) || isSensitiveValue(value)) {
        return '[REDACTED]';
    }

    return value;
}
