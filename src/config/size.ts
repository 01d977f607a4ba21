import { ConfigurationError } from '../context/errors.js';

const SIZE_FACTORS: Record<string, number> = {
    k: 1024,
    m: 1024 * 1024,
    g: 1024 * 1024 * 1024,
};

/**
 * Parse a size like `500k`, `2m`, `1.5g` or `4096` into bytes (floored).
 * Empty input returns `fallback`.
 */
export function parseSize(text: string | undefined, fallback: number): number {
    if (text === undefined) return fallback;
    const s = text.trim().toLowerCase();
    if (!s) return fallback;

    const match = /^(\d+(?:\.\d+)?|\.\d+)([kmg])?b?$/.exec(s);
    if (!match) {
        throw new ConfigurationError(`Invalid size value: "${text}"`);
    }

    const factor = match[2] ? SIZE_FACTORS[match[2]] : 1;
    const bytes = Math.floor(Number(match[1]) * factor);
    if (!Number.isSafeInteger(bytes)) {
        throw new ConfigurationError(`Invalid size value: "${text}"`);
    }
    return bytes;
}
