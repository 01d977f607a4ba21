/**
 * File Classifier - decides what happens to one candidate file:
 * included as text, or skipped as oversize, binary or unreadable.
 *
 * Order matters: the size check runs on stat alone, the binary sniff reads a
 * bounded prefix, and only files that pass both are read in full.
 */

import { closeSync, openSync, readFileSync, readSync, statSync, type Stats } from 'fs';
import { ConfigurationError, describeError } from './errors.js';

/** Bytes inspected by the binary sniff */
export const SNIFF_BYTES = 4096;

/** Share of control bytes above which a sample counts as binary */
export const BINARY_THRESHOLD = 0.3;

/** BEL, BS, TAB, LF, FF, CR, ESC: control bytes that still occur in text */
const TEXT_CONTROL_BYTES = new Set([7, 8, 9, 10, 12, 13, 27]);

export type DecodeMode = 'strict' | 'fallback';

export type DecodeResult =
    | { kind: 'decoded'; text: string; mode: DecodeMode; encoding: string }
    | { kind: 'failed'; cause: unknown };

interface VerdictBase {
    /** Relative to the walk root */
    readonly path: string;
    readonly absolutePath: string;
    /** Bytes on disk; 0 when the file could not be stat'ed */
    readonly size: number;
}

export interface IncludedVerdict extends VerdictBase {
    readonly status: 'included';
    readonly text: string;
    /** Canonical name of the encoding actually used */
    readonly encoding: string;
    /** 'fallback': undecodable sequences were replaced with U+FFFD */
    readonly decodeMode: DecodeMode;
}

export interface SkippedVerdict extends VerdictBase {
    readonly status: 'skipped-binary' | 'skipped-oversize' | 'skipped-unreadable';
    readonly reason: string;
    /** Underlying error for unreadable files */
    readonly cause?: unknown;
}

export type FileVerdict = IncludedVerdict | SkippedVerdict;

export type VerdictStatus = FileVerdict['status'];

export interface ClassifyOptions {
    /** Largest size in bytes that is still read */
    maxFileSize: number;
    /** WHATWG encoding label tried first */
    encoding: string;
}

/**
 * NUL anywhere in the sample means binary. Otherwise the sample is binary when
 * more than BINARY_THRESHOLD of it are control bytes outside TEXT_CONTROL_BYTES.
 */
export function sniffBinary(sample: Uint8Array): boolean {
    if (sample.length === 0) return false;

    let nonText = 0;
    for (const byte of sample) {
        if (byte === 0) return true;
        if (byte < 0x20 && !TEXT_CONTROL_BYTES.has(byte)) nonText++;
    }
    return nonText / sample.length > BINARY_THRESHOLD;
}

/**
 * Validate an encoding label before any file is read.
 * Returns the canonical name (e.g. 'latin1' -> 'windows-1252').
 */
export function assertEncoding(encoding: string): string {
    try {
        return new TextDecoder(encoding).encoding;
    } catch (error) {
        throw new ConfigurationError(`Unknown encoding: ${encoding}`, { cause: error });
    }
}

/** Strict decode first, then a replacing decode. Never throws. */
export function decodeText(bytes: Uint8Array, encoding: string): DecodeResult {
    const strict = tryDecode(bytes, encoding, true);
    if (strict.ok) return { kind: 'decoded', text: strict.text, mode: 'strict', encoding: strict.encoding };

    const lenient = tryDecode(bytes, encoding, false);
    if (lenient.ok) return { kind: 'decoded', text: lenient.text, mode: 'fallback', encoding: lenient.encoding };

    return { kind: 'failed', cause: lenient.error };
}

type Attempt = { ok: true; text: string; encoding: string } | { ok: false; error: unknown };

function tryDecode(bytes: Uint8Array, encoding: string, fatal: boolean): Attempt {
    try {
        const decoder = new TextDecoder(encoding, { fatal });
        return { ok: true, text: decoder.decode(bytes), encoding: decoder.encoding };
    } catch (error) {
        return { ok: false, error };
    }
}

export function classifyFile(
    entry: { path: string; absolutePath: string },
    options: ClassifyOptions
): FileVerdict {
    const { path, absolutePath } = entry;
    const { maxFileSize, encoding } = options;

    const skip = (status: SkippedVerdict['status'], size: number, reason: string, cause?: unknown): SkippedVerdict =>
        cause === undefined
            ? { path, absolutePath, size, status, reason }
            : { path, absolutePath, size, status, reason, cause };

    let stats: Stats;
    try {
        stats = statSync(absolutePath);
    } catch (error) {
        return skip('skipped-unreadable', 0, describeError(error), error);
    }

    if (!stats.isFile()) {
        return skip('skipped-unreadable', stats.size, 'not a regular file');
    }

    if (stats.size > maxFileSize) {
        return skip('skipped-oversize', stats.size, `${stats.size} bytes exceeds the ${maxFileSize} byte limit`);
    }

    let data: Buffer;
    try {
        if (stats.size <= SNIFF_BYTES) {
            data = readFileSync(absolutePath);
            if (sniffBinary(data.subarray(0, SNIFF_BYTES))) {
                return skip('skipped-binary', stats.size, 'binary content');
            }
        } else {
            if (sniffBinary(readPrefix(absolutePath, SNIFF_BYTES))) {
                return skip('skipped-binary', stats.size, 'binary content');
            }
            data = readFileSync(absolutePath);
        }
    } catch (error) {
        return skip('skipped-unreadable', stats.size, describeError(error), error);
    }

    // The file may have grown between stat and read
    if (data.length > maxFileSize) {
        return skip('skipped-oversize', data.length, `${data.length} bytes exceeds the ${maxFileSize} byte limit`);
    }

    const decoded = decodeText(data, encoding);
    if (decoded.kind === 'failed') {
        return skip('skipped-unreadable', data.length, `cannot decode as ${encoding}: ${describeError(decoded.cause)}`, decoded.cause);
    }

    return {
        path,
        absolutePath,
        size: data.length,
        status: 'included',
        text: decoded.text,
        encoding: decoded.encoding,
        decodeMode: decoded.mode,
    };
}

function readPrefix(absolutePath: string, length: number): Buffer {
    const fd = openSync(absolutePath, 'r');
    try {
        const buffer = Buffer.alloc(length);
        const bytesRead = readSync(fd, buffer, 0, length, 0);
        return buffer.subarray(0, bytesRead);
    } finally {
        closeSync(fd);
    }
}
