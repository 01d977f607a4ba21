/**
 * CLI Config File Support
 *
 * One JSON file can hold every bundling option:
 * - Input (root, gitignore, useGitignore, preset, ignore, includeHidden, followSymlinks)
 * - Limits (maxFileSize, encoding)
 * - Output (output, stdout, format, absolutePaths, showEmptyDirs)
 * - Misc (quiet, verbose)
 *
 * All fields optional. Priority: CLI flags > config file > hardcoded defaults.
 */

import { readFileSync, existsSync } from 'fs';
import { resolve, dirname, isAbsolute } from 'path';
import { ConfigurationError } from '../context/errors.js';

/** Picked up from the working directory when --config is not given */
export const DEFAULT_CONFIG_FILE = 'ctxbundle.config.json';

export interface CliConfig {
    // Input
    root?: string;
    gitignore?: string;
    useGitignore?: boolean;
    preset?: string;
    ignore?: string[];
    includeHidden?: boolean;
    followSymlinks?: boolean;

    // Limits
    /** Bytes, or size text such as "500k" */
    maxFileSize?: number | string;
    encoding?: string;

    // Output
    output?: string;
    stdout?: boolean;
    format?: string;
    absolutePaths?: boolean;
    showEmptyDirs?: boolean;

    // Misc
    quiet?: boolean;
    verbose?: boolean;
}

// ── Validation helpers ──────────────────────────────────────────────────────

const KNOWN_KEYS = new Set<string>([
    'root', 'gitignore', 'useGitignore', 'preset', 'ignore', 'includeHidden', 'followSymlinks',
    'maxFileSize', 'encoding',
    'output', 'stdout', 'format', 'absolutePaths', 'showEmptyDirs',
    'quiet', 'verbose',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function assertString(obj: Record<string, unknown>, key: string): string {
    const val = obj[key];
    if (typeof val !== 'string') throw new ConfigurationError(`Config "${key}" must be a string`);
    return val;
}

function assertBoolean(obj: Record<string, unknown>, key: string): boolean {
    const val = obj[key];
    if (typeof val !== 'boolean') throw new ConfigurationError(`Config "${key}" must be a boolean`);
    return val;
}

function assertStringArray(obj: Record<string, unknown>, key: string): string[] {
    const val = obj[key];
    if (!Array.isArray(val)) throw new ConfigurationError(`Config "${key}" must be an array of strings`);
    const strings: string[] = [];
    for (const item of val) {
        if (typeof item !== 'string') throw new ConfigurationError(`Config "${key}" must be an array of strings`);
        strings.push(item);
    }
    return strings;
}

function assertSize(obj: Record<string, unknown>, key: string): number | string {
    const val = obj[key];
    if (typeof val === 'string') return val;
    if (typeof val === 'number' && Number.isSafeInteger(val) && val >= 0) return val;
    throw new ConfigurationError(`Config "${key}" must be a non-negative integer or a size string like "500k"`);
}

// ── Main loader ─────────────────────────────────────────────────────────────

/**
 * Load and validate a config file.
 *
 * - Resolves configPath relative to CWD
 * - Relative root/output/gitignore paths resolve from the config file's directory
 * - Throws ConfigurationError on a missing file, invalid JSON or a wrongly typed key
 */
export function loadConfig(configPath: string): CliConfig {
    const absolutePath = resolve(configPath);

    if (!existsSync(absolutePath)) {
        throw new ConfigurationError(`Config file not found: ${absolutePath}`);
    }

    let raw: string;
    try {
        raw = readFileSync(absolutePath, 'utf-8');
    } catch (error) {
        throw new ConfigurationError(`Failed to read config file: ${absolutePath}`, { cause: error });
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        throw new ConfigurationError(`Invalid JSON in config file: ${absolutePath}`, { cause: error });
    }

    if (!isRecord(parsed)) {
        throw new ConfigurationError(`Config file must contain a JSON object: ${absolutePath}`);
    }

    const unknownKeys = Object.keys(parsed).filter(k => !KNOWN_KEYS.has(k));
    if (unknownKeys.length > 0) {
        console.warn(`Warning: Unknown config keys ignored: ${unknownKeys.join(', ')}`);
    }

    const obj = parsed;
    const config: CliConfig = {};
    const configDir = dirname(absolutePath);
    const fromConfigDir = (p: string) => isAbsolute(p) ? p : resolve(configDir, p);

    // Input
    if (obj.root !== undefined) config.root = fromConfigDir(assertString(obj, 'root'));
    if (obj.gitignore !== undefined) config.gitignore = fromConfigDir(assertString(obj, 'gitignore'));
    if (obj.useGitignore !== undefined) config.useGitignore = assertBoolean(obj, 'useGitignore');
    if (obj.preset !== undefined) config.preset = assertString(obj, 'preset');
    if (obj.ignore !== undefined) config.ignore = assertStringArray(obj, 'ignore');
    if (obj.includeHidden !== undefined) config.includeHidden = assertBoolean(obj, 'includeHidden');
    if (obj.followSymlinks !== undefined) config.followSymlinks = assertBoolean(obj, 'followSymlinks');

    // Limits
    if (obj.maxFileSize !== undefined) config.maxFileSize = assertSize(obj, 'maxFileSize');
    if (obj.encoding !== undefined) config.encoding = assertString(obj, 'encoding');

    // Output
    if (obj.output !== undefined) config.output = fromConfigDir(assertString(obj, 'output'));
    if (obj.stdout !== undefined) config.stdout = assertBoolean(obj, 'stdout');
    if (obj.format !== undefined) config.format = assertString(obj, 'format');
    if (obj.absolutePaths !== undefined) config.absolutePaths = assertBoolean(obj, 'absolutePaths');
    if (obj.showEmptyDirs !== undefined) config.showEmptyDirs = assertBoolean(obj, 'showEmptyDirs');

    // Misc
    if (obj.quiet !== undefined) config.quiet = assertBoolean(obj, 'quiet');
    if (obj.verbose !== undefined) config.verbose = assertBoolean(obj, 'verbose');

    return config;
}

// ── Default template ────────────────────────────────────────────────────────

/**
 * Default config template for the `init` command.
 * Shows every available option with its default.
 */
export const CONFIG_TEMPLATE: CliConfig = {
    // Input
    root: '.',
    useGitignore: true,
    ignore: [],
    includeHidden: false,
    followSymlinks: false,

    // Limits
    maxFileSize: '1m',
    encoding: 'utf-8',

    // Output
    format: 'md',
    absolutePaths: false,
    showEmptyDirs: true,

    // Misc
    quiet: false,
    verbose: false,
};
