/**
 * ctxbundle CLI
 *
 * Bundle a directory tree and its text files into one Markdown or plain-text document.
 */

import { Command } from 'commander';
import { existsSync, writeFileSync } from 'fs';
import { join, resolve } from 'path';
import { createRequire } from 'module';
import { loadConfig, CONFIG_TEMPLATE, DEFAULT_CONFIG_FILE, type CliConfig } from './config/config.js';
import { parseSize } from './config/size.js';
import {
    ConfigurationError,
    DEFAULT_ENCODING,
    DEFAULT_MAX_FILE_SIZE,
    gatherContext,
    isBundleFormat,
    PRESET_NAMES,
    renderBundle,
    type BundleFormat,
    type GatherOptions,
} from './context/index.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

/** Options as commander hands them over */
export interface RawCliOptions {
    root?: string;
    output?: string;
    stdout?: boolean;
    format?: string;
    /** A path, or false for --no-gitignore */
    gitignore?: string | false;
    preset?: string;
    ignore: string[];
    includeHidden?: boolean;
    followSymlinks?: boolean;
    maxFileSize?: string;
    encoding?: string;
    absolutePaths?: boolean;
    hideEmptyDirs?: boolean;
    config?: string;
    quiet?: boolean;
    verbose?: boolean;
}

export interface BundleOptions {
    root: string;
    /** Undefined: auto-named file in the working directory */
    output?: string;
    stdout: boolean;
    format: BundleFormat;
    gather: GatherOptions;
    absolutePaths: boolean;
    showEmptyDirs: boolean;
    quiet: boolean;
    verbose: boolean;
}

function collect(value: string, previous: string[]): string[] {
    return [...previous, value];
}

/**
 * Merge CLI flags over config values over defaults, validating the parts
 * that can be checked without touching the tree.
 */
export function resolveBundleOptions(cli: RawCliOptions, config: CliConfig = {}): BundleOptions {
    const format = cli.format ?? config.format ?? 'md';
    if (!isBundleFormat(format)) {
        throw new ConfigurationError(`Invalid format "${format}". Must be "md" or "txt".`);
    }

    let maxFileSize: number;
    if (cli.maxFileSize !== undefined) {
        maxFileSize = parseSize(cli.maxFileSize, DEFAULT_MAX_FILE_SIZE);
    } else if (typeof config.maxFileSize === 'number') {
        maxFileSize = config.maxFileSize;
    } else {
        maxFileSize = parseSize(config.maxFileSize, DEFAULT_MAX_FILE_SIZE);
    }

    const verbose = cli.verbose ?? config.verbose ?? false;

    return {
        root: cli.root ?? config.root ?? '.',
        output: cli.output ?? config.output,
        stdout: cli.stdout ?? config.stdout ?? false,
        format,
        gather: {
            gitignorePath: typeof cli.gitignore === 'string' ? cli.gitignore : config.gitignore,
            useGitignore: cli.gitignore === false ? false : (config.useGitignore ?? true),
            preset: cli.preset ?? config.preset,
            // CLI patterns come last so they win over the config file's
            extraPatterns: [...(config.ignore ?? []), ...cli.ignore],
            includeHidden: cli.includeHidden ?? config.includeHidden ?? false,
            followSymlinks: cli.followSymlinks ?? config.followSymlinks ?? false,
            maxFileSize,
            encoding: cli.encoding ?? config.encoding ?? DEFAULT_ENCODING,
            verbose,
        },
        absolutePaths: cli.absolutePaths ?? config.absolutePaths ?? false,
        showEmptyDirs: cli.hideEmptyDirs ? false : (config.showEmptyDirs ?? true),
        quiet: cli.quiet ?? config.quiet ?? false,
        verbose,
    };
}

/** `ctxbundle-<unix seconds>.<md|txt>` in the given directory. */
export function defaultOutputPath(format: BundleFormat, now: Date, cwd: string = process.cwd()): string {
    return join(cwd, `ctxbundle-${Math.floor(now.getTime() / 1000)}.${format}`);
}

function readConfigFor(cli: RawCliOptions): CliConfig {
    if (cli.config !== undefined) return loadConfig(cli.config);
    const implicit = resolve(DEFAULT_CONFIG_FILE);
    return existsSync(implicit) ? loadConfig(implicit) : {};
}

export function buildProgram(): Command {
    const program = new Command();

    program
        .name('ctxbundle')
        .description('Bundle a directory tree and its text files into one Markdown or plain-text file')
        .version(pkg.version)
        .option('-r, --root <dir>', 'Root directory to bundle (default: .)')
        .option('-o, --output <file>', 'Output file path (default: ctxbundle-<timestamp>.<ext>)')
        .option('--stdout', 'Write to stdout instead of a file')
        .option('-f, --format <type>', 'Output format: md, txt (default: md)')
        .option('--gitignore <file>', 'Path to a .gitignore to respect (default: <root>/.gitignore)')
        .option('--no-gitignore', 'Do not respect .gitignore even if present')
        .option('-p, --preset <name>', `Ignore preset: ${PRESET_NAMES.join(', ')}`)
        .option('-i, --ignore <pattern>', 'Extra ignore pattern (repeatable)', collect, [])
        .option('--include-hidden', 'Include dotfiles and dot-directories')
        .option('--follow-symlinks', 'Follow symlinks')
        .option('--max-file-size <size>', 'Skip files larger than SIZE, e.g. 500k, 2m (default: 1m)')
        .option('--encoding <name>', 'Text encoding (default: utf-8)')
        .option('--absolute-paths', 'Use absolute paths in file headers')
        .option('--hide-empty-dirs', 'Leave empty directories out of the tree')
        .option('-c, --config <file>', `Config file (default: ./${DEFAULT_CONFIG_FILE} when present)`)
        .option('-q, --quiet', 'Reduce log output')
        .option('--verbose', 'Verbose output')
        .action((cli: RawCliOptions) => {
            let quiet = cli.quiet ?? false;
            try {
                const options = resolveBundleOptions(cli, readConfigFor(cli));
                quiet = options.quiet;

                const result = gatherContext(options.root, options.gather);
                const content = renderBundle(result, {
                    format: options.format,
                    absolutePaths: options.absolutePaths,
                    showEmptyDirs: options.showEmptyDirs,
                });

                if (options.stdout) {
                    process.stdout.write(content);
                    return;
                }

                const outputPath = resolve(options.output ?? defaultOutputPath(options.format, new Date()));
                writeFileSync(outputPath, content, 'utf-8');
                if (!quiet) {
                    console.log(`Wrote ${outputPath}`);
                }
            } catch (error) {
                if (!quiet) {
                    console.error(`error: ${error instanceof Error ? error.message : String(error)}`);
                }
                process.exitCode = 1;
            }
        });

    /**
     * Init command - create a starter config file
     */
    program
        .command('init')
        .description('Create a starter config file')
        .argument('[path]', 'Output path for config file', DEFAULT_CONFIG_FILE)
        .action((outputPath: string) => {
            try {
                const absolutePath = resolve(outputPath);
                if (existsSync(absolutePath)) {
                    console.error(`Error: File already exists: ${absolutePath}`);
                    console.error('Delete it first or choose a different path.');
                    process.exitCode = 1;
                    return;
                }
                const content = JSON.stringify(CONFIG_TEMPLATE, null, 2) + '\n';
                writeFileSync(absolutePath, content, 'utf-8');
                console.log(`Created config file: ${absolutePath}`);
                console.log(`Use it with: ctxbundle --config ${outputPath}`);
            } catch (error) {
                console.error('Error:', error instanceof Error ? error.message : error);
                process.exitCode = 1;
            }
        });

    return program;
}
