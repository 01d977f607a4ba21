/**
 * Bundle Renderer - turns a GatherResult into the final Markdown or plain-text document.
 */

import { createRequire } from 'module';
import { basename } from 'path';
import type { FileVerdict } from './classify.js';
import type { GatherResult } from './gather.js';
import { renderTreeLines } from './tree.js';

export type BundleFormat = 'md' | 'txt';

export const BUNDLE_FORMATS: readonly BundleFormat[] = ['md', 'txt'];

export function isBundleFormat(value: string): value is BundleFormat {
    return BUNDLE_FORMATS.some(format => format === value);
}

export interface RenderOptions {
    /** Output format (default: md) */
    format?: BundleFormat;
    /** Label files with absolute paths instead of root-relative ones */
    absolutePaths?: boolean;
    /** Show empty directories in the tree (default: true) */
    showEmptyDirs?: boolean;
    /** Timestamp written in the header (default: now) */
    generatedAt?: Date;
}

interface LanguageTable {
    extensions: Map<string, string>;
    filenames: Map<string, string>;
}

const require = createRequire(import.meta.url);
const LANGUAGES = loadLanguageTable(require('../../data/languages.json'));

function toStringMap(value: unknown, key: string): Map<string, string> {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        throw new Error(`languages.json: "${key}" must be an object`);
    }
    const map = new Map<string, string>();
    for (const [name, language] of Object.entries(value)) {
        if (typeof language !== 'string') throw new Error(`languages.json: "${key}.${name}" must be a string`);
        map.set(name, language);
    }
    return map;
}

function loadLanguageTable(raw: unknown): LanguageTable {
    if (typeof raw !== 'object' || raw === null) {
        throw new Error('languages.json must contain an object');
    }
    return {
        extensions: toStringMap('extensions' in raw ? raw.extensions : undefined, 'extensions'),
        filenames: toStringMap('filenames' in raw ? raw.filenames : undefined, 'filenames'),
    };
}

/** Code fence language for a path; '' when unknown. */
export function languageFor(path: string): string {
    const name = basename(path);
    const byName = LANGUAGES.filenames.get(name);
    if (byName !== undefined) return byName;

    const dot = name.lastIndexOf('.');
    if (dot <= 0) return '';
    return LANGUAGES.extensions.get(name.slice(dot + 1).toLowerCase()) ?? '';
}

/** `YYYY-MM-DD HH:MM:SS` in local time. */
export function formatTimestamp(date: Date): string {
    const pad = (n: number) => String(n).padStart(2, '0');
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
        `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/** A backtick fence longer than any backtick run inside the text. */
export function fenceFor(text: string): string {
    let longest = 0;
    for (const match of text.matchAll(/`+/g)) {
        longest = Math.max(longest, match[0].length);
    }
    return '`'.repeat(Math.max(3, longest + 1));
}

export function renderBundle(result: GatherResult, options: RenderOptions = {}): string {
    return (options.format ?? 'md') === 'txt'
        ? renderText(result, options)
        : renderMarkdown(result, options);
}

function displayPath(verdict: FileVerdict, absolutePaths: boolean): string {
    return absolutePaths ? verdict.absolutePath : verdict.path;
}

function renderMarkdown(result: GatherResult, options: RenderOptions): string {
    const { absolutePaths = false, showEmptyDirs = true, generatedAt = new Date() } = options;
    const included = result.verdicts.filter(v => v.status === 'included').length;
    const out: string[] = [];

    out.push('# Context Bundle\n\n');
    out.push(`- **Root**: \`${result.root}\`\n`);
    out.push(`- **Generated**: ${formatTimestamp(generatedAt)}\n`);
    out.push(`- **Files included**: ${included}\n\n`);

    out.push('## Folder Tree\n\n```text\n');
    for (const line of renderTreeLines(result.tree, { showEmptyDirs })) {
        out.push(`${line}\n`);
    }
    out.push('```\n\n');

    out.push('## Files\n\n');
    for (const verdict of result.verdicts) {
        out.push(`### \`${displayPath(verdict, absolutePaths)}\`\n\n`);

        if (verdict.status !== 'included') {
            out.push(`[Skipped: ${verdict.reason}]\n\n`);
            continue;
        }

        if (verdict.decodeMode === 'fallback') {
            out.push(`> Decoded with replacement characters (not valid ${verdict.encoding})\n\n`);
        }

        const fence = fenceFor(verdict.text);
        out.push(`${fence}${languageFor(verdict.path)}\n`);
        out.push(verdict.text);
        if (!verdict.text.endsWith('\n')) out.push('\n');
        out.push(`${fence}\n\n`);
    }

    if (result.skippedEntries.length > 0) {
        out.push('## Skipped Entries\n\n');
        for (const entry of result.skippedEntries) {
            out.push(`- \`${entry.path}\`: ${entry.reason}\n`);
        }
        out.push('\n');
    }

    return out.join('');
}

function renderText(result: GatherResult, options: RenderOptions): string {
    const { absolutePaths = false, showEmptyDirs = true, generatedAt = new Date() } = options;
    const rule = '-'.repeat(80);
    const out: string[] = [];

    out.push('Context Bundle\n');
    out.push(`Root: ${result.root}\n`);
    out.push(`Generated: ${formatTimestamp(generatedAt)}\n`);
    out.push(`${'='.repeat(80)}\n\n`);

    out.push(`FOLDER TREE\n${rule}\n`);
    for (const line of renderTreeLines(result.tree, { showEmptyDirs })) {
        out.push(`${line}\n`);
    }
    out.push('\n');

    out.push(`FILES\n${rule}\n`);
    for (const verdict of result.verdicts) {
        const label = displayPath(verdict, absolutePaths);
        out.push(`--- BEGIN FILE: ${label} ---\n`);
        if (verdict.status !== 'included') {
            out.push(`[Skipped: ${verdict.reason}]\n`);
        } else {
            if (verdict.decodeMode === 'fallback') {
                out.push(`[Decoded with replacement characters (not valid ${verdict.encoding})]\n`);
            }
            out.push(verdict.text);
            if (!verdict.text.endsWith('\n')) out.push('\n');
        }
        out.push(`--- END FILE: ${label} ---\n\n`);
    }

    if (result.skippedEntries.length > 0) {
        out.push(`SKIPPED ENTRIES\n${rule}\n`);
        for (const entry of result.skippedEntries) {
            out.push(`${entry.path}: ${entry.reason}\n`);
        }
        out.push('\n');
    }

    return out.join('');
}
