/**
 * Builtin ignore sources: the always-on defaults and the named presets.
 */

/** Lowest-precedence rules, applied to every run (VCS metadata, editor and OS junk). */
export const DEFAULT_IGNORES: readonly string[] = [
    '.git/',
    '.svn/',
    '.hg/',
    '.DS_Store',
    'Thumbs.db',
    '.idea/',
    '.vscode/',
    '*.exe',
    '*.dll',
    '*.bin',
];

export const PRESETS = {
    python: [
        '__pycache__/',
        '*.py[cod]',
        '.mypy_cache/',
        '.pytest_cache/',
        '.tox/',
        '.venv/',
        'venv/',
        'env/',
        'build/',
        'dist/',
        '*.egg-info/',
    ],
    node: [
        'node_modules/',
        'dist/',
        'build/',
        '.next/',
        '.nuxt/',
        '.cache/',
        'coverage/',
        '*.log',
    ],
} as const satisfies Record<string, readonly string[]>;

export type PresetName = keyof typeof PRESETS;

export const PRESET_NAMES: readonly PresetName[] = ['python', 'node'];

export function isPresetName(name: string): name is PresetName {
    return PRESET_NAMES.some(preset => preset === name);
}

/** Look up a preset by name (case-insensitive); undefined when there is none. */
export function getPreset(name: string): readonly string[] | undefined {
    const key = name.trim().toLowerCase();
    return isPresetName(key) ? PRESETS[key] : undefined;
}
