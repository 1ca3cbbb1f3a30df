import path from 'node:path';

export const MANIFEST_DIR = '.claude-plugin';
export const MANIFEST_FILE = 'plugin.json';

export const DEFAULT_CATALOG_PATH = path.join(MANIFEST_DIR, 'marketplace.json');

export const DEFAULT_IGNORE: readonly string[] = ['.git'];

/** Looked up at the repository root in this order */
export const CONFIG_FILE_NAMES: readonly string[] = [
    'catalog-synth.config.yaml',
    'catalog-synth.config.yml',
    'catalog-synth.config.json',
];
