import path from 'node:path';
import { MANIFEST_DIR, MANIFEST_FILE } from '../config/defaults.js';

/**
 * True for `<anything>/.claude-plugin/plugin.json`
 */
export function isManifestPath(filePath: string): boolean {
    return path.basename(filePath) === MANIFEST_FILE
        && path.basename(path.dirname(filePath)) === MANIFEST_DIR;
}

/**
 * Plugin directory owning a manifest (parent of `.claude-plugin/`)
 */
export function getPluginDir(manifestPath: string): string {
    return path.dirname(path.dirname(manifestPath));
}

/**
 * Catalog `source` for a plugin directory: `./` plus the root-relative
 * path with `/` separators. The root itself maps to `./.`.
 */
export function toSourcePath(root: string, pluginDir: string): string {
    const relative = path.relative(root, pluginDir) || '.';
    return `./${relative.split(path.sep).join('/')}`;
}

/**
 * Display path relative to the root, for diagnostics
 */
export function displayPath(root: string, filePath: string): string {
    return path.relative(root, filePath) || '.';
}
