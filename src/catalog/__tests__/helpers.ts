import { mkdtemp, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { resolveConfig, type ConfigOverrides } from '../../config/loader.js';
import type { SynthConfig } from '../../config/schema.js';
import type { Logger } from '../../logging/logger.js';

export async function createRepo(): Promise<string> {
    return mkdtemp(path.join(tmpdir(), 'catalog-synth-'));
}

export async function removeRepo(root: string): Promise<void> {
    await rm(root, { recursive: true, force: true });
}

export function manifestPathFor(root: string, pluginDir: string): string {
    return path.join(root, pluginDir, '.claude-plugin', 'plugin.json');
}

/**
 * Write `<root>/<pluginDir>/.claude-plugin/plugin.json`. Strings are written
 * verbatim so tests can produce malformed JSON.
 */
export async function writePlugin(root: string, pluginDir: string, manifest: unknown): Promise<string> {
    const file = manifestPathFor(root, pluginDir);
    await mkdir(path.dirname(file), { recursive: true });
    await writeFile(file, typeof manifest === 'string' ? manifest : JSON.stringify(manifest, null, 2), 'utf-8');
    return file;
}

export function catalogPathFor(root: string): string {
    return path.join(root, '.claude-plugin', 'marketplace.json');
}

export async function writeCatalog(root: string, catalog: unknown): Promise<string> {
    const file = catalogPathFor(root);
    await mkdir(path.dirname(file), { recursive: true });
    await writeFile(file, typeof catalog === 'string' ? catalog : JSON.stringify(catalog, null, 2) + '\n', 'utf-8');
    return file;
}

export async function readCatalog(root: string): Promise<string> {
    return readFile(catalogPathFor(root), 'utf-8');
}

export function configFor(root: string, overrides: ConfigOverrides = {}): SynthConfig {
    return resolveConfig({ ...overrides, root });
}

export interface RecordingLogger extends Logger {
    lines: string[];
}

export function recordingLogger(): RecordingLogger {
    const lines: string[] = [];
    return {
        lines,
        info: (message) => lines.push(`info: ${message}`),
        success: (message) => lines.push(`success: ${message}`),
        warn: (message) => lines.push(`warn: ${message}`),
        error: (message) => lines.push(`error: ${message}`),
        debug: (message) => lines.push(`debug: ${message}`),
    };
}
