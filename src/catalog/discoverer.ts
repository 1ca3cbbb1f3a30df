import type { Dirent } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';
import type { SynthConfig } from '../config/schema.js';
import { NoManifestsFoundError, RootNotReadableError } from './errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { compareBytes } from '../utils/sort.js';
import { displayPath, isManifestPath } from '../utils/paths.js';

/**
 * Manifest Discoverer — finds every `.claude-plugin/plugin.json` under the
 * repository root, except the catalog file itself.
 *
 * Directories listed in `config.ignore` are pruned and symlinked
 * directories are not followed; a symlinked manifest file is kept. The
 * returned paths are absolute and sorted, but later stages must not rely
 * on the order.
 */
export async function discoverManifests(config: SynthConfig, logger: Logger = silentLogger): Promise<string[]> {
    const root = path.resolve(config.root);
    await assertReadableDirectory(root);

    const catalogPath = path.resolve(config.catalogPath);
    const ignore = new Set(config.ignore);
    const found: string[] = [];

    const walk = async (dir: string): Promise<void> => {
        let entries: Dirent[];
        try {
            entries = await readdir(dir, { withFileTypes: true });
        } catch (err) {
            if (dir === root) throw new RootNotReadableError(root, err);
            logger.warn(`Cannot read ${displayPath(root, dir)}, skipping: ${err instanceof Error ? err.message : String(err)}`);
            return;
        }

        for (const entry of entries) {
            const full = path.join(dir, entry.name);

            if (entry.isDirectory()) {
                if (ignore.has(entry.name)) continue;
                await walk(full);
                continue;
            }

            if (!isManifestPath(full) || full === catalogPath) continue;

            if (entry.isFile() || (entry.isSymbolicLink() && await isLinkToFile(full))) {
                found.push(full);
            }
        }
    };

    // A symlinked manifest counts when its target is a regular file
    const isLinkToFile = async (link: string): Promise<boolean> => {
        try {
            return (await stat(link)).isFile();
        } catch (err) {
            logger.warn(`Cannot resolve ${displayPath(root, link)}, skipping: ${err instanceof Error ? err.message : String(err)}`);
            return false;
        }
    };

    await walk(root);

    if (found.length === 0) {
        throw new NoManifestsFoundError(root);
    }

    return found.sort(compareBytes);
}

async function assertReadableDirectory(root: string): Promise<void> {
    let isDirectory = false;
    try {
        isDirectory = (await stat(root)).isDirectory();
    } catch (err) {
        throw new RootNotReadableError(root, err);
    }
    if (!isDirectory) {
        throw new RootNotReadableError(root);
    }
}
