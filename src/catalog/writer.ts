import { open, rename, unlink } from 'node:fs/promises';
import { randomBytes } from 'node:crypto';
import path from 'node:path';
import { CatalogWriteError } from './errors.js';

/**
 * Atomic Writer — replace the catalog without ever exposing a partial file.
 *
 * Content goes to a fresh temp file beside the destination (same volume),
 * is flushed to disk, then renamed over the destination in one step. On
 * any failure the temp file is removed and the destination is untouched.
 * A temp file that cannot be removed is named in the error.
 */
export async function writeCatalogAtomic(destination: string, content: string): Promise<void> {
    const dir = path.dirname(destination);
    const tmp = path.join(dir, `.${path.basename(destination)}.${randomBytes(6).toString('hex')}.tmp`);

    try {
        const handle = await open(tmp, 'wx');
        try {
            await handle.writeFile(content, 'utf-8');
            await handle.sync();
        } finally {
            await handle.close();
        }
        await rename(tmp, destination);
    } catch (err) {
        const leftover = await removeTemp(tmp);
        throw new CatalogWriteError(destination, err, leftover);
    }
}

/**
 * Remove the temp file. Returns its path when it could not be removed.
 */
async function removeTemp(tmp: string): Promise<string | undefined> {
    try {
        await unlink(tmp);
        return undefined;
    } catch (err) {
        // The temp file was never created or is already gone
        if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
        return tmp;
    }
}
