import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readdir, readFile, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { writeCatalogAtomic } from '../writer.js';
import { CatalogWriteError } from '../errors.js';
import { createRepo, removeRepo } from './helpers.js';

let root: string;

beforeEach(async () => {
    root = await createRepo();
});

afterEach(async () => {
    await removeRepo(root);
});

describe('writeCatalogAtomic', () => {
    it('creates the destination and leaves no temp file behind', async () => {
        const dest = path.join(root, 'marketplace.json');

        await writeCatalogAtomic(dest, '{"name":"m"}\n');

        expect(await readFile(dest, 'utf-8')).toBe('{"name":"m"}\n');
        expect(await readdir(root)).toEqual(['marketplace.json']);
    });

    it('replaces existing content', async () => {
        const dest = path.join(root, 'marketplace.json');
        await writeFile(dest, 'old', 'utf-8');

        await writeCatalogAtomic(dest, 'new');

        expect(await readFile(dest, 'utf-8')).toBe('new');
    });

    it('throws CatalogWriteError when the directory does not exist', async () => {
        const dest = path.join(root, 'missing', 'marketplace.json');

        await expect(writeCatalogAtomic(dest, '{}')).rejects.toBeInstanceOf(CatalogWriteError);
    });

    it('leaves the destination untouched and cleans up when the rename fails', async () => {
        // A non-empty directory cannot be replaced by a file
        const dest = path.join(root, 'marketplace.json');
        await mkdir(dest);
        await writeFile(path.join(dest, 'keep.txt'), 'keep', 'utf-8');

        const error = await writeCatalogAtomic(dest, '{}').catch((err: unknown) => err);

        expect(error).toBeInstanceOf(CatalogWriteError);
        expect(error).toMatchObject({ code: 'CATALOG_WRITE', file: dest });
        expect((await stat(dest)).isDirectory()).toBe(true);
        expect(await readFile(path.join(dest, 'keep.txt'), 'utf-8')).toBe('keep');
        expect(await readdir(root)).toEqual(['marketplace.json']);
    });
});
