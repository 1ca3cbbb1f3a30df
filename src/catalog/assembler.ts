import { readFile } from 'node:fs/promises';
import { catalogHeaderSchema, type Catalog, type CatalogEntry, type CatalogHeader } from './types.js';
import { CatalogReadError, DuplicateNameError } from './errors.js';
import { compareBytes } from '../utils/sort.js';

/**
 * The catalog as it currently sits on disk
 */
export interface PersistedCatalog {
    /** Exact file content, used for change detection */
    raw: string;
    /** Every top-level key except `plugins`, in file order */
    header: CatalogHeader;
}

/**
 * Read the existing marketplace.json and split off its header
 */
export async function readCatalogHeader(catalogPath: string): Promise<PersistedCatalog> {
    let raw: string;
    try {
        raw = await readFile(catalogPath, 'utf-8');
    } catch (err) {
        const missing = err instanceof Error && 'code' in err && err.code === 'ENOENT';
        const reason = missing ? 'file not found' : err instanceof Error ? err.message : String(err);
        throw new CatalogReadError(catalogPath, reason, err);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (err) {
        throw new CatalogReadError(catalogPath, err instanceof Error ? err.message : String(err), err);
    }

    // JSON.parse keeps "__proto__" as an own key, but copying it into a
    // plain object would set the prototype and lose it
    if (typeof parsed === 'object' && parsed !== null && Object.hasOwn(parsed, '__proto__')) {
        throw new CatalogReadError(catalogPath, 'top-level key "__proto__" is not supported');
    }

    const result = catalogHeaderSchema.safeParse(parsed);
    if (!result.success) {
        throw new CatalogReadError(catalogPath, result.error.issues[0]?.message ?? 'expected a JSON object');
    }

    const { plugins: _previous, ...header } = result.data;
    return { raw, header };
}

/**
 * Catalog Assembler — combine the header with a freshly derived entry list.
 *
 * Entries are sorted by name (byte-wise) and must be unique. The header
 * is copied untouched; `plugins` is always replaced wholesale and placed
 * last.
 */
export function assembleCatalog(header: CatalogHeader, entries: CatalogEntry[]): Catalog {
    const byName = new Map<string, CatalogEntry>();
    for (const entry of entries) {
        const existing = byName.get(entry.name);
        if (existing) {
            throw new DuplicateNameError(entry.name, existing.source, entry.source);
        }
        byName.set(entry.name, entry);
    }

    const plugins = [...entries].sort((a, b) => compareBytes(a.name, b.name));
    const { plugins: _stale, ...rest } = header;

    return { ...rest, plugins };
}
