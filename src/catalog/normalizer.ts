import { readFile } from 'node:fs/promises';
import type { z } from 'zod';
import type { SynthConfig } from '../config/schema.js';
import {
    authorSchema,
    componentRefSchema,
    keywordsSchema,
    repositorySchema,
    textFieldSchema,
    type CatalogEntry,
    type NormalizedManifest,
    type PluginManifest,
} from './types.js';
import { InvalidFieldWarning, ManifestParseError, MissingNameWarning, type SynthesisWarning } from './errors.js';
import { getPluginDir, toSourcePath } from '../utils/paths.js';

type OptionalField = Exclude<keyof CatalogEntry, 'name' | 'source'>;

const EXPECT_TEXT = 'expected a string';
const EXPECT_AUTHOR = 'expected a string or an object with a "name"';
const EXPECT_REPOSITORY = 'expected a string or an object with a "url"';
const EXPECT_KEYWORDS = 'expected an array of strings';
const EXPECT_COMPONENT = 'expected a string, an array or an object';

/**
 * Manifest Normalizer — reads one plugin.json and projects it into a
 * catalog entry.
 *
 * Throws {@link ManifestParseError} for unreadable or syntactically invalid
 * files. A manifest without a usable name yields `entry: null` and a
 * {@link MissingNameWarning}.
 */
export async function normalizeManifest(manifestPath: string, config: SynthConfig): Promise<NormalizedManifest> {
    let content: string;
    try {
        content = await readFile(manifestPath, 'utf-8');
    } catch (err) {
        throw new ManifestParseError(manifestPath, `cannot read file (${describe(err)})`, err);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(content);
    } catch (err) {
        throw new ManifestParseError(manifestPath, describe(err), err);
    }

    if (!isRecord(parsed)) {
        throw new ManifestParseError(manifestPath, 'top-level value must be a JSON object');
    }

    return toCatalogEntry(parsed, manifestPath, config.root);
}

/**
 * Project an already-parsed manifest. `source` comes from where the
 * manifest sits on disk, never from its content.
 */
export function toCatalogEntry(manifest: PluginManifest, manifestPath: string, root: string): NormalizedManifest {
    const warnings: SynthesisWarning[] = [];

    const name = manifest['name'];
    if (typeof name !== 'string' || name.length === 0) {
        warnings.push(new MissingNameWarning(manifestPath));
        return { manifestPath, entry: null, warnings };
    }

    const read = <T>(field: OptionalField, schema: z.ZodType<T, z.ZodTypeDef, unknown>, expected: string): T | undefined => {
        const value = manifest[field];
        if (isEmpty(value)) return undefined;

        const result = schema.safeParse(value);
        if (!result.success) {
            warnings.push(new InvalidFieldWarning(manifestPath, field, expected));
            return undefined;
        }
        return result.data;
    };

    const entry: CatalogEntry = {
        name,
        source: toSourcePath(root, getPluginDir(manifestPath)),
    };

    // Assignment order is the key order in marketplace.json
    setField(entry, 'version', read('version', textFieldSchema, EXPECT_TEXT));
    setField(entry, 'description', read('description', textFieldSchema, EXPECT_TEXT));
    setField(entry, 'author', read('author', authorSchema, EXPECT_AUTHOR));
    setField(entry, 'license', read('license', textFieldSchema, EXPECT_TEXT));
    setField(entry, 'homepage', read('homepage', textFieldSchema, EXPECT_TEXT));
    setField(entry, 'repository', read('repository', repositorySchema, EXPECT_REPOSITORY));
    setField(entry, 'keywords', read('keywords', keywordsSchema, EXPECT_KEYWORDS));
    setField(entry, 'commands', read('commands', componentRefSchema, EXPECT_COMPONENT));
    setField(entry, 'agents', read('agents', componentRefSchema, EXPECT_COMPONENT));
    setField(entry, 'hooks', read('hooks', componentRefSchema, EXPECT_COMPONENT));
    setField(entry, 'mcpServers', read('mcpServers', componentRefSchema, EXPECT_COMPONENT));
    setField(entry, 'skills', read('skills', componentRefSchema, EXPECT_COMPONENT));

    return { manifestPath, entry, warnings };
}

/**
 * Normalize every manifest concurrently. Results keep the input order, and
 * when several files are broken the first one in that order is reported.
 */
export async function normalizeAll(manifestPaths: string[], config: SynthConfig): Promise<NormalizedManifest[]> {
    const settled = await Promise.allSettled(
        manifestPaths.map(manifestPath => normalizeManifest(manifestPath, config))
    );

    const results: NormalizedManifest[] = [];
    for (const outcome of settled) {
        if (outcome.status === 'rejected') throw outcome.reason;
        results.push(outcome.value);
    }
    return results;
}

/**
 * Absent, null, "", [] and {} all count as "not present"
 */
export function isEmpty(value: unknown): boolean {
    if (value === undefined || value === null) return true;
    if (typeof value === 'string' || Array.isArray(value)) return value.length === 0;
    if (isRecord(value)) return Object.keys(value).length === 0;
    return false;
}

function setField<K extends OptionalField>(entry: CatalogEntry, key: K, value: CatalogEntry[K]): void {
    if (value !== undefined) entry[key] = value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describe(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
