import { z } from 'zod';
import type { SynthesisWarning } from './errors.js';

/**
 * Catalog System — Types
 *
 * A marketplace repository holds many plugins, each described by its own
 * `.claude-plugin/plugin.json`. The catalog (`.claude-plugin/marketplace.json`
 * at the repository root) lists all of them in one document.
 */

// ─── Manifest field variants ───

/** Free-text fields (`version`, `description`, `license`, `homepage`) */
export const textFieldSchema = z.string();

// zod object schemas rebuild objects in shape order; records keep the
// author's key order, so structured variants are records narrowed by a guard.

export interface AuthorContact {
    name: string;
    email?: string;
    url?: string;
    [key: string]: unknown;
}

export interface RepositoryRef {
    type?: string;
    url: string;
    [key: string]: unknown;
}

const optionalString = (value: unknown) => value === undefined || typeof value === 'string';

/** `author` is either a plain string or a structured contact */
export const authorSchema = z.union([
    z.string(),
    z.record(z.string(), z.unknown()).refine(
        (value): value is AuthorContact => typeof value['name'] === 'string'
            && optionalString(value['email'])
            && optionalString(value['url'])
    ),
]);

/** `repository` is either a URL string or `{ type, url }` */
export const repositorySchema = z.union([
    z.string(),
    z.record(z.string(), z.unknown()).refine(
        (value): value is RepositoryRef => typeof value['url'] === 'string' && optionalString(value['type'])
    ),
]);

export const keywordsSchema = z.array(z.string());

/**
 * Component references (`commands`, `agents`, `hooks`, `mcpServers`, `skills`).
 * Their inner shape belongs to the plugin runtime, so any string, list or
 * object is accepted and copied as-is.
 */
export const componentRefSchema = z.union([
    z.string(),
    z.array(z.unknown()),
    z.record(z.string(), z.unknown()),
]);

export type Author = z.infer<typeof authorSchema>;
export type Repository = z.infer<typeof repositorySchema>;
export type ComponentRef = z.infer<typeof componentRefSchema>;

/**
 * Plugin manifest (plugin.json) as authored. Only `name` is required;
 * anything else may be missing or malformed and is checked per field
 * by the normalizer.
 */
export type PluginManifest = Record<string, unknown>;

// ─── Catalog ───

/**
 * Catalog-facing projection of one plugin manifest
 */
export interface CatalogEntry {
    /** Unique plugin name */
    name: string;
    /** Repository-relative plugin directory, always `./`-prefixed */
    source: string;
    version?: string;
    description?: string;
    author?: Author;
    license?: string;
    homepage?: string;
    repository?: Repository;
    keywords?: string[];
    commands?: ComponentRef;
    agents?: ComponentRef;
    hooks?: ComponentRef;
    mcpServers?: ComponentRef;
    skills?: ComponentRef;
}

/**
 * Everything in marketplace.json except `plugins`. Unknown keys are kept
 * in their original order.
 */
export interface CatalogHeader {
    name: string;
    owner: Record<string, unknown>;
    /** Read back as-is; the versioner decides whether it is well-formed */
    version?: unknown;
    [key: string]: unknown;
}

export const catalogHeaderSchema = z.record(z.string(), z.unknown()).refine(
    (value): value is CatalogHeader => typeof value['name'] === 'string'
        && value['name'].length > 0
        && typeof value['owner'] === 'object'
        && value['owner'] !== null
        && !Array.isArray(value['owner']),
    { message: 'expected a non-empty string "name" and an object "owner"' }
);

export type Catalog = CatalogHeader & {
    plugins: CatalogEntry[];
};

// ─── Pipeline results ───

/**
 * A normalized manifest together with where it came from
 */
export interface NormalizedManifest {
    /** Absolute path of the plugin.json */
    manifestPath: string;
    /** null when the manifest was skipped */
    entry: CatalogEntry | null;
    warnings: SynthesisWarning[];
}

export type SynthesisStatus = 'written' | 'unchanged' | 'dry-run';

/**
 * Outcome of a full synthesis run
 */
export interface SynthesisResult {
    status: SynthesisStatus;
    catalogPath: string;
    /** Version recorded in the catalog before this run (undefined if none) */
    previousVersion?: string;
    /** Version the catalog carries after this run */
    version?: string;
    /** Number of manifests discovered on disk */
    discovered: number;
    entries: CatalogEntry[];
    warnings: SynthesisWarning[];
}
