import { createHash } from 'node:crypto';
import type { Catalog } from './types.js';
import { VersionFormatError } from './errors.js';

export const DEFAULT_VERSION = '1.0.0';

export interface CatalogVersion {
    major: number;
    minor: number;
    patch: number;
}

export type ChangeDecision =
    | {
        changed: false;
        /** Version already on disk, if it is a string */
        version?: string;
        content: string;
    }
    | {
        changed: true;
        previousVersion?: string;
        version: string;
        /** Serialized catalog carrying the bumped version */
        content: string;
    };

/**
 * Canonical on-disk form: insertion key order, two-space indent,
 * trailing newline. Byte-identical for equal input.
 */
export function serializeCatalog(catalog: Catalog): string {
    return JSON.stringify(catalog, null, 2) + '\n';
}

/**
 * SHA-256 hex digest of the UTF-8 bytes
 */
export function digest(content: string): string {
    return createHash('sha256').update(content, 'utf8').digest('hex');
}

/**
 * Parse `<major>.<minor>.<patch>`. A missing version counts as 1.0.0;
 * anything else that is not three decimal integers is rejected.
 */
export function parseVersion(value: unknown): CatalogVersion {
    if (value === undefined || value === null) {
        return parseVersion(DEFAULT_VERSION);
    }
    if (typeof value !== 'string') {
        throw new VersionFormatError(value, 'expected a string');
    }

    const parts = value.split('.');
    if (parts.length !== 3 || !parts.every(part => /^\d+$/.test(part))) {
        throw new VersionFormatError(value);
    }

    const [major, minor, patch] = parts.map(Number);
    if (![major, minor, patch].every(Number.isSafeInteger)) {
        throw new VersionFormatError(value, 'component exceeds the safe integer range');
    }
    return { major, minor, patch };
}

export function formatVersion(version: CatalogVersion): string {
    return `${version.major}.${version.minor}.${version.patch}`;
}

/**
 * Increment patch by one, leaving major and minor alone
 */
export function bumpPatch(version: CatalogVersion): CatalogVersion {
    const patch = version.patch + 1;
    if (!Number.isSafeInteger(patch)) {
        throw new VersionFormatError(formatVersion(version), 'patch component would overflow');
    }
    return { ...version, patch };
}

/**
 * Return the catalog with `version` set. An existing key keeps its
 * position; a new one goes last in the header, before `plugins`.
 */
export function withVersion(catalog: Catalog, version: string): Catalog {
    const { plugins, ...header } = catalog;
    return { ...header, version, plugins };
}

/**
 * Change Detector & Versioner.
 *
 * The new catalog is serialized with the old version and compared to the
 * file on disk by digest. Only when they differ is the patch bumped and
 * the catalog serialized again; comparing with the bumped version would
 * make every run look changed.
 */
export function detectChange(previousRaw: string, catalog: Catalog): ChangeDecision {
    const content = serializeCatalog(catalog);
    const currentVersion = typeof catalog.version === 'string' ? catalog.version : undefined;

    if (digest(content) === digest(previousRaw)) {
        return { changed: false, version: currentVersion, content };
    }

    const version = formatVersion(bumpPatch(parseVersion(catalog.version)));
    return {
        changed: true,
        previousVersion: currentVersion,
        version,
        content: serializeCatalog(withVersion(catalog, version)),
    };
}
