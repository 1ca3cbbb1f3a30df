/**
 * Catalog System — Errors
 *
 * Every condition the synthesizer reports extends {@link CatalogError}, so
 * callers can switch on `code` or use `instanceof`. Fatal errors are thrown
 * and abort the run before anything is written; warnings are collected in
 * the run result and never thrown.
 */

export type CatalogErrorCode =
    | 'ROOT_NOT_READABLE'
    | 'NO_MANIFESTS_FOUND'
    | 'MANIFEST_PARSE'
    | 'MISSING_NAME'
    | 'INVALID_FIELD'
    | 'DUPLICATE_NAME'
    | 'CATALOG_READ'
    | 'VERSION_FORMAT'
    | 'CATALOG_WRITE'
    | 'CONFIG_INVALID';

export class CatalogError extends Error {
    readonly code: CatalogErrorCode;
    readonly fatal: boolean;
    /** File the condition was found in, when there is one */
    readonly file?: string;

    constructor(code: CatalogErrorCode, message: string, options: { file?: string; fatal?: boolean; cause?: unknown } = {}) {
        super(message, { cause: options.cause });
        this.name = 'CatalogError';
        this.code = code;
        this.fatal = options.fatal ?? true;
        this.file = options.file;
    }
}

// ─── Fatal ───

export class RootNotReadableError extends CatalogError {
    constructor(root: string, cause?: unknown) {
        super('ROOT_NOT_READABLE', `Repository root is not a readable directory: ${root}`, { file: root, cause });
        this.name = 'RootNotReadableError';
    }
}

export class NoManifestsFoundError extends CatalogError {
    constructor(root: string) {
        super('NO_MANIFESTS_FOUND', `No plugin.json files found under ${root}`, { file: root });
        this.name = 'NoManifestsFoundError';
    }
}

export class ManifestParseError extends CatalogError {
    constructor(file: string, reason: string, cause?: unknown) {
        super('MANIFEST_PARSE', `Invalid plugin manifest at ${file}: ${reason}`, { file, cause });
        this.name = 'ManifestParseError';
    }
}

export class DuplicateNameError extends CatalogError {
    readonly pluginName: string;
    readonly sources: [string, string];

    constructor(pluginName: string, first: string, second: string) {
        super('DUPLICATE_NAME', `Duplicate plugin name "${pluginName}" declared by ${first} and ${second}`);
        this.name = 'DuplicateNameError';
        this.pluginName = pluginName;
        this.sources = [first, second];
    }
}

export class CatalogReadError extends CatalogError {
    constructor(file: string, reason: string, cause?: unknown) {
        super('CATALOG_READ', `Cannot read catalog at ${file}: ${reason}`, { file, cause });
        this.name = 'CatalogReadError';
    }
}

export class VersionFormatError extends CatalogError {
    readonly value: unknown;

    constructor(value: unknown, reason = 'expected "<major>.<minor>.<patch>" with decimal integer parts') {
        super('VERSION_FORMAT', `Invalid catalog version ${JSON.stringify(value)}: ${reason}`);
        this.name = 'VersionFormatError';
        this.value = value;
    }
}

export class CatalogWriteError extends CatalogError {
    /** Temp file left behind when cleanup also failed */
    readonly leftover?: string;

    constructor(file: string, cause: unknown, leftover?: string) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        const suffix = leftover ? ` (could not remove ${leftover})` : '';
        super('CATALOG_WRITE', `Failed to write catalog to ${file}: ${reason}${suffix}`, { file, cause });
        this.name = 'CatalogWriteError';
        this.leftover = leftover;
    }
}

export class ConfigError extends CatalogError {
    readonly issues: string[];

    constructor(file: string, issues: string[]) {
        super('CONFIG_INVALID', `Invalid configuration in ${file}:\n  - ${issues.join('\n  - ')}`, { file });
        this.name = 'ConfigError';
        this.issues = issues;
    }
}

// ─── Non-fatal ───

export class MissingNameWarning extends CatalogError {
    declare readonly file: string;

    constructor(file: string) {
        super('MISSING_NAME', `Plugin at ${file} has no name, skipping`, { file, fatal: false });
        this.name = 'MissingNameWarning';
    }
}

export class InvalidFieldWarning extends CatalogError {
    declare readonly file: string;
    readonly field: string;

    constructor(file: string, field: string, reason: string) {
        super('INVALID_FIELD', `Ignoring "${field}" in ${file}: ${reason}`, { file, fatal: false });
        this.name = 'InvalidFieldWarning';
        this.field = field;
    }
}

export type SynthesisWarning = MissingNameWarning | InvalidFieldWarning;
