// Catalog Synthesizer — Public API Surface
export { createCLI } from './cli/index.js';
export { CatalogSynthesizer } from './catalog/synthesizer.js';
export { discoverManifests } from './catalog/discoverer.js';
export { normalizeManifest, normalizeAll, toCatalogEntry, isEmpty } from './catalog/normalizer.js';
export { assembleCatalog, readCatalogHeader } from './catalog/assembler.js';
export {
    detectChange,
    serializeCatalog,
    digest,
    parseVersion,
    formatVersion,
    bumpPatch,
    withVersion,
    DEFAULT_VERSION,
} from './catalog/versioner.js';
export { writeCatalogAtomic } from './catalog/writer.js';
export {
    CatalogError,
    RootNotReadableError,
    NoManifestsFoundError,
    ManifestParseError,
    MissingNameWarning,
    InvalidFieldWarning,
    DuplicateNameError,
    CatalogReadError,
    VersionFormatError,
    CatalogWriteError,
    ConfigError,
} from './catalog/errors.js';
export { ConfigLoader, resolveConfig } from './config/loader.js';
export { createLogger, silentLogger } from './logging/logger.js';

// Types
export type {
    Catalog,
    CatalogEntry,
    CatalogHeader,
    PluginManifest,
    NormalizedManifest,
    SynthesisResult,
    SynthesisStatus,
    Author,
    AuthorContact,
    Repository,
    RepositoryRef,
    ComponentRef,
} from './catalog/types.js';
export type { CatalogErrorCode, SynthesisWarning } from './catalog/errors.js';
export type { CollectedEntries, SynthesisPlan } from './catalog/synthesizer.js';
export type { PersistedCatalog } from './catalog/assembler.js';
export type { ChangeDecision, CatalogVersion } from './catalog/versioner.js';
export type { SynthConfig, ConfigFile } from './config/schema.js';
export type { ConfigOverrides } from './config/loader.js';
export type { Logger, LoggerOptions } from './logging/logger.js';
