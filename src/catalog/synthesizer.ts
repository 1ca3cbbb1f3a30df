import type { SynthConfig } from '../config/schema.js';
import type { Catalog, CatalogEntry, NormalizedManifest, SynthesisResult } from './types.js';
import type { SynthesisWarning } from './errors.js';
import { discoverManifests } from './discoverer.js';
import { normalizeAll } from './normalizer.js';
import { assembleCatalog, readCatalogHeader, type PersistedCatalog } from './assembler.js';
import { detectChange, type ChangeDecision } from './versioner.js';
import { writeCatalogAtomic } from './writer.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { displayPath } from '../utils/paths.js';

/**
 * Discovered and normalized manifests, before any catalog is involved
 */
export interface CollectedEntries {
    discovered: string[];
    normalized: NormalizedManifest[];
    entries: CatalogEntry[];
    warnings: SynthesisWarning[];
}

/**
 * Everything a run computes up to (but excluding) the write
 */
export interface SynthesisPlan extends CollectedEntries {
    persisted: PersistedCatalog;
    catalog: Catalog;
    decision: ChangeDecision;
}

/**
 * Catalog Synthesizer — runs discovery, normalization, assembly, change
 * detection and the atomic write, in that order. Any fatal error aborts
 * before the write.
 */
export class CatalogSynthesizer {
    constructor(
        private readonly config: SynthConfig,
        private readonly logger: Logger = silentLogger
    ) {}

    /**
     * Discover and normalize every plugin manifest
     */
    async collect(): Promise<CollectedEntries> {
        const { root } = this.config;
        const discovered = await discoverManifests(this.config, this.logger);
        this.logger.success(`Found ${discovered.length} plugin(s)`);

        const normalized = await normalizeAll(discovered, this.config);

        const entries: CatalogEntry[] = [];
        const warnings: SynthesisWarning[] = [];
        for (const result of normalized) {
            this.logger.debug(`Processing: ${displayPath(root, result.manifestPath)}`);
            for (const warning of result.warnings) {
                this.logger.warn(warning.message);
                warnings.push(warning);
            }
            if (result.entry) {
                this.logger.debug(`Added: ${result.entry.name}`);
                entries.push(result.entry);
            }
        }

        return { discovered, normalized, entries, warnings };
    }

    /**
     * Compute the new catalog and decide whether it differs from disk
     */
    async plan(): Promise<SynthesisPlan> {
        const persisted = await readCatalogHeader(this.config.catalogPath);
        const collected = await this.collect();
        const catalog = assembleCatalog(persisted.header, collected.entries);
        const decision = detectChange(persisted.raw, catalog);

        return { ...collected, persisted, catalog, decision };
    }

    /**
     * Full run. Writes only when content changed and this is not a dry run.
     */
    async run(): Promise<SynthesisResult> {
        const plan = await this.plan();
        const { decision } = plan;
        const catalogPath = this.config.catalogPath;
        const shown = displayPath(this.config.root, catalogPath);

        const base = {
            catalogPath,
            discovered: plan.discovered.length,
            entries: plan.catalog.plugins,
            warnings: plan.warnings,
        };

        if (!decision.changed) {
            this.logger.success(`No changes, ${shown} is up to date`);
            return { ...base, status: 'unchanged', previousVersion: decision.version, version: decision.version };
        }

        this.logger.info(`Content changed, incrementing patch version...`);
        this.logger.success(`Version: ${decision.previousVersion ?? '(none)'} -> ${decision.version}`);

        if (this.config.dryRun) {
            this.logger.info(`Dry run, ${shown} was not written`);
            return { ...base, status: 'dry-run', previousVersion: decision.previousVersion, version: decision.version };
        }

        await writeCatalogAtomic(catalogPath, decision.content);
        this.logger.success(`Successfully updated ${shown}`);
        this.logger.success(`Total plugins: ${plan.catalog.plugins.length}`);

        return { ...base, status: 'written', previousVersion: decision.previousVersion, version: decision.version };
    }
}
