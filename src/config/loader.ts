import { readFile, access } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { configFileSchema, type ConfigFile, type SynthConfig } from './schema.js';
import { CONFIG_FILE_NAMES, DEFAULT_CATALOG_PATH, DEFAULT_IGNORE } from './defaults.js';
import { ConfigError } from '../catalog/errors.js';

/**
 * Values supplied on the command line (or by a library caller).
 * They win over the config file, which wins over the defaults.
 */
export interface ConfigOverrides {
    root?: string;
    catalog?: string;
    ignore?: string[];
    dryRun?: boolean;
    verbose?: boolean;
}

/**
 * Merge defaults, an already-parsed config file and overrides into a
 * fully resolved config. Relative paths resolve against the root, and the
 * root against the current directory.
 */
export function resolveConfig(overrides: ConfigOverrides = {}, file: ConfigFile = {}): SynthConfig {
    const root = path.resolve(overrides.root ?? process.cwd());
    const catalog = overrides.catalog ?? file.catalog ?? DEFAULT_CATALOG_PATH;

    return {
        root,
        catalogPath: path.resolve(root, catalog),
        ignore: [...(overrides.ignore ?? file.ignore ?? DEFAULT_IGNORE)],
        dryRun: overrides.dryRun ?? false,
        verbose: overrides.verbose ?? false,
    };
}

/**
 * Config Loader — finds and validates the optional project config file
 */
export class ConfigLoader {
    constructor(private overrides: ConfigOverrides = {}) {}

    /**
     * Resolve the full configuration for a run
     */
    async load(): Promise<SynthConfig> {
        const root = path.resolve(this.overrides.root ?? process.cwd());
        const configPath = await this.findConfigFile(root);
        const file = configPath ? await this.readConfigFile(configPath) : {};
        return resolveConfig({ ...this.overrides, root }, file);
    }

    /**
     * First config file present at the root, if any
     */
    async findConfigFile(root: string): Promise<string | null> {
        for (const name of CONFIG_FILE_NAMES) {
            const candidate = path.join(root, name);
            try {
                await access(candidate);
                return candidate;
            } catch {
                // Not present, try the next name
            }
        }
        return null;
    }

    /**
     * Parse and validate a config file. YAML is a superset of JSON, so one
     * parser covers both extensions.
     */
    async readConfigFile(filePath: string): Promise<ConfigFile> {
        const content = await readFile(filePath, 'utf-8');

        let parsed: unknown;
        try {
            parsed = parseYaml(content);
        } catch (err) {
            throw new ConfigError(filePath, [err instanceof Error ? err.message : String(err)]);
        }

        // An empty file parses to null
        const result = configFileSchema.safeParse(parsed ?? {});
        if (!result.success) {
            throw new ConfigError(
                filePath,
                result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            );
        }
        return result.data;
    }
}
