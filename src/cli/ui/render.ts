import chalk from 'chalk';
import type { CatalogEntry } from '../../catalog/types.js';
import { CatalogError, type SynthesisWarning } from '../../catalog/errors.js';

/**
 * Render catalog entries as the `list` command shows them
 */
export function renderEntries(entries: CatalogEntry[]): void {
    console.log(chalk.bold(`\n🔌 Catalog Entries (${entries.length})\n`));

    for (const entry of entries) {
        const version = entry.version ? chalk.dim(` v${entry.version}`) : '';
        console.log(`  ${chalk.cyan.bold(entry.name)}${version} ${chalk.dim(entry.source)}`);
        if (entry.description) {
            console.log(`    ${entry.description}`);
        }

        const parts: string[] = [];
        if (entry.commands) parts.push('commands');
        if (entry.agents) parts.push('agents');
        if (entry.hooks) parts.push('hooks');
        if (entry.mcpServers) parts.push('mcpServers');
        if (entry.skills) parts.push('skills');
        if (parts.length > 0) {
            console.log(chalk.dim(`    Provides: ${parts.join(', ')}`));
        }
        console.log();
    }
}

/**
 * Render non-fatal warnings collected during a run
 */
export function renderWarnings(warnings: SynthesisWarning[]): void {
    if (warnings.length === 0) return;
    console.log(chalk.yellow.bold(`  ${warnings.length} warning(s)`));
    for (const warning of warnings) {
        console.log(chalk.yellow(`  ⚠ ${warning.message}`));
    }
    console.log();
}

/**
 * Print a fatal error and mark the process as failed
 */
export function renderFatal(err: unknown): void {
    const message = err instanceof Error ? err.message : String(err);
    const code = err instanceof CatalogError ? chalk.dim(` [${err.code}]`) : '';
    console.error(chalk.red(`\n✗ ${message}`) + code + '\n');
    process.exitCode = 1;
}
