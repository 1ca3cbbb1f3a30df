import { Command } from 'commander';
import { ConfigLoader } from '../../config/loader.js';
import { CatalogSynthesizer } from '../../catalog/synthesizer.js';
import { silentLogger } from '../../logging/logger.js';
import { compareBytes } from '../../utils/sort.js';
import { Spinner } from '../ui/spinner.js';
import { renderEntries, renderFatal, renderWarnings } from '../ui/render.js';
import { addRunOptions, toOverrides, type RunOptions } from './options.js';

export function createListCommand(): Command {
    const cmd = new Command('list')
        .description('List the plugins that would appear in the catalog (writes nothing)');

    addRunOptions(cmd).action(async (opts: RunOptions) => {
        const spinner = new Spinner();
        try {
            const config = await new ConfigLoader(toOverrides(opts)).load();

            spinner.start('Discovering plugin manifests...');
            const collected = await new CatalogSynthesizer(config, silentLogger).collect();
            spinner.stop();

            const entries = [...collected.entries].sort((a, b) => compareBytes(a.name, b.name));
            renderEntries(entries);
            renderWarnings(collected.warnings);
        } catch (err) {
            spinner.stop();
            renderFatal(err);
        }
    });

    return cmd;
}
