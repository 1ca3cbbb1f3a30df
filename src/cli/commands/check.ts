import { Command } from 'commander';
import { ConfigLoader } from '../../config/loader.js';
import { CatalogSynthesizer } from '../../catalog/synthesizer.js';
import { silentLogger } from '../../logging/logger.js';
import { displayPath } from '../../utils/paths.js';
import { Spinner } from '../ui/spinner.js';
import { renderFatal, renderWarnings } from '../ui/render.js';
import { addRunOptions, toOverrides, type RunOptions } from './options.js';

export function createCheckCommand(): Command {
    const cmd = new Command('check')
        .description('Exit non-zero when marketplace.json is out of date (for CI)');

    addRunOptions(cmd).action(async (opts: RunOptions) => {
        const spinner = new Spinner();
        try {
            const config = await new ConfigLoader(toOverrides(opts)).load();
            const shown = displayPath(config.root, config.catalogPath);

            spinner.start(`Checking ${shown}...`);
            const plan = await new CatalogSynthesizer(config, silentLogger).plan();

            if (plan.decision.changed) {
                spinner.fail(`${shown} is stale; regenerating would bump ${plan.decision.previousVersion ?? '(none)'} -> ${plan.decision.version}`);
                process.exitCode = 1;
            } else {
                spinner.success(`${shown} is up to date (${plan.catalog.plugins.length} plugins)`);
            }
            renderWarnings(plan.warnings);
        } catch (err) {
            spinner.stop();
            renderFatal(err);
        }
    });

    return cmd;
}
