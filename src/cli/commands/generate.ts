import { Command } from 'commander';
import chalk from 'chalk';
import { ConfigLoader } from '../../config/loader.js';
import { CatalogSynthesizer } from '../../catalog/synthesizer.js';
import { createLogger } from '../../logging/logger.js';
import { renderFatal } from '../ui/render.js';
import { addRunOptions, toOverrides, type RunOptions } from './options.js';

export function createGenerateCommand(): Command {
    const cmd = new Command('generate')
        .description('Regenerate marketplace.json from every plugin.json in the repository')
        .option('--dry-run', 'Compute the catalog and report, but do not write it');

    addRunOptions(cmd).action(async (opts: RunOptions & { dryRun?: boolean }) => {
        try {
            const config = await new ConfigLoader(toOverrides(opts)).load();
            const logger = createLogger({ verbose: config.verbose });

            logger.info(chalk.yellow('Generating marketplace.json from discovered plugins...'));
            await new CatalogSynthesizer(config, logger).run();
        } catch (err) {
            renderFatal(err);
        }
    });

    return cmd;
}
