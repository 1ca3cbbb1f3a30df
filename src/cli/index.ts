import { Command } from 'commander';
import { createGenerateCommand } from './commands/generate.js';
import { createListCommand } from './commands/list.js';
import { createCheckCommand } from './commands/check.js';

export const VERSION = '0.1.0';

/**
 * Build the `catalog-synth` program. Running it without a subcommand
 * regenerates the catalog.
 */
export function createCLI(): Command {
    const program = new Command('catalog-synth')
        .description('Synthesize .claude-plugin/marketplace.json from the plugin manifests in a repository')
        .version(VERSION);

    program.addCommand(createGenerateCommand(), { isDefault: true });
    program.addCommand(createListCommand());
    program.addCommand(createCheckCommand());

    return program;
}
