import { Command } from 'commander';
import type { ConfigOverrides } from '../../config/loader.js';

/**
 * Flags shared by every command that reads a repository
 */
export interface RunOptions {
    root?: string;
    catalog?: string;
    ignore?: string[];
    verbose?: boolean;
}

export function addRunOptions(cmd: Command): Command {
    return cmd
        .option('-r, --root <dir>', 'Repository root (default: current directory)')
        .option('-c, --catalog <path>', 'Catalog file, relative to the root (default: .claude-plugin/marketplace.json)')
        .option('--ignore <dir...>', 'Directory names to skip during discovery (default: .git)')
        .option('-v, --verbose', 'Print every manifest as it is processed');
}

export function toOverrides(opts: RunOptions & { dryRun?: boolean }): ConfigOverrides {
    return {
        root: opts.root,
        catalog: opts.catalog,
        ignore: opts.ignore,
        dryRun: opts.dryRun,
        verbose: opts.verbose,
    };
}
