import { z } from 'zod';

/**
 * Optional project file (`catalog-synth.config.yaml`) at the repository root
 */
export const configFileSchema = z.object({
    /** Catalog location, relative to the repository root */
    catalog: z.string().min(1).optional(),
    /** Directory names never descended into during discovery */
    ignore: z.array(z.string().min(1)).optional(),
}).strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Resolved configuration threaded through every stage of a run
 */
export interface SynthConfig {
    /** Absolute repository root */
    root: string;
    /** Absolute path of marketplace.json */
    catalogPath: string;
    ignore: string[];
    /** Run every stage but never write */
    dryRun: boolean;
    verbose: boolean;
}
