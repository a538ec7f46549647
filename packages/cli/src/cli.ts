/**
 * Command line argument parsing for siteripper.
 */

import { Command } from 'commander';
import { VERSION } from '@siteripper/utils';
import { DEFAULT_JOB_FILE } from './config.js';
import { runMain } from './index.js';

/**
 * Options parsed from the command line.
 */
export interface CliOptions {
    /** Path of the JSON job file. */
    jobFile: string;
    /** Show debug and info messages. */
    verbose: boolean;
    /** Show the browser window; overrides `headless` in the job file. */
    headed: boolean;
    /** Skip the crawl; overrides `post_scrape_jobs_only`. */
    postScrapeOnly: boolean;
}

/**
 * Raw options as commander hands them to the action.
 */
interface RawCliOptions {
    verbose?: boolean;
    headed?: boolean;
    postScrapeOnly?: boolean;
}

export function toCliOptions(jobFile: string, raw: RawCliOptions): CliOptions {
    return {
        jobFile,
        verbose: raw.verbose || false,
        headed: raw.headed || false,
        postScrapeOnly: raw.postScrapeOnly || false,
    };
}

/**
 * Builds the commander program. The action runs the scrape and records its
 * exit code on the process.
 */
export function createProgram(): Command {
    const program = new Command();

    program
        .name('siteripper')
        .description(
            'Mirror the pages and media of a website as described by a job file',
        )
        .version(VERSION)
        .argument('[job-file]', 'Job configuration file', DEFAULT_JOB_FILE)
        .option('-v, --verbose', 'Enable verbose logging', false)
        .option('--headed', 'Show the browser window', false)
        .option(
            '--post-scrape-only',
            'Only apply the post-scrape jobs to pages already on disk',
            false,
        )
        .action(async (jobFile: string, opts: RawCliOptions) => {
            process.exitCode = await runMain(toCliOptions(jobFile, opts));
        });

    return program;
}

/**
 * Parses `argv` and runs the selected command.
 */
export async function parseArgs(argv: string[] = process.argv): Promise<void> {
    await createProgram().parseAsync(argv);
}
