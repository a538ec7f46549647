/**
 * Spinner registry for ora spinners.
 *
 * Log lines are written around the active spinners so they do not tear the
 * spinner line, and the spinners are cleared when the process is
 * interrupted.
 */

import type { Ora } from 'ora';
import chalk from 'chalk';
import type { VerboseLevel } from '@siteripper/types';

/**
 * Where a log line is written. Defaults to the console.
 */
export interface LogSink {
    out(line: string): void;
    err(line: string): void;
}

const consoleSink: LogSink = {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
};

function timestamp(now: Date): string {
    return (
        now.toLocaleTimeString('en-US', {
            hour12: false,
            hour: '2-digit',
            minute: '2-digit',
            second: '2-digit',
        }) +
        '.' +
        now.getMilliseconds().toString().padStart(3, '0')
    );
}

/**
 * Registry for ora spinners with synchronized logging.
 *
 * @example
 * ```typescript
 * const registry = new SpinnerRegistry();
 * registry.setupSignalHandlers();
 *
 * const spinner = ora('Crawling...').start();
 * registry.register(spinner);
 * registry.safeLog('Page skipped', 'warn');
 *
 * spinner.succeed('Done');
 * registry.cleanup();
 * ```
 */
export class SpinnerRegistry {
    private spinners: Set<Ora> = new Set();
    private signalHandlers: Array<() => void> = [];

    constructor(private readonly sink: LogSink = consoleSink) {}

    register(spinner: Ora) {
        this.spinners.add(spinner);
    }

    unregister(spinner: Ora) {
        this.spinners.delete(spinner);
    }

    /**
     * Writes a plain line to stdout, clearing the spinners around it.
     */
    print(message: string) {
        this.withSpinnersCleared(() => this.sink.out(message));
    }

    /**
     * Logs a timestamped message without interfering with active spinners.
     * Warnings and errors go to stderr, everything else to stdout.
     */
    safeLog(message: string, level: VerboseLevel = 'info') {
        const line = `[${timestamp(new Date())}] ${message}`;

        this.withSpinnersCleared(() => {
            switch (level) {
                case 'debug':
                    this.sink.out(chalk.gray(line));
                    break;
                case 'info':
                    this.sink.out(chalk.cyan(line));
                    break;
                case 'warn':
                    this.sink.err(chalk.yellow(line));
                    break;
                case 'error':
                    this.sink.err(chalk.red(line));
                    break;
            }
        });
    }

    private withSpinnersCleared(write: () => void) {
        // Clear spinner lines without stopping them (avoids flicker)
        for (const spinner of this.spinners) {
            if (spinner.isSpinning) {
                spinner.clear();
            }
        }

        write();

        for (const spinner of this.spinners) {
            if (spinner.isSpinning) {
                spinner.render();
            }
        }
    }

    /**
     * Clears the spinners and exits on SIGINT/SIGTERM. The persisted crawl
     * state lets the next run resume.
     */
    setupSignalHandlers() {
        const cleanup = () => {
            this.clearAll();
            process.exit(130);
        };

        process.on('SIGINT', cleanup);
        process.on('SIGTERM', cleanup);

        this.signalHandlers.push(() => {
            process.off('SIGINT', cleanup);
            process.off('SIGTERM', cleanup);
        });
    }

    clearAll() {
        for (const spinner of this.spinners) {
            spinner.clear();
        }
    }

    /**
     * Clears spinners and removes the signal handlers.
     */
    cleanup() {
        this.clearAll();
        this.signalHandlers.forEach((remove) => remove());
        this.signalHandlers = [];
    }
}
