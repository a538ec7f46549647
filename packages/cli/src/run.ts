#!/usr/bin/env node
/**
 * Executable entry point for the `siteripper` command.
 *
 * @packageDocumentation
 */
import { main } from './index.js';

main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
