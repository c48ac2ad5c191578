#!/usr/bin/env node
/**
 * CLI entry point.
 *
 * Usage:  tsx tools/vqh.ts <compress|decompress|inspect> ...
 */

import { runCli } from '../src/cli.js';

try {
    const code = await runCli(process.argv.slice(2), {
        stdout: (line) => console.log(line),
        stderr: (line) => console.error(line),
        env: process.env,
    });
    process.exitCode = code;
} catch (err: unknown) {
    console.error(err instanceof Error ? err.stack ?? err.message : String(err));
    process.exit(1);
}
