#!/usr/bin/env node
/**
 * CLI entry point.
 *
 * Usage:  tsx tools/savetab.ts [input] [--infile F] [-o F] [--stream] [--encode] [--self-test]
 */

import { runCli } from '../src/cli.js';

runCli(process.argv.slice(2), { stdin: process.stdin, stdout: process.stdout, stderr: process.stderr })
    .then((code) => {
        process.exitCode = code;
    })
    .catch((e: unknown) => {
        console.error('[savetab] fatal:', e);
        process.exitCode = 3;
    });
