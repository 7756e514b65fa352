#!/usr/bin/env node
// SPDX-FileCopyrightText: 2024 IEXEC BLOCKCHAIN TECH <contact@iex.ec>
// SPDX-License-Identifier: Apache-2.0

/**
 * Pre-commit hook entry point: rewrites the initial comment block of each
 * given file to the license header built from the command line.
 *
 * Exits with 1 when at least one file was rewritten. Usage and
 * configuration errors exit with 2.
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import kleur from 'kleur';
import { resolveLinePrefix } from '../scripts/commentPrefix';
import { checkCopyrightYears, formatCopyrightWarning } from '../scripts/copyrightYear';
import { fixPath } from '../scripts/headerRewriter';
import { buildCanonicalHeader } from '../scripts/licenseHeader';

export const EXIT_UNMODIFIED = 0;
export const EXIT_MODIFIED = 1;
export const EXIT_ERROR = 2;

export type FixLicenseHeaderOptions = {
    licenseFile?: string;
    start: number;
    num: number;
    add: string[];
    keepBefore: string[];
    keepAfter: string[];
    commentPrefix?: string;
};

export type Output = Pick<Console, 'log' | 'error'>;

export type RunOptions = {
    output?: Output;
    currentYear?: number;
};

function parseCount(value: string): number {
    if (!/^\d+$/.test(value)) {
        throw new InvalidArgumentError('Not a non-negative integer.');
    }
    return Number(value);
}

function collect(value: string, previous: string[]): string[] {
    return previous.concat([value]);
}

export function createProgram(output: Output): Command {
    return new Command()
        .name('fix-license-header')
        .description('Fixes the license headers in files.')
        .option('--license-file <path>', 'License file to read')
        .option('--start <n>', 'Number of lines to ignore', parseCount, 0)
        .option('--num <n>', 'Number of lines to read', parseCount, 1)
        .option(
            '--add <line>',
            'Line to add after the license file [can specify multiple times]',
            collect,
            [],
        )
        .option(
            '--keep-before <prefix>',
            'Keep lines starting with this before the header [can specify multiple times]',
            collect,
            [],
        )
        .option(
            '--keep-after <prefix>',
            'Keep lines that start with this after the header [can specify multiple times]',
            collect,
            [],
        )
        .option(
            '--comment-prefix <string>',
            'Comment prefix (default: inferred from each file extension)',
        )
        .argument('<filenames...>', 'Filenames to fix')
        .exitOverride()
        .configureOutput({
            writeOut: (str) => output.log(str.trimEnd()),
            writeErr: (str) => output.error(str.trimEnd()),
        });
}

/**
 * Fix every file named on the command line, in order.
 * Configuration and I/O errors are thrown to the caller.
 * @param argv arguments without the node executable and script path
 * @returns process exit status
 */
export function run(argv: string[], runOptions: RunOptions = {}): number {
    const output = runOptions.output ?? console;
    const program = createProgram(output);
    try {
        program.parse(argv, { from: 'user' });
    } catch (error) {
        if (error instanceof CommanderError) {
            return error.exitCode === 0 ? EXIT_UNMODIFIED : EXIT_ERROR;
        }
        throw error;
    }
    const options = program.opts<FixLicenseHeaderOptions>();
    const filenames = program.args;

    const header = buildCanonicalHeader(options);
    for (const warning of checkCopyrightYears(header, runOptions.currentYear)) {
        output.error(kleur.yellow(formatCopyrightWarning(warning)));
    }
    const keepBefore = options.keepBefore.map((prefix) => Buffer.from(prefix, 'utf8'));
    const keepAfter = options.keepAfter.map((prefix) => Buffer.from(prefix, 'utf8'));
    // Resolve every prefix first so an unknown file type aborts before any write.
    const prefixes = filenames.map((filename) =>
        resolveLinePrefix(filename, options.commentPrefix),
    );

    let status = EXIT_UNMODIFIED;
    filenames.forEach((filename, index) => {
        const modified = fixPath(filename, {
            header,
            prefix: prefixes[index],
            keepBefore,
            keepAfter,
        });
        if (modified) {
            status = EXIT_MODIFIED;
            output.log(`Updated license header in ${filename}`);
        }
    });
    return status;
}

if (require.main === module) {
    (async function () {
        process.exitCode = run(process.argv.slice(2));
    })().catch((error) => {
        console.error(kleur.red(error instanceof Error ? error.message : String(error)));
        process.exitCode = EXIT_ERROR;
    });
}
