// SPDX-FileCopyrightText: 2024 IEXEC BLOCKCHAIN TECH <contact@iex.ec>
// SPDX-License-Identifier: Apache-2.0

import * as fs from 'fs';
import { MemoryByteStream } from './byteStream';
import { ConfigurationError } from './errors';
import { stripWhitespace } from './headerRewriter';

export type LicenseHeaderOptions = {
    licenseFile?: string;
    /** Lines of the license file to skip. */
    start: number;
    /** Lines of the license file to copy. */
    num: number;
    /** Literal lines appended after the license excerpt. */
    add: string[];
};

/**
 * Build the canonical header: `num` trimmed lines of the license file after
 * skipping `start`, then the `add` lines as given. Reading past the end of
 * the license file yields empty lines.
 */
export function buildCanonicalHeader(options: LicenseHeaderOptions): Buffer[] {
    const header: Buffer[] = [];
    if (options.licenseFile !== undefined) {
        const license = new MemoryByteStream(readLicenseFile(options.licenseFile));
        for (let i = 0; i < options.start; i++) {
            license.readLine();
        }
        for (let i = 0; i < options.num; i++) {
            header.push(stripWhitespace(license.readLine()));
        }
    }
    for (const line of options.add) {
        header.push(Buffer.from(line, 'utf8'));
    }
    return header;
}

function readLicenseFile(licenseFile: string): Buffer {
    try {
        return fs.readFileSync(licenseFile);
    } catch (error) {
        throw new ConfigurationError(`Cannot read license file ${licenseFile}`, {
            cause: error,
        });
    }
}
