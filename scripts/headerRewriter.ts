// SPDX-FileCopyrightText: 2024 IEXEC BLOCKCHAIN TECH <contact@iex.ec>
// SPDX-License-Identifier: Apache-2.0

import { type ByteStream, FileByteStream } from './byteStream';

export const LF = Buffer.from('\n');
export const CRLF = Buffer.from('\r\n');

export type HeaderOptions = {
    /** Canonical header lines, without prefix or line ending. */
    header: Buffer[];
    /** Written before every header line, e.g. `# `. */
    prefix: Buffer;
    keepBefore: Buffer[];
    keepAfter: Buffer[];
};

/**
 * The leading region of a file, split the way the rewriter sees it.
 */
export type FileRegion = {
    lineEnding: Buffer;
    /** Keep-before lines, verbatim with their own line endings. */
    before: Buffer;
    /** Header lines with the prefix and surrounding whitespace removed. */
    observedHeader: Buffer[];
    /** Keep-after lines, verbatim with their own line endings. */
    after: Buffer;
    /** First line that is not part of the leading region, and everything after it. */
    remainder: Buffer;
};

export type LineKind = 'keep-before' | 'keep-after' | 'header' | 'body';

type ScanState = 'leading' | 'done';

// Same set as the ASCII whitespace of a byte-level strip.
const WHITESPACE = new Set([0x20, 0x09, 0x0a, 0x0d, 0x0b, 0x0c]);

export function startsWith(bytes: Buffer, prefix: Buffer): boolean {
    return bytes.length >= prefix.length && bytes.subarray(0, prefix.length).equals(prefix);
}

export function stripWhitespace(bytes: Buffer): Buffer {
    let start = 0;
    let end = bytes.length;
    while (start < end && WHITESPACE.has(bytes[start])) {
        start++;
    }
    while (end > start && WHITESPACE.has(bytes[end - 1])) {
        end--;
    }
    return bytes.subarray(start, end);
}

/**
 * Line ending of the file, taken from its first line only.
 */
export function detectLineEnding(firstLine: Buffer): Buffer {
    const ending = firstLine.subarray(Math.max(0, firstLine.length - CRLF.length));
    return ending.equals(CRLF) ? CRLF : LF;
}

/**
 * Keep prefixes are matched against the raw line and win over the comment
 * prefix. A keep-after line must also carry the comment prefix.
 */
export function classifyLine(
    line: Buffer,
    options: Pick<HeaderOptions, 'prefix' | 'keepBefore' | 'keepAfter'>,
): LineKind {
    if (options.keepBefore.some((keep) => startsWith(line, keep))) {
        return 'keep-before';
    }
    if (!startsWith(line, options.prefix)) {
        return 'body';
    }
    if (options.keepAfter.some((keep) => startsWith(line, keep))) {
        return 'keep-after';
    }
    return 'header';
}

/**
 * Read the leading region of the stream. Leaves the cursor at end of stream.
 */
export function scanRegion(
    stream: ByteStream,
    options: Pick<HeaderOptions, 'prefix' | 'keepBefore' | 'keepAfter'>,
): FileRegion {
    let line = stream.readLine();
    const lineEnding = detectLineEnding(line);
    const before: Buffer[] = [];
    const after: Buffer[] = [];
    const observedHeader: Buffer[] = [];

    let state: ScanState = 'leading';
    while (state === 'leading') {
        // An empty read is end of stream, whatever the prefixes are.
        const kind = line.length === 0 ? 'body' : classifyLine(line, options);
        switch (kind) {
            case 'keep-before':
                before.push(line);
                break;
            case 'keep-after':
                after.push(line);
                break;
            case 'header':
                observedHeader.push(stripWhitespace(line.subarray(options.prefix.length)));
                break;
            case 'body':
                state = 'done';
                break;
        }
        if (state === 'leading') {
            line = stream.readLine();
        }
    }

    return {
        lineEnding,
        before: Buffer.concat(before),
        observedHeader,
        after: Buffer.concat(after),
        remainder: Buffer.concat([line, stream.readRest()]),
    };
}

/**
 * A file conforms when its header lines equal the canonical ones and the
 * body, if any, is separated from them by a blank line.
 */
export function isConforming(region: FileRegion, header: Buffer[]): boolean {
    const sameHeader =
        region.observedHeader.length === header.length &&
        region.observedHeader.every((line, index) => line.equals(header[index]));
    return (
        sameHeader &&
        (region.remainder.length === 0 || startsWith(region.remainder, region.lineEnding))
    );
}

/**
 * Replace the content of the stream with the canonical header laid out
 * around the kept parts of `region`.
 */
export function writeRegion(
    stream: ByteStream,
    region: FileRegion,
    options: Pick<HeaderOptions, 'header' | 'prefix'>,
): void {
    stream.rewind();
    stream.truncate();
    stream.write(region.before);
    for (const line of options.header) {
        stream.write(Buffer.concat([options.prefix, line, region.lineEnding]));
    }
    if (region.after.length > 0) {
        stream.write(region.lineEnding);
        stream.write(region.after);
    }
    if (region.remainder.length > 0 && !startsWith(region.remainder, region.lineEnding)) {
        stream.write(region.lineEnding);
    }
    stream.write(region.remainder);
}

/**
 * Make the leading comment block of the stream match the canonical header.
 * @returns true when the stream was rewritten
 */
export function fixFile(stream: ByteStream, options: HeaderOptions): boolean {
    const region = scanRegion(stream, options);
    if (isConforming(region, options.header)) {
        return false;
    }
    writeRegion(stream, region, options);
    return true;
}

/**
 * Open `filepath` for reading and writing and run {@link fixFile} on it.
 */
export function fixPath(filepath: string, options: HeaderOptions): boolean {
    const stream = FileByteStream.open(filepath);
    try {
        return fixFile(stream, options);
    } finally {
        stream.close();
    }
}
