// SPDX-FileCopyrightText: 2024 IEXEC BLOCKCHAIN TECH <contact@iex.ec>
// SPDX-License-Identifier: Apache-2.0

// "Copyright 2024", "Copyright (c) 2021-2024", "copyright © 2021 - 2024",
// "SPDX-FileCopyrightText: 2024 ...", ...
const COPYRIGHT_PATTERN = /copyright(?:text)?:?\s*(?:\(c\)\s*|©\s*)?(\d{4})(?:\s*-\s*(\d{4}))?/i;

export type CopyrightWarning = {
    line: string;
    year: number;
    currentYear: number;
};

/**
 * Find header lines whose copyright year (the end of a range) is not the
 * current year. Advisory only.
 */
export function checkCopyrightYears(
    header: Buffer[],
    currentYear: number = new Date().getFullYear(),
): CopyrightWarning[] {
    const warnings: CopyrightWarning[] = [];
    for (const bytes of header) {
        const line = bytes.toString('utf8');
        const match = COPYRIGHT_PATTERN.exec(line);
        if (!match) {
            continue;
        }
        const year = Number(match[2] ?? match[1]);
        if (year !== currentYear) {
            warnings.push({ line, year, currentYear });
        }
    }
    return warnings;
}

export function formatCopyrightWarning(warning: CopyrightWarning): string {
    return (
        `Warning: copyright year ${warning.year} in header line "${warning.line}" ` +
        `does not match current year ${warning.currentYear}`
    );
}
