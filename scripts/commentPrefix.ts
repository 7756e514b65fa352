// SPDX-FileCopyrightText: 2024 IEXEC BLOCKCHAIN TECH <contact@iex.ec>
// SPDX-License-Identifier: Apache-2.0

import * as path from 'path';
import commentPrefixConfig, { type CommentPrefixConfig } from '../config/commentPrefixes';
import { ConfigurationError } from './errors';

/**
 * Comment marker for a file, looked up by base name first, then by extension.
 * @returns null when the file type is unknown
 */
export function getCommentPrefix(
    filepath: string,
    config: CommentPrefixConfig = commentPrefixConfig,
): string | null {
    const basename = path.basename(filepath);
    if (Object.hasOwn(config.filenames, basename)) {
        return config.filenames[basename];
    }
    const parts = basename.split('.');
    if (
        parts.length === 1 || // No "." in the filename
        (parts.length === 2 && parts[0] === '') // e.g. .bashrc
    ) {
        return null;
    }
    const extension = parts[parts.length - 1].toLowerCase();
    return Object.hasOwn(config.extensions, extension) ? config.extensions[extension] : null;
}

/**
 * Line prefix written before each header line: the comment marker and one
 * space. An explicit marker applies to every file.
 */
export function resolveLinePrefix(filepath: string, commentPrefix?: string): Buffer {
    const marker = commentPrefix ?? getCommentPrefix(filepath);
    if (marker === null) {
        throw new ConfigurationError(
            `Unknown comment prefix for ${filepath}, please pass --comment-prefix.`,
        );
    }
    return Buffer.from(`${marker} `, 'utf8');
}
