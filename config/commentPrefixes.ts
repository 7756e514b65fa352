// SPDX-FileCopyrightText: 2024 IEXEC BLOCKCHAIN TECH <contact@iex.ec>
// SPDX-License-Identifier: Apache-2.0

import commentPrefixesJson from './comment-prefixes.json';

/**
 * Comment markers, without the trailing space, keyed by lower-cased file
 * extension or by exact base name.
 */
export type CommentPrefixConfig = {
    extensions: { [extension: string]: string };
    filenames: { [basename: string]: string };
};

const commentPrefixConfig: CommentPrefixConfig = Object.freeze({
    extensions: Object.freeze({ ...commentPrefixesJson.extensions }),
    filenames: Object.freeze({ ...commentPrefixesJson.filenames }),
});

export default commentPrefixConfig;
