/**
 * Tag suffix construction.
 */

import type { Tags } from '../types/index.js';

const EMPTY: Tags = [];

/**
 * Build the `|#tag1,tag2` suffix for a metric line.
 *
 * Constant tags come first, then call-site tags, each list in the order
 * given. Returns an empty string when there are no tags at all. Tag
 * content is written verbatim: a tag containing `,` or `|` corrupts the
 * line.
 */
export function formatTagSuffix(
  constantTags: Tags = EMPTY,
  callTags: Tags = EMPTY
): string {
  if (constantTags.length === 0 && callTags.length === 0) {
    return '';
  }
  return `|#${[...constantTags, ...callTags].join(',')}`;
}

/**
 * Turn the configured prefix into the string placed before every name
 */
export function formatPrefix(prefix?: string): string {
  return prefix ? `${prefix}.` : '';
}
