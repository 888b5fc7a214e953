/**
 * Field tag parsing.
 *
 * Tags are space-separated `key:"value"` tokens, e.g.
 * `view:"-" inactive:"+" desc:"explanatory text"`.
 * Values are the quoted substring and may contain spaces.
 */

import { warn } from '../core/dev.js';

export type TagSet = ReadonlyMap<string, string>;

const parsedTags = new Map<string, TagSet>();

const MAX_CACHED_TAG_STRINGS = 1000;

function isSpace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r';
}

/**
 * Parse a raw tag string into a key → value map.
 * Malformed tokens are skipped with a warning; duplicate keys keep the last value.
 */
export function parseTags(raw: string): TagSet {
  const cached = parsedTags.get(raw);
  if (cached) return cached;

  const tags = new Map<string, string>();
  let i = 0;

  while (i < raw.length) {
    while (i < raw.length && isSpace(raw[i])) i++;
    if (i >= raw.length) break;

    const start = i;
    while (i < raw.length && raw[i] !== ':' && !isSpace(raw[i])) i++;
    const key = raw.slice(start, i);

    if (raw[i] !== ':' || key.length === 0) {
      // Skip to the next whitespace-separated token.
      while (i < raw.length && !isSpace(raw[i])) i++;
      warn(`Malformed tag "${raw.slice(start, i)}" in \`${raw}\`: expected key:"value".`);
      continue;
    }
    i++;

    if (raw[i] !== '"') {
      while (i < raw.length && !isSpace(raw[i])) i++;
      warn(`Malformed tag "${raw.slice(start, i)}" in \`${raw}\`: value must be quoted.`);
      continue;
    }
    i++;

    const close = raw.indexOf('"', i);
    if (close === -1) {
      warn(`Malformed tag "${raw.slice(start)}" in \`${raw}\`: unterminated quote.`);
      break;
    }

    tags.set(key, raw.slice(i, close));
    i = close + 1;
  }

  if (parsedTags.size >= MAX_CACHED_TAG_STRINGS) parsedTags.clear();
  parsedTags.set(raw, tags);
  return tags;
}

/** Returns the value for `key`, or an empty string when absent. */
export function tagValue(tags: string | TagSet, key: string): string {
  const set = typeof tags === 'string' ? parseTags(tags) : tags;
  return set.get(key) ?? '';
}

/** Returns true if `key` is present with exactly `value`. */
export function hasTagValue(tags: string | TagSet, key: string, value: string): boolean {
  return tagValue(tags, key) === value;
}
