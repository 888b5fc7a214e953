// ── Tag Validation ──────────────────────────────────────────────────

import { warn } from '../core/dev.js';
import type { TagSet } from './tags.js';

const VALID_VIEW_VALUES = new Set(['', '-', 'inline']);
const VALID_FLAG_VALUES = new Set(['', '+', '-']);

function warnTag(field: string, message: string): void {
  warn(`field "${field}": ${message}`);
}

function isNumeric(raw: string): boolean {
  return raw.trim() !== '' && Number.isFinite(Number(raw));
}

/** Dev-mode checks for tag values; never throws, never alters the tags. */
export function validateFieldTags(field: string, tags: TagSet): void {
  const view = tags.get('view');
  if (view !== undefined && !VALID_VIEW_VALUES.has(view)) {
    warnTag(field, `"view" must be "-" or "inline", got "${view}"`);
  }
  const inactive = tags.get('inactive');
  if (inactive !== undefined && !VALID_FLAG_VALUES.has(inactive)) {
    warnTag(field, `"inactive" must be "+" or "-", got "${inactive}"`);
  }

  for (const key of ['min', 'max', 'step', 'width']) {
    const raw = tags.get(key);
    if (raw !== undefined && !isNumeric(raw)) {
      warnTag(field, `"${key}" expected a number, got "${raw}"`);
    }
  }

  const min = tags.get('min');
  const max = tags.get('max');
  if (min !== undefined && max !== undefined && isNumeric(min) && isNumeric(max) && Number(min) > Number(max)) {
    warnTag(field, `"min" (${min}) must not exceed "max" (${max})`);
  }
  const step = tags.get('step');
  if (step !== undefined && isNumeric(step) && Number(step) <= 0) {
    warnTag(field, `"step" must be > 0, got ${step}`);
  }
}

/** Parses a numeric tag value, or undefined when absent or invalid. */
export function numericTag(tags: TagSet, key: string): number | undefined {
  const raw = tags.get(key);
  if (raw === undefined || !isNumeric(raw)) return undefined;
  return Number(raw);
}
