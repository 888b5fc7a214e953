/**
 * Type dispatch: decides how a field is edited from its current value.
 *
 * Order matters, first match wins:
 *   1  bool    → checkbox
 *   2  enum    → combo box of choice names
 *   3  native  → toolkit value view, or a button opening the toolkit's editor
 *   4  nested  → inline child view, or a button opening a child view dialog
 *   5  number  → spin box (int | float | bigint)
 *   6  text    → text field holding String(value), edits stored as raw strings
 *
 * The result is computed once per field at build time and cached in the
 * field binding.
 */

import { hasTagValue, type TagSet } from './tags.js';
import { schemaOf, type EnumType, type FieldDescriptor, type NumericKind } from './schema.js';
import { numericTag } from './validate.js';
import { formatNumber } from './format.js';

export interface NumberKind {
  kind: 'number';
  numeric: NumericKind;
  step: number;
  min?: number;
  max?: number;
  format: string;
}

export type FieldKind =
  | { kind: 'bool' }
  | { kind: 'enum'; type: EnumType }
  | { kind: 'native' }
  | { kind: 'nested'; inline: boolean }
  | NumberKind
  | { kind: 'text'; width?: number };

export type FieldKindName = FieldKind['kind'];

const DEFAULT_FLOAT_STEP = 0.1;

function numericKindOf(value: number | bigint, descriptor: FieldDescriptor<object>): NumericKind {
  if (typeof value === 'bigint') return 'bigint';
  if (descriptor.numeric === 'float' || descriptor.numeric === 'int') return descriptor.numeric;
  return Number.isInteger(value) ? 'int' : 'float';
}

export function classifyField(
  value: unknown,
  descriptor: FieldDescriptor<object>,
  tags: TagSet,
  isNative: (value: unknown) => boolean
): FieldKind {
  if (typeof value === 'boolean') {
    return { kind: 'bool' };
  }

  if (descriptor.enum) {
    return { kind: 'enum', type: descriptor.enum };
  }

  if (isNative(value)) {
    return { kind: 'native' };
  }

  if (schemaOf(value)) {
    return { kind: 'nested', inline: hasTagValue(tags, 'view', 'inline') };
  }

  if (typeof value === 'number' || typeof value === 'bigint') {
    const numeric = numericKindOf(value, descriptor);
    return {
      kind: 'number',
      numeric,
      step: numericTag(tags, 'step') ?? (numeric === 'float' ? DEFAULT_FLOAT_STEP : 1),
      min: numericTag(tags, 'min'),
      max: numericTag(tags, 'max'),
      format: tags.get('format') ?? '',
    };
  }

  return { kind: 'text', width: numericTag(tags, 'width') };
}

/** Whether `value` can still be shown by a widget built for `kind`. */
export function kindAccepts(kind: FieldKind, value: unknown): boolean {
  switch (kind.kind) {
    case 'bool':
      return typeof value === 'boolean';
    case 'enum':
      return kind.type.indexOf(value) >= 0;
    case 'number':
      return typeof value === 'number' || typeof value === 'bigint';
    case 'native':
    case 'nested':
    case 'text':
      return true;
  }
}

/** Text shown in a spin box for `value`. */
export function displayNumber(kind: NumberKind, value: number | bigint): string {
  return formatNumber(kind.format, value);
}

const NUMBER_TOKEN = /[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?/;
const INTEGER_TOKEN = /-?\d+/;

/**
 * Parse spin box text back into the field's numeric subtype.
 * Returns undefined for text that is not a number; `int` truncates.
 *
 * With a `format`, the text around the number (`"12.5 ms"`, `"50%"`) is
 * dropped and the first numeric token is parsed.
 */
export function parseNumeric(text: string, numeric: NumericKind, format = ''): number | bigint | undefined {
  let trimmed = text.trim();
  if (format && trimmed !== '') {
    const token = (numeric === 'bigint' ? INTEGER_TOKEN : NUMBER_TOKEN).exec(trimmed);
    if (!token) return undefined;
    trimmed = token[0];
  }
  if (trimmed === '') return undefined;

  if (numeric === 'bigint') {
    if (!/^-?\d+$/.test(trimmed)) return undefined;
    return BigInt(trimmed);
  }

  const parsed = Number(trimmed);
  if (!Number.isFinite(parsed)) return undefined;
  return numeric === 'int' ? Math.trunc(parsed) : parsed;
}
