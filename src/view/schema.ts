/**
 * Field schemas
 *
 * A schema is the explicit, ordered list of editable fields of a bound type.
 * It is produced once per type and re-read on every `View.build()`, so a
 * view always reflects the fields the schema lists at that moment.
 *
 * Example:
 * ```ts
 * enum Mode { RED, GREEN, BLUE, ModeN }
 *
 * class Sim { count = 3; active = true; mode = Mode.RED; }
 *
 * defineSchema<Sim>('Sim')
 *   .field('count', 'min:"0" max:"10"')
 *   .field('active')
 *   .field('mode', { enum: enumType('Mode', Mode) })
 *   .register(Sim);
 * ```
 */

export type NumericKind = 'int' | 'float' | 'bigint';

export type EnumValue = string | number;

/** An ordered set of named choices. */
export interface EnumType {
  readonly name: string;
  /** Choice names in declaration order, without the count sentinel. */
  readonly names: readonly string[];
  readonly values: readonly EnumValue[];
  indexOf(value: unknown): number;
  valueAt(index: number): EnumValue | undefined;
}

export interface FieldDescriptor<T> {
  readonly name: string;
  /** Raw tag string (see `parseTags`). */
  readonly tags: string;
  readonly enum?: EnumType;
  /**
   * Forces the numeric subtype. When unset it is decided from the value at
   * build time, so a float field that currently holds a whole number (`rate = 1`)
   * is treated as `int`: step 1, edits truncated. Declare `numeric: 'float'` for
   * such fields.
   */
  readonly numeric?: NumericKind;
  get(target: T): unknown;
  set(target: T, value: unknown): void;
}

export interface Schema<T> {
  readonly name: string;
  readonly fields: readonly FieldDescriptor<T>[];
  field(name: string): FieldDescriptor<T> | undefined;
}

export interface FieldOptions<T> {
  tags?: string;
  enum?: EnumType;
  /** See `FieldDescriptor.numeric`. */
  numeric?: NumericKind;
  get?: (target: T) => unknown;
  set?: (target: T, value: unknown) => void;
}

type AnyConstructor = abstract new (...args: never[]) => object;

// ============================================================================
// Enums
// ============================================================================

/**
 * Build an `EnumType` from a TypeScript enum object or a plain name → value record.
 *
 * Numeric enums carry a reverse mapping (`0 → "RED"`); those keys are skipped.
 * A trailing member named `<name>N` is the conventional count sentinel and is
 * not offered as a choice.
 */
export function enumType(name: string, members: Readonly<Record<string, EnumValue>>): EnumType {
  const entries = Object.keys(members)
    .filter((key) => Number.isNaN(Number(key)))
    .map((key): [string, EnumValue] => [key, members[key]]);

  const last = entries[entries.length - 1];
  if (last && last[0] === `${name}N`) entries.pop();

  const names = entries.map(([key]) => key);
  const values = entries.map(([, value]) => value);

  return {
    name,
    names,
    values,
    indexOf: (value: unknown) => values.findIndex((candidate) => Object.is(candidate, value)),
    valueAt: (index: number) => (index >= 0 && index < values.length ? values[index] : undefined),
  };
}

// ============================================================================
// Schema builder
// ============================================================================

export class SchemaBuilder<T extends object> {
  private readonly descriptors: FieldDescriptor<T>[] = [];

  constructor(private readonly name: string) {}

  /** Add a field. A string argument is shorthand for `{ tags }`. */
  field<K extends keyof T & string>(name: K, options: string | FieldOptions<T> = {}): this {
    const opts: FieldOptions<T> = typeof options === 'string' ? { tags: options } : options;
    if (this.descriptors.some((d) => d.name === name)) {
      throw new Error(`[fieldview] Schema "${this.name}": field "${name}" declared twice.`);
    }

    this.descriptors.push({
      name,
      tags: opts.tags ?? '',
      enum: opts.enum,
      numeric: opts.numeric,
      get: opts.get ?? ((target: T) => target[name]),
      set: opts.set ?? ((target: T, value: unknown) => {
        Reflect.set(target, name, value);
      }),
    });
    return this;
  }

  build(): Schema<T> {
    const fields = [...this.descriptors];
    const byName = new Map(fields.map((d) => [d.name, d]));
    return {
      name: this.name,
      fields,
      field: (fieldName: string) => byName.get(fieldName),
    };
  }

  /** Build and register the schema for every instance of `ctor` (and subclasses). */
  register(ctor: AnyConstructor): Schema<T> {
    const schema = this.build();
    typeSchemas.set(ctor, schema);
    return schema;
  }
}

export function defineSchema<T extends object>(name: string): SchemaBuilder<T> {
  return new SchemaBuilder<T>(name);
}

// ============================================================================
// Lookup
// ============================================================================

const typeSchemas = new WeakMap<Function, Schema<object>>();
const instanceSchemas = new WeakMap<object, Schema<object>>();

/** Attach a schema to a single object, e.g. a plain object literal. */
export function bindSchema<T extends object>(target: T, schema: Schema<T>): T {
  instanceSchemas.set(target, schema);
  return target;
}

/**
 * Find the schema for a value: its own, else the nearest registered
 * constructor on its prototype chain. Non-objects have none.
 */
export function schemaOf(value: unknown): Schema<object> | undefined {
  if (value === null || typeof value !== 'object') return undefined;

  const own = instanceSchemas.get(value);
  if (own) return own;

  let proto: object | null = Object.getPrototypeOf(value);
  while (proto) {
    const schema = typeSchemas.get(proto.constructor);
    if (schema) return schema;
    proto = Object.getPrototypeOf(proto);
  }
  return undefined;
}

export function isBound(value: unknown): value is object {
  return schemaOf(value) !== undefined;
}
