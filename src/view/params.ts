/**
 * Parameter sheets.
 *
 * Applies `Type.Field` / `Type.Sub.Field` = "value" assignments to a bound
 * object, coercing each string to the type of the field's current value.
 */

import { info, warn } from '../core/dev.js';
import { parseNumeric } from './dispatch.js';
import { schemaOf, type FieldDescriptor } from './schema.js';

export interface ParamSel {
  /** Selector label, kept for readability of sheets; not interpreted. */
  sel?: string;
  desc?: string;
  /** Path (first segment names the target type) → value. */
  params: Readonly<Record<string, string>>;
}

export type ParamSheet = readonly ParamSel[];

export interface ApplyParamsOptions {
  /** Log every assignment. */
  setMsg?: boolean;
}

interface FieldAccess {
  get(): unknown;
  set(value: unknown): void;
  descriptor?: FieldDescriptor<object>;
}

function fieldAccess(target: object, field: string): FieldAccess | undefined {
  const schema = schemaOf(target);
  if (schema) {
    const descriptor = schema.field(field);
    if (!descriptor) return undefined;
    return {
      get: () => descriptor.get(target),
      set: (value) => descriptor.set(target, value),
      descriptor,
    };
  }
  if (!(field in target)) return undefined;
  return {
    get: () => Reflect.get(target, field),
    set: (value) => {
      Reflect.set(target, field, value);
    },
  };
}

type Coerced = { ok: true; value: unknown } | { ok: false; reason: string };

function coerce(current: unknown, raw: string, descriptor: FieldDescriptor<object> | undefined): Coerced {
  if (descriptor?.enum) {
    const type = descriptor.enum;
    const byName = type.names.indexOf(raw);
    if (byName >= 0) return { ok: true, value: type.values[byName] };
    const byValue = type.values.findIndex((v) => String(v) === raw);
    if (byValue >= 0) return { ok: true, value: type.values[byValue] };
    return { ok: false, reason: `"${raw}" is not a member of ${type.name}` };
  }

  if (typeof current === 'boolean') {
    if (raw === 'true' || raw === 'false') return { ok: true, value: raw === 'true' };
    return { ok: false, reason: `"${raw}" is not a boolean` };
  }

  if (typeof current === 'number' || typeof current === 'bigint') {
    const numeric =
      typeof current === 'bigint'
        ? 'bigint'
        : descriptor?.numeric ?? (Number.isInteger(current) ? 'int' : 'float');
    const value = parseNumeric(raw, numeric);
    if (value === undefined) return { ok: false, reason: `"${raw}" is not a valid ${numeric}` };
    return { ok: true, value };
  }

  return { ok: true, value: raw };
}

function setParam(target: object, path: string, raw: string): boolean {
  const segments = path.split('.').slice(1);
  if (segments.length === 0) {
    warn(`applyParams: "${path}" has no field part (expected Type.Field).`);
    return false;
  }

  let obj: object = target;
  for (let i = 0; i < segments.length; i++) {
    const access = fieldAccess(obj, segments[i]);
    if (!access) {
      warn(`applyParams: field "${segments[i]}" of "${path}" not found.`);
      return false;
    }

    const current = access.get();
    if (i < segments.length - 1) {
      if (current === null || typeof current !== 'object') {
        warn(`applyParams: "${segments[i]}" of "${path}" is not an object.`);
        return false;
      }
      obj = current;
      continue;
    }

    const coerced = coerce(current, raw, access.descriptor);
    if (!coerced.ok) {
      warn(`applyParams: ${path}: ${coerced.reason}.`);
      return false;
    }
    access.set(coerced.value);
  }
  return true;
}

/** Apply every param of every selection. Returns the number of fields set. */
export function applyParams(target: object, sheet: ParamSheet, options: ApplyParamsOptions = {}): number {
  let count = 0;
  for (const sel of sheet) {
    for (const [path, raw] of Object.entries(sel.params)) {
      if (!setParam(target, path, raw)) continue;
      count++;
      if (options.setMsg) info(`Field named: ${path} set to value: ${raw}`);
    }
  }
  return count;
}
