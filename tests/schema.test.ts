import { test } from 'node:test';
import assert from 'node:assert/strict';

import { bindSchema, defineSchema, enumType, isBound, schemaOf } from '../src/view/schema.js';

enum Mode {
  RED,
  GREEN,
  BLUE,
  ModeN,
}

enum Shape {
  Circle = 'circle',
  Square = 'square',
}

class Sim {
  count = 3;
  active = true;
  mode = Mode.RED;
}

class SubSim extends Sim {
  extra = 'x';
}

const simSchema = defineSchema<Sim>('Sim')
  .field('count', 'min:"0" max:"10"')
  .field('active')
  .field('mode', { enum: enumType('Mode', Mode) })
  .register(Sim);

// ─── enums ──────────────────────────────────────────────────────────────────

test('enumType drops reverse mappings and the trailing count sentinel', () => {
  const mode = enumType('Mode', Mode);

  assert.deepEqual(mode.names, ['RED', 'GREEN', 'BLUE']);
  assert.deepEqual(mode.values, [0, 1, 2]);
  assert.equal(mode.indexOf(Mode.BLUE), 2);
  assert.equal(mode.indexOf(Mode.ModeN), -1);
  assert.equal(mode.valueAt(1), Mode.GREEN);
  assert.equal(mode.valueAt(3), undefined);
  assert.equal(mode.valueAt(-1), undefined);
});

test('enumType keeps string enums as declared', () => {
  const shape = enumType('Shape', Shape);

  assert.deepEqual(shape.names, ['Circle', 'Square']);
  assert.deepEqual(shape.values, ['circle', 'square']);
  assert.equal(shape.indexOf('square'), 1);
  assert.equal(shape.indexOf('Square'), -1);
});

test('only a trailing member named after the enum is a sentinel', () => {
  const leading = enumType('Axis', { AxisN: 0, X: 1 });
  assert.deepEqual(leading.names, ['AxisN', 'X']);

  const other = enumType('Axis', { X: 0, Y: 1, LayerN: 2 });
  assert.deepEqual(other.names, ['X', 'Y', 'LayerN']);
});

// ─── schemas ────────────────────────────────────────────────────────────────

test('schema lists fields in declaration order with their tags', () => {
  assert.equal(simSchema.name, 'Sim');
  assert.deepEqual(
    simSchema.fields.map((f) => f.name),
    ['count', 'active', 'mode']
  );
  assert.equal(simSchema.field('count')?.tags, 'min:"0" max:"10"');
  assert.equal(simSchema.field('active')?.tags, '');
  assert.equal(simSchema.field('mode')?.enum?.name, 'Mode');
  assert.equal(simSchema.field('missing'), undefined);
});

test('default accessors read and write the property', () => {
  const sim = new Sim();
  const count = simSchema.field('count');
  assert.ok(count);

  assert.equal(count.get(sim), 3);
  count.set(sim, 8);
  assert.equal(sim.count, 8);
});

test('custom accessors replace property access', () => {
  class Celsius {
    kelvin = 300;
  }
  const schema = defineSchema<Celsius>('Celsius')
    .field('kelvin', {
      numeric: 'float',
      get: (t) => t.kelvin - 273,
      set: (t, v) => {
        if (typeof v === 'number') t.kelvin = v + 273;
      },
    })
    .build();

  const c = new Celsius();
  const field = schema.field('kelvin');
  assert.ok(field);
  assert.equal(field.numeric, 'float');
  assert.equal(field.get(c), 27);
  field.set(c, 10);
  assert.equal(c.kelvin, 283);
});

test('declaring a field twice throws', () => {
  assert.throws(
    () => defineSchema<Sim>('Dup').field('count').field('count'),
    /Schema "Dup": field "count" declared twice/
  );
});

test('schemaOf finds the registered schema for instances and subclasses', () => {
  assert.equal(schemaOf(new Sim()), simSchema);
  assert.equal(schemaOf(new SubSim()), simSchema);
  assert.equal(isBound(new Sim()), true);
});

test('schemaOf returns undefined for unbound values', () => {
  assert.equal(schemaOf({ count: 1 }), undefined);
  assert.equal(schemaOf(null), undefined);
  assert.equal(schemaOf(5), undefined);
  assert.equal(schemaOf('Sim'), undefined);
  assert.equal(isBound(new Date()), false);
});

test('bindSchema attaches a schema to one object', () => {
  const schema = defineSchema<{ gain: number }>('Gain').field('gain').build();
  const plain = bindSchema({ gain: 0.5 }, schema);
  const other = { gain: 0.5 };

  assert.equal(schemaOf(plain), schema);
  assert.equal(schemaOf(other), undefined);
});

test('an instance binding wins over the type registration', () => {
  const only = defineSchema<Sim>('CountOnly').field('count').build();
  const sim = bindSchema(new Sim(), only);

  assert.equal(schemaOf(sim), only);
  assert.equal(schemaOf(new Sim()), simSchema);
});
