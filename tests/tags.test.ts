import { test } from 'node:test';
import assert from 'node:assert/strict';

import { hasTagValue, parseTags, tagValue } from '../src/view/tags.js';
import { validateFieldTags } from '../src/view/validate.js';
import { captureLogs } from './helpers.js';

// Parsed tag sets are cached per raw string, so each malformed-tag test uses
// a string no other test parses.

test('parseTags reads space-separated key:"value" pairs', () => {
  const tags = parseTags('view:"-" inactive:"+" desc:"explanatory text"');

  assert.equal(tags.get('view'), '-');
  assert.equal(tags.get('inactive'), '+');
  assert.equal(tags.get('desc'), 'explanatory text');
  assert.equal(tags.size, 3);
});

test('tagValue returns the value, or empty string for a missing key', () => {
  assert.equal(tagValue('k1:"v1" k2:"v2"', 'k1'), 'v1');
  assert.equal(tagValue('k1:"v1" k2:"v2"', 'k2'), 'v2');
  assert.equal(tagValue('k1:"v1" k2:"v2"', 'k3'), '');
  assert.equal(tagValue('', 'k1'), '');
});

test('tagValue accepts an already parsed set', () => {
  const tags = parseTags('min:"0" max:"10"');
  assert.equal(tagValue(tags, 'max'), '10');
});

test('last duplicate key wins', () => {
  assert.equal(tagValue('step:"1" step:"2"', 'step'), '2');
});

test('values may contain colons and spaces', () => {
  assert.equal(tagValue('desc:"ratio: a to b"', 'desc'), 'ratio: a to b');
});

test('unknown keys are kept', () => {
  assert.equal(parseTags('color:"red"').get('color'), 'red');
});

test('hasTagValue matches exactly', () => {
  assert.equal(hasTagValue('view:"inline"', 'view', 'inline'), true);
  assert.equal(hasTagValue('view:"inline"', 'view', '-'), false);
  assert.equal(hasTagValue('', 'view', ''), true);
});

test('malformed tokens are skipped with a warning each', async () => {
  let tags = parseTags('');
  const records = await captureLogs(() => {
    tags = parseTags('broken min:"0" nocolon max:"5" width:7');
  });

  assert.equal(tags.get('min'), '0');
  assert.equal(tags.get('max'), '5');
  assert.equal(tags.has('width'), false);
  assert.equal(tags.size, 2);
  assert.deepEqual(
    records.map((r) => r.message),
    [
      'Malformed tag "broken" in `broken min:"0" nocolon max:"5" width:7`: expected key:"value".',
      'Malformed tag "nocolon" in `broken min:"0" nocolon max:"5" width:7`: expected key:"value".',
      'Malformed tag "width:7" in `broken min:"0" nocolon max:"5" width:7`: value must be quoted.',
    ]
  );
  assert.ok(records.every((r) => r.level === 'warn'));
});

test('a quoted value runs to the next quote', async () => {
  let tags = parseTags('');
  const records = await captureLogs(() => {
    tags = parseTags('a:"1" b:"oops c:"2"');
  });

  // `b` swallows up to the next quote, `c:` starts a new token after it.
  assert.equal(tags.get('a'), '1');
  assert.equal(tags.get('b'), 'oops c:');
  assert.equal(records.length, 1);
  assert.equal(records[0].message, 'Malformed tag "2"" in `a:"1" b:"oops c:"2"`: expected key:"value".');
});

test('a trailing unterminated quote warns once', async () => {
  let tags = parseTags('');
  const records = await captureLogs(() => {
    tags = parseTags('x:"1" y:"never closed');
  });

  assert.equal(tags.get('x'), '1');
  assert.equal(tags.has('y'), false);
  assert.deepEqual(
    records.map((r) => r.message),
    ['Malformed tag "y:"never closed" in `x:"1" y:"never closed`: unterminated quote.']
  );
});

test('repeated parses of the same string are cached', () => {
  const raw = 'desc:"cached once"';
  assert.equal(parseTags(raw), parseTags(raw));
});

// ─── validation ─────────────────────────────────────────────────────────────

test('validateFieldTags warns about values the engine cannot use', async () => {
  const records = await captureLogs(() => {
    validateFieldTags('count', parseTags('view:"maybe" inactive:"yes" min:"ten" max:"5" step:"0"'));
  });

  assert.deepEqual(
    records.map((r) => r.message),
    [
      'field "count": "view" must be "-" or "inline", got "maybe"',
      'field "count": "inactive" must be "+" or "-", got "yes"',
      'field "count": "min" expected a number, got "ten"',
      'field "count": "step" must be > 0, got 0',
    ]
  );
});

test('validateFieldTags flags min above max', async () => {
  const records = await captureLogs(() => {
    validateFieldTags('gain', parseTags('min:"9" max:"1"'));
  });

  assert.deepEqual(
    records.map((r) => r.message),
    ['field "gain": "min" (9) must not exceed "max" (1)']
  );
});

test('validateFieldTags is silent for well-formed tags', async () => {
  const records = await captureLogs(() => {
    validateFieldTags('rate', parseTags('min:"0" max:"1" step:"0.05" view:"inline" inactive:"+" width:"12"'));
  });
  assert.equal(records.length, 0);
});
