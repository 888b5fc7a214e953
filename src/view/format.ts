/**
 * printf-style number formatting for the `format` tag.
 *
 * Supported verbs: `%d %f %e %g %v %s %%`, with an optional `.N` precision
 * (`%.3f`, `%.2e`, `%.4g`). Text around the verb is kept, so `%.1f ms`
 * renders as `12.5 ms`.
 */

const VERB = /%(?:\.(\d+))?([dfegvs%])/g;

function exponential(value: number, precision: number): string {
  // Two-digit exponent: 1.5e+2 -> 1.5e+02
  return value.toExponential(precision).replace(/e([+-])(\d)$/, 'e$10$2');
}

function formatVerb(verb: string, precision: number | undefined, value: number | bigint): string {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  switch (verb) {
    case 'd':
      return String(Math.trunc(value));
    case 'f':
      return value.toFixed(precision ?? 6);
    case 'e':
      return exponential(value, precision ?? 6);
    case 'g':
      return precision === undefined ? String(value) : String(Number(value.toPrecision(Math.max(precision, 1))));
    default:
      return String(value);
  }
}

export function formatNumber(format: string, value: number | bigint): string {
  if (!format) return String(value);
  return format.replace(VERB, (_, precision: string | undefined, verb: string) => {
    if (verb === '%') return '%';
    return formatVerb(verb, precision === undefined ? undefined : Number(precision), value);
  });
}
