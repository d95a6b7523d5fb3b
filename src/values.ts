/**
 * Value Model
 * Tagged runtime values shared by the lexer, parser, analyzer and runtime
 */

// ============================================================
// DECLARED TYPES
// ============================================================

/** Type names accepted in a declaration's type position */
export const DECL_TYPES = ['int', 'float', 'bool', 'string', 'null'] as const;

export type DeclType = (typeof DECL_TYPES)[number];

// ============================================================
// VALUES
// ============================================================

export interface NullValue {
  readonly type: 'null';
}

export interface IntValue {
  readonly type: 'int';
  readonly value: bigint;
}

export interface FloatValue {
  readonly type: 'float';
  readonly value: number;
}

export interface BoolValue {
  readonly type: 'bool';
  readonly value: boolean;
}

export interface StringValue {
  readonly type: 'string';
  readonly value: string;
}

/**
 * A runtime value. The `type` tag doubles as the value's DeclType,
 * so a literal's type is always `value.type`.
 */
export type Value = NullValue | IntValue | FloatValue | BoolValue | StringValue;

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

// ============================================================
// CONSTRUCTORS
// ============================================================

const NULL: NullValue = Object.freeze({ type: 'null' });

export function nullValue(): NullValue {
  return NULL;
}

/** Create an int value, wrapping into the signed 64-bit range */
export function intValue(value: bigint | number): IntValue {
  const n = typeof value === 'number' ? BigInt(Math.trunc(value)) : value;
  return { type: 'int', value: BigInt.asIntN(64, n) };
}

export function floatValue(value: number): FloatValue {
  return { type: 'float', value };
}

export function boolValue(value: boolean): BoolValue {
  return { type: 'bool', value };
}

export function stringValue(value: string): StringValue {
  return { type: 'string', value };
}

/**
 * Copy a value.
 * Payloads are primitives, so the copy shares no mutable state with the original.
 */
export function copyValue(value: Value): Value {
  return value.type === 'null' ? NULL : { ...value };
}

// ============================================================
// INSPECTION
// ============================================================

/** Name of a declared type as it appears in source and in messages */
export function typeName(type: DeclType): string {
  return type;
}

export function valuesEqual(a: Value, b: Value): boolean {
  switch (a.type) {
    case 'null':
      return b.type === 'null';
    case 'int':
      return b.type === 'int' && a.value === b.value;
    case 'float':
      return b.type === 'float' && Object.is(a.value, b.value);
    case 'bool':
      return b.type === 'bool' && a.value === b.value;
    case 'string':
      return b.type === 'string' && a.value === b.value;
  }
}

// ============================================================
// CANONICAL TEXT
// ============================================================

/**
 * Render a value in its canonical textual form.
 *
 * - null   -> `null`
 * - int    -> decimal digits
 * - float  -> shortest round-tripping digits in positional notation,
 *             always with a fractional part; non-finite as `inf`, `-inf`, `nan`
 * - bool   -> `true` / `false`
 * - string -> content wrapped in double quotes, unescaped
 */
export function formatValue(value: Value): string {
  switch (value.type) {
    case 'null':
      return 'null';
    case 'int':
      return value.value.toString(10);
    case 'float':
      return formatFloat(value.value);
    case 'bool':
      return value.value ? 'true' : 'false';
    case 'string':
      return `"${value.value}"`;
  }
}

function formatFloat(n: number): string {
  if (Number.isNaN(n)) return 'nan';
  if (!Number.isFinite(n)) return n > 0 ? 'inf' : '-inf';

  const sign = n < 0 ? '-' : '';
  const [mantissa = '0', exponent = '0'] = String(Math.abs(n)).split('e');
  const [whole = '0', fraction = ''] = mantissa.split('.');
  const digits = whole + fraction;
  const point = whole.length + Number(exponent);

  if (point <= 0) {
    return `${sign}0.${'0'.repeat(-point)}${digits}`;
  }
  if (point >= digits.length) {
    return `${sign}${digits}${'0'.repeat(point - digits.length)}.0`;
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}
