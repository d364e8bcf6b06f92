/**
 * The closed set of value kinds a scope can hold, with their TypeBox schemas.
 */

import { Type, type TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

export interface ValueTypes {
  bool: boolean;
  int: number;
  float: number;
  string: string;
}

export type ValueKind = keyof ValueTypes;

export type ValueOf<K extends ValueKind> = ValueTypes[K];

export const VALUE_SCHEMAS = {
  bool: Type.Boolean(),
  int: Type.Integer({ minimum: Number.MIN_SAFE_INTEGER, maximum: Number.MAX_SAFE_INTEGER }),
  float: Type.Number(),
  string: Type.String(),
} as const satisfies Record<ValueKind, TSchema>;

/** Order in which usage validation visits the per-kind stores. */
export const VALUE_KINDS: readonly ValueKind[] = ['bool', 'int', 'string', 'float'];

export const ZERO_VALUES: { readonly [K in keyof ValueTypes]: ValueTypes[K] } = {
  bool: false,
  int: 0,
  float: 0,
  string: '',
};

export const KIND_NAMES: { readonly [K in keyof ValueTypes]: string } = {
  bool: 'boolean',
  int: 'integer',
  float: 'float',
  string: 'string',
};

export function isValueOf<K extends ValueKind>(kind: K, value: unknown): value is ValueOf<K> {
  return Value.Check(VALUE_SCHEMAS[kind], value);
}
