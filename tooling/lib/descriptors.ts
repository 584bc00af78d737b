/**
 * Descriptor constructors and bound arithmetic
 */

import {
  Bound,
  BoundedIntegerDescriptor,
  FieldDescriptor,
  KeyedSequenceDescriptor,
  LiteralDescriptor,
  LiteralValue,
  MappingDescriptor,
  PrimitiveDescriptor,
  PrimitiveKind,
  RecordDescriptor,
  RemoteReferenceDescriptor,
  SequenceDescriptor,
  TupleDescriptor,
  TypeDescriptor,
  UnionDescriptor,
  UnsupportedDescriptor,
} from "./types";

/** Property carrying a record's type name at runtime. */
export const RECORD_TAG = "__type";

export const DEFAULT_LOWER_FALLBACK = 0;
export const DEFAULT_UPPER_FALLBACK = 100;
export const OPEN_BOUND_SPAN = 1000;

export function atom(name: string): symbol {
  return Symbol.for(name);
}

export function primitive(type: PrimitiveKind): PrimitiveDescriptor {
  return { kind: "primitive", type };
}

export const integer = (): PrimitiveDescriptor => primitive("integer");
export const float = (): PrimitiveDescriptor => primitive("float");
export const boolean = (): PrimitiveDescriptor => primitive("boolean");
export const atomType = (): PrimitiveDescriptor => primitive("atom");
export const binary = (): PrimitiveDescriptor => primitive("binary");
export const bitstring = (): PrimitiveDescriptor => primitive("bitstring");
export const string = (): PrimitiveDescriptor => primitive("string");
export const charlist = (): PrimitiveDescriptor => primitive("charlist");
export const any = (): PrimitiveDescriptor => primitive("any");
export const term = (): PrimitiveDescriptor => primitive("term");
export const nullType = (): PrimitiveDescriptor => primitive("null");

export function bounded(lower?: Bound, upper?: Bound): BoundedIntegerDescriptor {
  const descriptor: BoundedIntegerDescriptor = { kind: "bounded" };
  if (lower !== undefined) descriptor.lower = lower;
  if (upper !== undefined) descriptor.upper = upper;
  return descriptor;
}

export const nonNegativeInteger = (): BoundedIntegerDescriptor => bounded(0);
export const positiveInteger = (): BoundedIntegerDescriptor => bounded(1);
export const negativeInteger = (): BoundedIntegerDescriptor => bounded(undefined, -1);

/**
 * An explicit range. Bound text that is not an integer literal falls back to
 * 0 (lower) or 100 (upper).
 */
export function range(lower: Bound, upper: Bound): BoundedIntegerDescriptor {
  return { kind: "bounded", lower, upper };
}

export function literal(value: LiteralValue): LiteralDescriptor {
  return { kind: "literal", value };
}

export function sequence(element?: TypeDescriptor): SequenceDescriptor {
  return element ? { kind: "sequence", element } : { kind: "sequence" };
}

export function keyedSequence(key: LiteralValue, value: TypeDescriptor): KeyedSequenceDescriptor {
  return { kind: "keyed_sequence", key, value };
}

export function tuple(elements: readonly TypeDescriptor[]): TupleDescriptor {
  return { kind: "tuple", elements };
}

/**
 * A required field. A bare string or symbol key becomes a literal key.
 */
export function field(key: TypeDescriptor | LiteralValue, value: TypeDescriptor): FieldDescriptor {
  return { key: toKeyDescriptor(key), value, required: true };
}

export function optionalField(key: TypeDescriptor | LiteralValue, value: TypeDescriptor): FieldDescriptor {
  return { key: toKeyDescriptor(key), value, required: false };
}

export function mapping(fields: readonly FieldDescriptor[] = []): MappingDescriptor {
  return { kind: "mapping", fields };
}

export function record(typeName: string, fields: readonly FieldDescriptor[]): RecordDescriptor {
  return { kind: "record", typeName, fields };
}

export function union(alternatives: readonly TypeDescriptor[]): UnionDescriptor {
  return { kind: "union", alternatives };
}

export function remote(owner: string, name: string, fallback?: TypeDescriptor): RemoteReferenceDescriptor {
  return fallback ? { kind: "remote", owner, name, fallback } : { kind: "remote", owner, name };
}

export function unsupported(text: string): UnsupportedDescriptor {
  return { kind: "unsupported", text };
}

function toKeyDescriptor(key: TypeDescriptor | LiteralValue): TypeDescriptor {
  if (typeof key === "object") {
    return key;
  }
  return literal(key);
}

/**
 * Best-effort integer extraction from a bound. Numeric literal text such as
 * "-5", "1_000" or "0x10" is accepted; anything else yields the fallback.
 */
export function extractBound(bound: Bound, fallback: number): number {
  if (typeof bound === "number") {
    return Number.isInteger(bound) ? bound : fallback;
  }
  const text = bound.trim().replace(/_/g, "");
  if (!/^[-+]?(0[xob][0-9a-f]+|\d+)$/i.test(text)) {
    return fallback;
  }
  const negative = text.startsWith("-");
  const unsigned = text.replace(/^[-+]/, "");
  const parsed = Number(unsigned);
  if (!Number.isSafeInteger(parsed)) {
    return fallback;
  }
  return negative ? -parsed : parsed;
}

export type IntegerInterval = {
  min: number;
  max: number;
};

/**
 * The interval a bounded integer is validated against. Open ends stay open.
 */
export function validationBounds(descriptor: BoundedIntegerDescriptor): {
  min?: number;
  max?: number;
} {
  return {
    min: descriptor.lower === undefined ? undefined : extractBound(descriptor.lower, DEFAULT_LOWER_FALLBACK),
    max: descriptor.upper === undefined ? undefined : extractBound(descriptor.upper, DEFAULT_UPPER_FALLBACK),
  };
}

/**
 * The interval values are drawn from. Open ends get engine defaults:
 * non-negative [0, 1000], positive [1, 1000], negative [-1000, -1].
 */
export function generationBounds(descriptor: BoundedIntegerDescriptor): IntegerInterval {
  const { min, max } = validationBounds(descriptor);
  const low =
    min !== undefined
      ? min
      : max === undefined || max >= -OPEN_BOUND_SPAN
        ? -OPEN_BOUND_SPAN
        : max - OPEN_BOUND_SPAN;
  const high =
    max !== undefined
      ? max
      : low <= OPEN_BOUND_SPAN
        ? OPEN_BOUND_SPAN
        : low + OPEN_BOUND_SPAN;
  return { min: low, max: high };
}
