/**
 * JSON catalog codec for descriptors. Atoms are written as `{ "atom": name }`
 * since symbols have no JSON form.
 */

import {
  Bound,
  BoundedIntegerDescriptor,
  DescriptorMeta,
  FieldDescriptor,
  LiteralValue,
  PrimitiveKind,
  TypeDescriptor,
} from "./types";
import { isPlainObject } from "./utils";

export type EncodedLiteral = number | string | boolean | { atom: string };

export type EncodedDescriptor = Record<string, unknown> & { kind: string };

const PRIMITIVES: readonly PrimitiveKind[] = [
  "integer",
  "float",
  "boolean",
  "atom",
  "binary",
  "bitstring",
  "string",
  "charlist",
  "any",
  "term",
  "null",
];

function isPrimitiveKind(value: unknown): value is PrimitiveKind {
  return PRIMITIVES.some((kind) => kind === value);
}

export function encodeLiteral(value: LiteralValue): EncodedLiteral {
  return typeof value === "symbol" ? { atom: value.description ?? "" } : value;
}

export function decodeLiteral(value: unknown): LiteralValue | undefined {
  if (typeof value === "number" || typeof value === "string" || typeof value === "boolean") {
    return value;
  }
  if (isPlainObject(value) && typeof value.atom === "string") {
    return Symbol.for(value.atom);
  }
  return undefined;
}

function encodeField(field: FieldDescriptor): Record<string, unknown> {
  return { key: encodeDescriptor(field.key), value: encodeDescriptor(field.value), required: field.required };
}

export function encodeDescriptor(descriptor: TypeDescriptor): EncodedDescriptor {
  const meta = descriptor.meta ? { meta: descriptor.meta } : {};
  switch (descriptor.kind) {
    case "primitive":
      return { kind: "primitive", type: descriptor.type, ...meta };
    case "bounded":
      return { kind: "bounded", lower: descriptor.lower, upper: descriptor.upper, ...meta };
    case "literal":
      return { kind: "literal", value: encodeLiteral(descriptor.value), ...meta };
    case "sequence":
      return {
        kind: "sequence",
        element: descriptor.element ? encodeDescriptor(descriptor.element) : undefined,
        ...meta,
      };
    case "keyed_sequence":
      return {
        kind: "keyed_sequence",
        key: encodeLiteral(descriptor.key),
        value: encodeDescriptor(descriptor.value),
        ...meta,
      };
    case "tuple":
      return { kind: "tuple", elements: descriptor.elements.map(encodeDescriptor), ...meta };
    case "mapping":
      return { kind: "mapping", fields: descriptor.fields.map(encodeField), ...meta };
    case "record":
      return { kind: "record", typeName: descriptor.typeName, fields: descriptor.fields.map(encodeField), ...meta };
    case "union":
      return { kind: "union", alternatives: descriptor.alternatives.map(encodeDescriptor), ...meta };
    case "remote":
      return {
        kind: "remote",
        owner: descriptor.owner,
        name: descriptor.name,
        fallback: descriptor.fallback ? encodeDescriptor(descriptor.fallback) : undefined,
        ...meta,
      };
    case "unsupported":
      return { kind: "unsupported", text: descriptor.text, ...meta };
  }
}

function decodeBound(value: unknown): Bound | undefined {
  return typeof value === "number" || typeof value === "string" ? value : undefined;
}

function decodeMeta(value: unknown): DescriptorMeta | undefined {
  if (!isPlainObject(value)) {
    return undefined;
  }
  const meta: DescriptorMeta = {};
  if (typeof value.file === "string") meta.file = value.file;
  if (typeof value.line === "number") meta.line = value.line;
  return meta;
}

function decodeList(value: unknown): TypeDescriptor[] | undefined {
  return Array.isArray(value) ? value.map(decodeDescriptor) : undefined;
}

function decodeFields(value: unknown): FieldDescriptor[] | undefined {
  if (!Array.isArray(value)) {
    return undefined;
  }
  const fields: FieldDescriptor[] = [];
  for (const raw of value) {
    if (!isPlainObject(raw)) {
      return undefined;
    }
    fields.push({ key: decodeDescriptor(raw.key), value: decodeDescriptor(raw.value), required: raw.required === true });
  }
  return fields;
}

/**
 * Decode one catalog entry. Malformed or unknown entries become
 * `unsupported` descriptors carrying their JSON text.
 */
export function decodeDescriptor(raw: unknown): TypeDescriptor {
  const unsupported: TypeDescriptor = { kind: "unsupported", text: JSON.stringify(raw) ?? String(raw) };
  if (!isPlainObject(raw)) {
    return unsupported;
  }
  const meta = decodeMeta(raw.meta);
  const withMeta = <T extends TypeDescriptor>(descriptor: T): T => (meta ? { ...descriptor, meta } : descriptor);

  switch (raw.kind) {
    case "primitive":
      return isPrimitiveKind(raw.type) ? withMeta({ kind: "primitive", type: raw.type }) : unsupported;
    case "bounded": {
      const descriptor: BoundedIntegerDescriptor = { kind: "bounded" };
      const lower = decodeBound(raw.lower);
      const upper = decodeBound(raw.upper);
      if (lower !== undefined) descriptor.lower = lower;
      if (upper !== undefined) descriptor.upper = upper;
      return withMeta(descriptor);
    }
    case "literal": {
      const value = decodeLiteral(raw.value);
      return value === undefined ? unsupported : withMeta({ kind: "literal", value });
    }
    case "sequence":
      return withMeta(
        raw.element === undefined
          ? { kind: "sequence" }
          : { kind: "sequence", element: decodeDescriptor(raw.element) }
      );
    case "keyed_sequence": {
      const key = decodeLiteral(raw.key);
      return key === undefined
        ? unsupported
        : withMeta({ kind: "keyed_sequence", key, value: decodeDescriptor(raw.value) });
    }
    case "tuple": {
      const elements = decodeList(raw.elements);
      return elements ? withMeta({ kind: "tuple", elements }) : unsupported;
    }
    case "mapping": {
      const fields = decodeFields(raw.fields);
      return fields ? withMeta({ kind: "mapping", fields }) : unsupported;
    }
    case "record": {
      const fields = decodeFields(raw.fields);
      return fields && typeof raw.typeName === "string"
        ? withMeta({ kind: "record", typeName: raw.typeName, fields })
        : unsupported;
    }
    case "union": {
      const alternatives = decodeList(raw.alternatives);
      return alternatives ? withMeta({ kind: "union", alternatives }) : unsupported;
    }
    case "remote": {
      if (typeof raw.owner !== "string" || typeof raw.name !== "string") {
        return unsupported;
      }
      return withMeta(
        raw.fallback === undefined
          ? { kind: "remote", owner: raw.owner, name: raw.name }
          : { kind: "remote", owner: raw.owner, name: raw.name, fallback: decodeDescriptor(raw.fallback) }
      );
    }
    case "unsupported":
      return typeof raw.text === "string" ? withMeta({ kind: "unsupported", text: raw.text }) : unsupported;
    default:
      return unsupported;
  }
}
