/**
 * Readable rendering of descriptors for messages and the describe CLI
 */

import { FieldDescriptor, LiteralValue, Signature, TypeDescriptor } from "./types";

export function formatLiteral(value: LiteralValue): string {
  if (typeof value === "symbol") {
    return `:${value.description ?? ""}`;
  }
  if (typeof value === "string") {
    return JSON.stringify(value);
  }
  return String(value);
}

function formatField(field: FieldDescriptor): string {
  const key = formatDescriptor(field.key);
  return `${field.required ? "required" : "optional"}(${key}) => ${formatDescriptor(field.value)}`;
}

export function formatDescriptor(descriptor: TypeDescriptor): string {
  switch (descriptor.kind) {
    case "primitive":
      return descriptor.type;
    case "bounded": {
      const lower = descriptor.lower === undefined ? "" : String(descriptor.lower);
      const upper = descriptor.upper === undefined ? "" : String(descriptor.upper);
      return `${lower}..${upper}`;
    }
    case "literal":
      return formatLiteral(descriptor.value);
    case "sequence":
      return descriptor.element ? `list(${formatDescriptor(descriptor.element)})` : "list()";
    case "keyed_sequence":
      return `keyword(${formatLiteral(descriptor.key)}: ${formatDescriptor(descriptor.value)})`;
    case "tuple":
      return `[${descriptor.elements.map(formatDescriptor).join(", ")}]`;
    case "mapping":
      return `%{${descriptor.fields.map(formatField).join(", ")}}`;
    case "record":
      return `${descriptor.typeName}{${descriptor.fields.map(formatField).join(", ")}}`;
    case "union":
      return descriptor.alternatives.map(formatDescriptor).join(" | ");
    case "remote":
      return descriptor.owner ? `${descriptor.owner}.${descriptor.name}` : descriptor.name;
    case "unsupported":
      return `unsupported(${descriptor.text})`;
    default:
      return `unknown(${JSON.stringify(descriptor)})`;
  }
}

export function formatSignature(signature: Signature): string {
  return `(${signature.params.map(formatDescriptor).join(", ")}) -> ${formatDescriptor(signature.returns)}`;
}
