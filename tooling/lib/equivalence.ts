/**
 * Structural equivalence of descriptors, ignoring positional metadata
 */

import { Bound, FieldDescriptor, Signature, TypeDescriptor } from "./types";

function equivalentLists(a: readonly TypeDescriptor[], b: readonly TypeDescriptor[]): boolean {
  return a.length === b.length && a.every((descriptor, index) => equivalent(descriptor, b[index]));
}

function equivalentField(a: FieldDescriptor, b: FieldDescriptor): boolean {
  return a.required === b.required && equivalent(a.key, b.key) && equivalent(a.value, b.value);
}

/**
 * Fields match as a set: each field pairs with one unused equivalent field.
 * Equivalence is transitive, so a greedy pairing is enough.
 */
function equivalentFields(a: readonly FieldDescriptor[], b: readonly FieldDescriptor[]): boolean {
  if (a.length !== b.length) {
    return false;
  }
  const unused = new Set(b.keys());
  for (const field of a) {
    const match = Array.from(unused).find((index) => equivalentField(field, b[index]));
    if (match === undefined) {
      return false;
    }
    unused.delete(match);
  }
  return true;
}

function equivalentBounds(a: Bound | undefined, b: Bound | undefined): boolean {
  return Object.is(a, b);
}

function equivalentOptional(a: TypeDescriptor | undefined, b: TypeDescriptor | undefined): boolean {
  if (a === undefined || b === undefined) {
    return a === b;
  }
  return equivalent(a, b);
}

export function equivalent(a: TypeDescriptor, b: TypeDescriptor): boolean {
  switch (a.kind) {
    case "primitive":
      return b.kind === "primitive" && a.type === b.type;
    case "bounded":
      return b.kind === "bounded" && equivalentBounds(a.lower, b.lower) && equivalentBounds(a.upper, b.upper);
    case "literal":
      return b.kind === "literal" && Object.is(a.value, b.value);
    case "sequence":
      return b.kind === "sequence" && equivalentOptional(a.element, b.element);
    case "keyed_sequence":
      return b.kind === "keyed_sequence" && Object.is(a.key, b.key) && equivalent(a.value, b.value);
    case "tuple":
      return b.kind === "tuple" && equivalentLists(a.elements, b.elements);
    case "mapping":
      return b.kind === "mapping" && equivalentFields(a.fields, b.fields);
    case "record":
      return b.kind === "record" && a.typeName === b.typeName && equivalentFields(a.fields, b.fields);
    case "union":
      return b.kind === "union" && equivalentLists(a.alternatives, b.alternatives);
    case "remote":
      return (
        b.kind === "remote" &&
        a.owner === b.owner &&
        a.name === b.name &&
        equivalentOptional(a.fallback, b.fallback)
      );
    case "unsupported":
      return b.kind === "unsupported" && a.text === b.text;
    default:
      return false;
  }
}

/**
 * Both parameter lists and both return descriptors must match pairwise.
 */
export function equivalentSignatures(a: Signature, b: Signature): boolean {
  return equivalentLists(a.params, b.params) && equivalent(a.returns, b.returns);
}
