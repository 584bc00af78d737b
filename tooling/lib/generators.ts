/**
 * Valid-value generators synthesized from type descriptors
 */

import * as fc from "fast-check";
import {
  anyValue,
  atomValue,
  bytes,
  charlistValue,
  floatValue,
  integerBetween,
  integerValue,
  listOf,
  oneOf,
  printableString,
} from "./arbitraries";
import { generationBounds, RECORD_TAG } from "./descriptors";
import { buildObject, hasDistinctKeys } from "./utils";
import { Descent, describeResolutionFailure, resolveReference, startDescent, warnDegraded } from "./resolution";
import { EngineContext, FieldDescriptor, PrimitiveKind, TypeDescriptor } from "./types";

const COMPONENT = "generator";

/**
 * Converts a descriptor into an arbitrary producing values that conform to it.
 * Shapes the engine cannot interpret degrade to arbitrary values with a warning.
 */
export function generator(descriptor: TypeDescriptor, context?: EngineContext): fc.Arbitrary<unknown> {
  return generate(descriptor, startDescent(context));
}

/**
 * One draw yields one argument list, positionally matching the parameters.
 */
export function inputGenerator(
  params: readonly TypeDescriptor[],
  context?: EngineContext
): fc.Arbitrary<unknown[]> {
  const descent = startDescent(context);
  return fc.tuple(...params.map((param) => generate(param, descent)));
}

function primitiveGenerator(kind: PrimitiveKind): fc.Arbitrary<unknown> {
  switch (kind) {
    case "integer":
      return integerValue();
    case "float":
      return floatValue();
    case "boolean":
      return fc.boolean();
    case "atom":
      return atomValue();
    case "binary":
    case "bitstring":
      return bytes();
    case "string":
      return printableString();
    case "charlist":
      return charlistValue();
    case "any":
    case "term":
      return anyValue();
    case "null":
      return fc.constant(null);
  }
}

function fieldEntry(field: FieldDescriptor, descent: Descent, reserved?: string): fc.Arbitrary<[unknown, unknown]> {
  let key = generate(field.key, descent);
  if (reserved !== undefined) {
    key = key.filter((drawn) => drawn !== reserved);
  }
  return fc.tuple(key, generate(field.value, descent));
}

/**
 * Whether every key drawn for `descriptor` survives as an object property key.
 * Byte strings, lists and aggregates do not, so their mappings become Maps.
 */
function storesAsPropertyKey(descriptor: TypeDescriptor, descent: Descent): boolean {
  switch (descriptor.kind) {
    case "primitive":
      return !["binary", "bitstring", "charlist"].includes(descriptor.type);
    case "bounded":
    case "literal":
    case "unsupported":
      return true;
    case "union":
      return descriptor.alternatives.every((alternative) => storesAsPropertyKey(alternative, descent));
    case "remote": {
      const resolution = resolveReference(descriptor, descent);
      return resolution.status !== "resolved" || storesAsPropertyKey(resolution.descriptor, resolution.descent);
    }
    default:
      return false;
  }
}

function generate(descriptor: TypeDescriptor, descent: Descent): fc.Arbitrary<unknown> {
  switch (descriptor.kind) {
    case "primitive":
      return primitiveGenerator(descriptor.type);

    case "bounded": {
      const { min, max } = generationBounds(descriptor);
      if (min > max) {
        warnDegraded(descent, COMPONENT, descriptor, "Empty integer range", "arbitrary values");
        return anyValue();
      }
      return integerBetween(min, max);
    }

    case "literal":
      return fc.constant(descriptor.value);

    case "sequence":
      return listOf(descriptor.element ? generate(descriptor.element, descent) : anyValue());

    case "keyed_sequence": {
      // One tagged pair per draw, never a longer keyword list.
      const key = descriptor.key;
      return generate(descriptor.value, descent).map((value) => [[key, value]]);
    }

    case "tuple":
      return fc.tuple(...descriptor.elements.map((element) => generate(element, descent)));

    case "mapping": {
      if (descriptor.fields.length === 0) {
        return fc.dictionary(fc.string(), anyValue(), { maxKeys: 5 });
      }
      const entries = descriptor.fields.map((field) => fieldEntry(field, descent));
      if (!descriptor.fields.every((field) => storesAsPropertyKey(field.key, descent))) {
        return fc
          .tuple(...entries)
          .map((drawn) => new Map(drawn))
          .filter((map) => map.size === entries.length);
      }
      return fc
        .tuple(...entries)
        .filter((drawn) => hasDistinctKeys(drawn))
        .map((drawn) => buildObject(drawn));
    }

    case "record": {
      const typeName = descriptor.typeName;
      const entries = descriptor.fields.map((field) => fieldEntry(field, descent, RECORD_TAG));
      return fc
        .tuple(...entries)
        .filter((drawn) => hasDistinctKeys(drawn, RECORD_TAG))
        .map((drawn) => buildObject([[RECORD_TAG, typeName], ...drawn]));
    }

    case "union": {
      if (descriptor.alternatives.length === 0) {
        warnDegraded(descent, COMPONENT, descriptor, "Empty union", "arbitrary values");
        return anyValue();
      }
      return oneOf(descriptor.alternatives.map((alternative) => generate(alternative, descent)));
    }

    case "remote": {
      const resolution = resolveReference(descriptor, descent);
      if (resolution.status !== "resolved") {
        warnDegraded(descent, COMPONENT, descriptor, describeResolutionFailure(resolution), "arbitrary values");
        return anyValue();
      }
      return generate(resolution.descriptor, resolution.descent);
    }

    case "unsupported":
      warnDegraded(descent, COMPONENT, descriptor, "Unsupported descriptor", "arbitrary values");
      return anyValue();

    default:
      warnDegraded(descent, COMPONENT, descriptor, "Unknown descriptor", "arbitrary values");
      return anyValue();
  }
}
