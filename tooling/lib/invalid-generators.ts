/**
 * Generators of values that deliberately violate a type descriptor.
 * Used for robustness trials that check implementations reject bad input.
 */

import * as fc from "fast-check";
import {
  anyValue,
  atomValue,
  dictionary,
  floatValue,
  integerBetween,
  integerValue,
  listOf,
  nonIntegerFloat,
  oneOf,
  printableString,
} from "./arbitraries";
import { OPEN_BOUND_SPAN, validationBounds } from "./descriptors";
import { Descent, describeResolutionFailure, resolveReference, startDescent, warnDegraded } from "./resolution";
import { BoundedIntegerDescriptor, EngineContext, PrimitiveKind, TypeDescriptor } from "./types";

const COMPONENT = "invalid-generator";

/**
 * Converts a descriptor into an arbitrary of values its validator should reject.
 * Collections get values of an entirely different shape, not near misses.
 */
export function invalidGenerator(descriptor: TypeDescriptor, context?: EngineContext): fc.Arbitrary<unknown> {
  return generateInvalid(descriptor, startDescent(context));
}

/**
 * One draw yields one argument list in which every argument is invalid.
 */
export function invalidInputGenerator(
  params: readonly TypeDescriptor[],
  context?: EngineContext
): fc.Arbitrary<unknown[]> {
  const descent = startDescent(context);
  return fc.tuple(...params.map((param) => generateInvalid(param, descent)));
}

const nonListTypes = (): fc.Arbitrary<unknown> =>
  oneOf([integerValue(), floatValue(), printableString(), atomValue(), dictionary()]);

const nonMapTypes = (): fc.Arbitrary<unknown> =>
  oneOf([integerValue(), floatValue(), printableString(), atomValue(), listOf(anyValue())]);

const genericInvalidTypes = (): fc.Arbitrary<unknown> =>
  oneOf([integerValue(), floatValue(), printableString(), atomValue(), listOf(anyValue()), dictionary()]);

function invalidPrimitive(kind: PrimitiveKind): fc.Arbitrary<unknown> {
  switch (kind) {
    case "integer":
      return oneOf([nonIntegerFloat(), printableString(), atomValue(), listOf(integerValue()), dictionary()]);
    case "float":
      return oneOf([printableString(), atomValue(), listOf(floatValue()), dictionary(), fc.boolean()]);
    case "boolean":
      return oneOf([integerValue(), floatValue(), printableString(), listOf(atomValue())]);
    case "binary":
      return oneOf([integerValue(), floatValue(), atomValue(), listOf(anyValue()), dictionary()]);
    case "bitstring":
      return oneOf([integerValue(), atomValue(), dictionary()]);
    case "atom":
      return oneOf([integerValue(), floatValue(), printableString(), listOf(anyValue()), dictionary()]);
    case "string":
      return oneOf([integerValue(), floatValue(), atomValue(), listOf(anyValue()), dictionary()]);
    case "charlist":
      return oneOf([integerValue(), floatValue(), printableString(), atomValue(), dictionary()]);
    case "null":
      return oneOf([integerValue(), floatValue(), printableString(), atomValue(), listOf(anyValue())]);
    case "any":
    case "term":
      return anyValue();
  }
}

/**
 * Integers just outside each finite bound, plus other scalar shapes.
 */
function invalidBounded(descriptor: BoundedIntegerDescriptor): fc.Arbitrary<unknown> {
  const { min, max } = validationBounds(descriptor);
  const outside: fc.Arbitrary<unknown>[] = [];
  if (min !== undefined) {
    outside.push(integerBetween(min - OPEN_BOUND_SPAN, min - 1));
  }
  if (max !== undefined) {
    outside.push(integerBetween(max + 1, max + OPEN_BOUND_SPAN));
  }
  return oneOf([...outside, nonIntegerFloat(), printableString(), atomValue()]);
}

function generateInvalid(descriptor: TypeDescriptor, descent: Descent): fc.Arbitrary<unknown> {
  switch (descriptor.kind) {
    case "primitive":
      return invalidPrimitive(descriptor.type);

    case "bounded":
      return invalidBounded(descriptor);

    case "literal": {
      const expected = descriptor.value;
      return oneOf([atomValue(), integerValue(), floatValue(), printableString(), fc.boolean()]).filter(
        (value) => value !== expected
      );
    }

    case "sequence":
    case "keyed_sequence":
      return nonListTypes();

    case "tuple": {
      const arity = descriptor.elements.length;
      return oneOf([
        integerValue(),
        floatValue(),
        printableString(),
        atomValue(),
        listOf(anyValue()).filter((list) => list.length !== arity),
        dictionary(),
      ]);
    }

    case "mapping":
    case "record":
      return nonMapTypes();

    // Resolved records land on the non-map pool, never a wrong-shaped record.
    case "remote": {
      const resolution = resolveReference(descriptor, descent);
      if (resolution.status !== "resolved") {
        warnDegraded(descent, COMPONENT, descriptor, describeResolutionFailure(resolution), "the generic invalid pool");
        return genericInvalidTypes();
      }
      return generateInvalid(resolution.descriptor, resolution.descent);
    }

    case "union":
      return genericInvalidTypes();

    case "unsupported":
      warnDegraded(descent, COMPONENT, descriptor, "Unsupported descriptor", "the generic invalid pool");
      return genericInvalidTypes();

    default:
      warnDegraded(descent, COMPONENT, descriptor, "Unknown descriptor", "the generic invalid pool");
      return genericInvalidTypes();
  }
}
