/**
 * Value validators synthesized from type descriptors
 */

import { RECORD_TAG, validationBounds } from "./descriptors";
import { Descent, describeResolutionFailure, resolveReference, startDescent, warnDegraded } from "./resolution";
import { EngineContext, FieldDescriptor, Predicate, PrimitiveKind, TypeDescriptor } from "./types";
import { isPlainObject, ownEntries, propertyKeyCandidates } from "./utils";

const COMPONENT = "validator";

const permissive: Predicate = () => true;

/**
 * Converts a descriptor into a predicate. Mirrors the generator case by case;
 * shapes the engine cannot interpret validate permissively.
 */
export function validator(descriptor: TypeDescriptor, context?: EngineContext): Predicate {
  return validate(descriptor, startDescent(context));
}

export function isByteSequence(value: unknown): value is Uint8Array {
  return value instanceof Uint8Array;
}

function primitiveValidator(kind: PrimitiveKind): Predicate {
  switch (kind) {
    case "integer":
      return (value) => typeof value === "number" && Number.isInteger(value);
    case "float":
      return (value) => typeof value === "number";
    case "boolean":
      return (value) => typeof value === "boolean";
    case "atom":
      return (value) => typeof value === "symbol";
    case "binary":
    case "bitstring":
      return isByteSequence;
    case "string":
      return (value) => typeof value === "string";
    case "charlist":
      return (value) => Array.isArray(value) && value.every((code) => Number.isInteger(code));
    case "any":
    case "term":
      return permissive;
    case "null":
      return (value) => value === null;
  }
}

type FieldCheck = {
  key: Predicate;
  value: Predicate;
};

/**
 * Each required field is satisfied when some entry passes both its key and
 * value predicates; entries are not looked up by name.
 */
function aggregateValidator(
  fields: readonly FieldDescriptor[],
  descent: Descent,
  excludedKey?: string
): Predicate {
  const checks: FieldCheck[] = fields
    .filter((field) => field.required)
    .map((field) => ({ key: validate(field.key, descent), value: validate(field.value, descent) }));

  return (value) => {
    let entries: [unknown[], unknown][];
    if (isPlainObject(value)) {
      entries = ownEntries(value)
        .filter(([key]) => key !== excludedKey)
        .map(([key, entryValue]) => [propertyKeyCandidates(key), entryValue]);
    } else if (value instanceof Map && excludedKey === undefined) {
      entries = Array.from(value, ([key, entryValue]): [unknown[], unknown] => [[key], entryValue]);
    } else {
      return false;
    }
    return checks.every((check) =>
      entries.some(([candidates, entryValue]) => candidates.some(check.key) && check.value(entryValue))
    );
  };
}

function validate(descriptor: TypeDescriptor, descent: Descent): Predicate {
  switch (descriptor.kind) {
    case "primitive":
      return primitiveValidator(descriptor.type);

    case "bounded": {
      const { min, max } = validationBounds(descriptor);
      return (value) =>
        typeof value === "number" &&
        Number.isInteger(value) &&
        (min === undefined || value >= min) &&
        (max === undefined || value <= max);
    }

    case "literal": {
      const expected = descriptor.value;
      return (value) => value === expected;
    }

    case "sequence": {
      if (!descriptor.element) {
        return (value) => Array.isArray(value);
      }
      const element = validate(descriptor.element, descent);
      return (value) => Array.isArray(value) && value.every(element);
    }

    case "keyed_sequence": {
      const key = descriptor.key;
      const valueValidator = validate(descriptor.value, descent);
      return (value) =>
        Array.isArray(value) &&
        value.some(
          (entry) => Array.isArray(entry) && entry.length === 2 && entry[0] === key && valueValidator(entry[1])
        );
    }

    case "tuple": {
      const elements = descriptor.elements.map((element) => validate(element, descent));
      return (value) =>
        Array.isArray(value) &&
        value.length === elements.length &&
        elements.every((element, index) => element(value[index]));
    }

    case "mapping":
      return aggregateValidator(descriptor.fields, descent);

    case "record": {
      const typeName = descriptor.typeName;
      const fields = aggregateValidator(descriptor.fields, descent, RECORD_TAG);
      return (value) => isPlainObject(value) && value[RECORD_TAG] === typeName && fields(value);
    }

    case "union": {
      const alternatives = descriptor.alternatives.map((alternative) => validate(alternative, descent));
      return (value) => alternatives.some((alternative) => alternative(value));
    }

    case "remote": {
      const resolution = resolveReference(descriptor, descent);
      if (resolution.status !== "resolved") {
        warnDegraded(descent, COMPONENT, descriptor, describeResolutionFailure(resolution), "a permissive validator");
        return permissive;
      }
      return validate(resolution.descriptor, resolution.descent);
    }

    case "unsupported":
      warnDegraded(descent, COMPONENT, descriptor, "Unsupported descriptor", "a permissive validator");
      return permissive;

    default:
      warnDegraded(descent, COMPONENT, descriptor, "Unknown descriptor", "a permissive validator");
      return permissive;
  }
}
