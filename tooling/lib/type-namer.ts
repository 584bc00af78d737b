/**
 * Human-readable type names for runtime values, used in failure messages only
 */

import { RECORD_TAG } from "./descriptors";
import { isPlainObject } from "./utils";

export function inferTypeName(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";

  switch (typeof value) {
    case "number":
      return Number.isInteger(value) ? "integer" : "float";
    case "boolean":
      return "boolean";
    case "symbol":
      return "atom";
    case "string":
      return "string";
    case "bigint":
      return "bigint";
    case "function":
      return "function";
    default:
      break;
  }

  if (value instanceof Uint8Array) return "binary";
  if (Array.isArray(value)) return "list";
  if (isPlainObject(value)) {
    const tag = value[RECORD_TAG];
    return typeof tag === "string" ? `record ${tag}` : "map";
  }

  const constructorName: unknown = Object.getPrototypeOf(value)?.constructor?.name;
  return typeof constructorName === "string" && constructorName !== "" ? constructorName : "object";
}
