/**
 * Canonical fast-check arbitraries for each runtime shape
 */

import * as fc from "fast-check";
import { atom } from "./descriptors";

const ATOM_NAME = /^[a-zA-Z][a-zA-Z0-9_]{0,11}$/;
const MAX_CODE_POINT = 0x10ffff;

export const atomName = (): fc.Arbitrary<string> => fc.stringMatching(ATOM_NAME);

export const atomValue = (): fc.Arbitrary<symbol> => atomName().map(atom);

export const integerValue = (): fc.Arbitrary<number> => fc.integer();

export const floatValue = (): fc.Arbitrary<number> =>
  fc.double({ noNaN: true, noDefaultInfinity: true });

/** Floats that no integer validator accepts. */
export const nonIntegerFloat = (): fc.Arbitrary<number> =>
  fc.double({ min: -1e6, max: 1e6, noNaN: true }).filter((value) => !Number.isInteger(value));

export const printableString = (): fc.Arbitrary<string> => fc.string();

export const bytes = (): fc.Arbitrary<Uint8Array> => fc.uint8Array();

export const charlistValue = (): fc.Arbitrary<number[]> =>
  fc.array(fc.integer({ min: 0, max: MAX_CODE_POINT }));

export const anyValue = (): fc.Arbitrary<unknown> => fc.anything();

export const listOf = <T>(element: fc.Arbitrary<T>): fc.Arbitrary<T[]> => fc.array(element);

/** A plain object with atom-like string keys. */
export const dictionary = (): fc.Arbitrary<Record<string, unknown>> =>
  fc.dictionary(atomName(), fc.anything(), { maxKeys: 5 });

export const integerBetween = (min: number, max: number): fc.Arbitrary<number> => fc.integer({ min, max });

/**
 * Uniform choice. A single arbitrary is returned as is.
 */
export function oneOf(arbitraries: readonly fc.Arbitrary<unknown>[]): fc.Arbitrary<unknown> {
  if (arbitraries.length === 1) {
    return arbitraries[0];
  }
  return fc.oneof(...arbitraries);
}
