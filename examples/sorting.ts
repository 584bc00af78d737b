/**
 * Sample annotated functions: run `proptype-describe examples/sorting.ts`
 * to print their descriptors, or see tests/examples.test.ts for the trials.
 */

import { Atom, Integer, IntRange, NonNegativeInteger, PositiveInteger } from "../src/markers";

export interface Account {
  __type: "Account";
  id: PositiveInteger;
  owner: string;
  status: "open" | "frozen";
}

/** Amounts may carry cents. */
export interface Payment {
  __type: "Payment";
  amount: number;
  payee: string;
}

export type Labeled = [Integer, string];

export function insertionSort(values: Integer[]): Integer[] {
  const sorted: Integer[] = [];
  for (const value of values) {
    let index = sorted.length;
    while (index > 0 && sorted[index - 1] > value) {
      index -= 1;
    }
    sorted.splice(index, 0, value);
  }
  return sorted;
}

export const mergeSort = (values: Integer[]): Integer[] => {
  if (values.length <= 1) {
    return [...values];
  }
  const middle = Math.floor(values.length / 2);
  const left = mergeSort(values.slice(0, middle));
  const right = mergeSort(values.slice(middle));
  const merged: Integer[] = [];
  while (left.length > 0 && right.length > 0) {
    const next = left[0] <= right[0] ? left.shift() : right.shift();
    if (next !== undefined) merged.push(next);
  }
  return [...merged, ...left, ...right];
};

/** Sorts lexicographically, so [10, 9] stays [10, 9]. */
export function textSort(values: Integer[]): Integer[] {
  return [...values].sort();
}

export function clampPercent(value: Integer): IntRange<0, 100> {
  return Math.min(100, Math.max(0, value));
}

export function countDigits(value: Integer): NonNegativeInteger {
  return String(Math.abs(value)).length;
}

export function safeDivide(dividend: Integer, divisor: PositiveInteger): Integer {
  if (!Number.isInteger(dividend) || !Number.isInteger(divisor) || divisor < 1) {
    throw new RangeError("safeDivide expects an integer and a positive integer");
  }
  return Math.trunc(dividend / divisor);
}

export function unsafeDivide(dividend: Integer, divisor: PositiveInteger): Integer {
  return Math.trunc(dividend / divisor);
}

export function labelFor(pair: Labeled): string {
  if (!Array.isArray(pair) || pair.length !== 2 || !Number.isInteger(pair[0]) || typeof pair[1] !== "string") {
    return "";
  }
  return `${pair[1]}#${pair[0]}`;
}

export function openAccount(id: PositiveInteger, owner: string): Account {
  return { __type: "Account", id, owner, status: "open" };
}

export function statusOf(account: Account): Atom {
  return Symbol.for(account.status);
}

/** Written for whole amounts, so a Payment with cents yields a fractional fee. */
export function feeFor(payment: { amount: Integer }): Integer {
  return payment.amount % 7;
}
