/**
 * Marker types for annotating signatures the describe tooling reads.
 * They are plain aliases: the alias name carries the constraint, and at
 * runtime the values are ordinary numbers, symbols, byte arrays and lists.
 */

export type Integer = number;
export type Float = number;
export type NonNegativeInteger = number;
export type PositiveInteger = number;
export type NegativeInteger = number;

/** An integer between `Lower` and `Upper`, both inclusive. */
export type IntRange<Lower extends number, Upper extends number> = number;

export type Atom = symbol;
export type Binary = Uint8Array;
export type Bitstring = Uint8Array;
/** A list of Unicode code points. */
export type Charlist = number[];
export type Term = unknown;
