/**
 * Shared type definitions for the proptype engine
 */

import type { Logger } from "./logger";
import type { TrialLog } from "./trial-log";

export type PrimitiveKind =
  | "integer"
  | "float"
  | "boolean"
  | "atom"
  | "binary"
  | "bitstring"
  | "string"
  | "charlist"
  | "any"
  | "term"
  | "null";

/**
 * Atoms are registered symbols, so two atoms with the same name compare equal.
 */
export type LiteralValue = number | string | boolean | symbol;

/**
 * A bound is either a concrete number or the unresolved text of a bound expression.
 */
export type Bound = number | string;

/** Positional/source metadata. Ignored by equivalence. */
export type DescriptorMeta = {
  file?: string;
  line?: number;
};

export type PrimitiveDescriptor = {
  kind: "primitive";
  type: PrimitiveKind;
  meta?: DescriptorMeta;
};

export type BoundedIntegerDescriptor = {
  kind: "bounded";
  lower?: Bound;
  upper?: Bound;
  meta?: DescriptorMeta;
};

export type LiteralDescriptor = {
  kind: "literal";
  value: LiteralValue;
  meta?: DescriptorMeta;
};

export type SequenceDescriptor = {
  kind: "sequence";
  element?: TypeDescriptor;
  meta?: DescriptorMeta;
};

export type KeyedSequenceDescriptor = {
  kind: "keyed_sequence";
  key: LiteralValue;
  value: TypeDescriptor;
  meta?: DescriptorMeta;
};

export type TupleDescriptor = {
  kind: "tuple";
  elements: readonly TypeDescriptor[];
  meta?: DescriptorMeta;
};

export type FieldDescriptor = {
  key: TypeDescriptor;
  value: TypeDescriptor;
  required: boolean;
};

export type MappingDescriptor = {
  kind: "mapping";
  fields: readonly FieldDescriptor[];
  meta?: DescriptorMeta;
};

export type RecordDescriptor = {
  kind: "record";
  typeName: string;
  fields: readonly FieldDescriptor[];
  meta?: DescriptorMeta;
};

export type UnionDescriptor = {
  kind: "union";
  alternatives: readonly TypeDescriptor[];
  meta?: DescriptorMeta;
};

export type RemoteReferenceDescriptor = {
  kind: "remote";
  owner: string;
  name: string;
  fallback?: TypeDescriptor;
  meta?: DescriptorMeta;
};

export type UnsupportedDescriptor = {
  kind: "unsupported";
  text: string;
  meta?: DescriptorMeta;
};

export type TypeDescriptor =
  | PrimitiveDescriptor
  | BoundedIntegerDescriptor
  | LiteralDescriptor
  | SequenceDescriptor
  | KeyedSequenceDescriptor
  | TupleDescriptor
  | MappingDescriptor
  | RecordDescriptor
  | UnionDescriptor
  | RemoteReferenceDescriptor
  | UnsupportedDescriptor;

export type DescriptorKind = TypeDescriptor["kind"];

export type Signature = {
  params: readonly TypeDescriptor[];
  returns: TypeDescriptor;
};

export type SignatureLookup = { ok: true; signature: Signature } | { ok: false; error: string };

export interface SignatureSource {
  lookup(name: string): SignatureLookup;
}

export interface DescriptorResolver {
  resolve(owner: string, name: string): TypeDescriptor | undefined;
}

/**
 * What the synthesizers need beyond the descriptor itself.
 */
export type EngineContext = {
  resolver?: DescriptorResolver;
  logger?: Logger;
};

export type Predicate = (value: unknown) => boolean;

/**
 * `fn` is declared as a method so annotated functions such as
 * `(values: number[]) => number[]` are accepted as implementations.
 */
export type ImplementationRef = {
  name: string;
  fn(...args: unknown[]): unknown;
};

export type Implementation = ImplementationRef["fn"];

export type TrialKind = "conformance" | "comparison" | "robustness" | "consistency";

export type FailureKind =
  | "spec_not_found"
  | "spec_mismatch"
  | "validation_failure"
  | "result_divergence"
  | "invalid_input_accepted"
  | "implementation_error"
  | "type_inconsistency";

export type FailureRecord = {
  kind: FailureKind;
  message: string;
  input?: unknown[];
  outputs: unknown[];
  expected?: TypeDescriptor;
};

export type TrialReport =
  | { ok: true; name: string; kind: TrialKind; successes: number; seed: number }
  | { ok: false; name: string; kind: TrialKind; successes: number; seed: number; failure: FailureRecord };

export type TrialOptions = EngineContext & {
  trialCount?: number;
  verboseTrace?: boolean;
  seed?: number;
  timeLimitMs?: number;
  clock?: () => number;
  isErrorSignal?: (output: unknown) => boolean;
  trialLog?: TrialLog;
};

export type Config = {
  envSearchPaths?: string[];
  trialCount?: number;
  verboseTrace?: boolean;
  seed?: number;
  logLevel?: "debug" | "info" | "warn" | "error";
  catalogPath?: string;
};
