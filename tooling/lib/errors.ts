/**
 * Error classes for trial classification and assertion-level failures
 */

import { formatDescriptor } from "./format";
import { FailureKind, FailureRecord, TrialReport, TypeDescriptor } from "./types";
import { formatValue } from "./utils";

/**
 * A classified failure that ends one trial and becomes its failure record.
 */
export class TrialError extends Error {
  constructor(
    readonly kind: FailureKind,
    message: string,
    readonly outputs: unknown[] = [],
    readonly input?: unknown[],
    readonly expected?: TypeDescriptor
  ) {
    super(message);
    this.name = "TrialError";
  }

  toRecord(): FailureRecord {
    const record: FailureRecord = { kind: this.kind, message: this.message, outputs: this.outputs };
    if (this.input !== undefined) record.input = this.input;
    if (this.expected !== undefined) record.expected = this.expected;
    return record;
  }
}

export class SpecNotFoundError extends TrialError {
  constructor(readonly target: string, reason: string) {
    super("spec_not_found", `Could not resolve a signature for ${target}: ${reason}`);
    this.name = "SpecNotFoundError";
  }
}

export class SpecMismatchError extends TrialError {
  constructor(first: string, second: string, firstText: string, secondText: string) {
    super(
      "spec_mismatch",
      `Function signatures do not match: ${first} has ${firstText}, ${second} has ${secondText}`
    );
    this.name = "SpecMismatchError";
  }
}

/**
 * Thrown by registered trial units when a trial fails. Assertion-level: the
 * harness never reinterprets it as an implementation's rejection of input.
 */
export class TrialFailureError extends Error {
  constructor(readonly report: Extract<TrialReport, { ok: false }>) {
    super(describeFailure(report.failure));
    this.name = "TrialFailureError";
  }
}

export function describeFailure(failure: FailureRecord): string {
  const lines = [`[${failure.kind}] ${failure.message}`];
  if (failure.input !== undefined) {
    lines.push(`  input: ${formatValue(failure.input)}`);
  }
  failure.outputs.forEach((output, index) => {
    const label = failure.outputs.length > 1 ? `output ${index + 1}` : "output";
    lines.push(`  ${label}: ${formatValue(output)}`);
  });
  if (failure.expected !== undefined) {
    lines.push(`  expected: ${formatDescriptor(failure.expected)}`);
  }
  return lines.join("\n");
}

/**
 * Failures raised by assertions (this harness, node:assert, Jest matchers)
 * rather than by the code under test rejecting its input. Checked by shape:
 * `assert` builds its errors in the host realm, so under Jest's sandbox they
 * are not instances of the test's `Error`.
 */
export function isAssertionFailure(error: unknown): boolean {
  if (error instanceof TrialFailureError) {
    return true;
  }
  if (typeof error !== "object" || error === null) {
    return false;
  }
  return ("name" in error && error.name === "AssertionError") || "matcherResult" in error;
}
