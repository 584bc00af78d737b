import { describe, it, expect, beforeEach } from "@jest/globals";
import { strictEqual } from "assert";
import * as fc from "fast-check";
import { withCounter, TrialCounter } from "../tooling/lib/counter";
import {
  binary,
  field,
  float,
  integer,
  mapping,
  positiveInteger,
  record,
  remote,
  sequence,
  string,
  tuple,
} from "../tooling/lib/descriptors";
import { SpecNotFoundError } from "../tooling/lib/errors";
import {
  draws,
  isErrorSignal,
  runComparisonTrial,
  runConformanceTrial,
  runConsistencyTrial,
  runRobustnessTrial,
} from "../tooling/lib/harness";
import { Logger } from "../tooling/lib/logger";
import { TrialLog } from "../tooling/lib/trial-log";
import { DescriptorResolver, Signature, TrialOptions, TypeDescriptor } from "../tooling/lib/types";
import { insertionSort, mergeSort, safeDivide, textSort, unsafeDivide } from "../examples/sorting";

const sortSignature: Signature = { params: [sequence(integer())], returns: sequence(integer()) };
const divideSignature: Signature = { params: [integer(), positiveInteger()], returns: integer() };

function numbers(value: unknown): number[] {
  if (!Array.isArray(value) || !value.every((item) => typeof item === "number")) {
    throw new TypeError("expected a list of numbers");
  }
  return value;
}

function balanceOf(value: unknown): number {
  if (typeof value !== "object" || value === null || !("balance" in value) || typeof value.balance !== "number") {
    throw new TypeError("expected an account");
  }
  return value.balance;
}

function toNumber(value: unknown): number {
  if (typeof value !== "number") {
    throw new TypeError("expected a number");
  }
  return value;
}

const sorters = {
  insertionSort: { name: "insertionSort", fn: (values: unknown) => insertionSort(numbers(values)) },
  mergeSort: { name: "mergeSort", fn: (values: unknown) => mergeSort(numbers(values)) },
  textSort: { name: "textSort", fn: (values: unknown) => textSort(numbers(values)) },
};

describe("trial harness", () => {
  let logger: Logger;
  let trialLog: TrialLog;
  let options: TrialOptions;

  beforeEach(() => {
    logger = new Logger("debug", false);
    trialLog = new TrialLog();
    options = { logger, trialLog, seed: 42 };
  });

  describe("runConformanceTrial", () => {
    it("should pass a conforming implementation after the default 100 draws", () => {
      expect(runConformanceTrial(sorters.insertionSort, sortSignature, options)).toEqual({
        ok: true,
        name: "insertionSort satisfies its signature",
        kind: "conformance",
        successes: 100,
        seed: 42,
      });
    });

    it("should honour trial counts beyond one sample batch", () => {
      const report = runConformanceTrial(sorters.mergeSort, sortSignature, { ...options, trialCount: 250 });
      expect(report.successes).toBe(250);
    });

    it("should report the input, output and expected type of a non-conforming output", () => {
      const report = runConformanceTrial({ name: "stringify", fn: () => "x" }, sortSignature, options);

      expect(report.ok).toBe(false);
      if (report.ok) return;
      expect(report.successes).toBe(0);
      expect(report.failure.kind).toBe("validation_failure");
      expect(report.failure.message).toBe(
        "Output type validation failed: stringify returned 'x' (string) but its signature declares list(integer)"
      );
      expect(report.failure.outputs).toEqual(["x"]);
      expect(report.failure.expected).toEqual(sequence(integer()));
      expect(report.failure.input).toHaveLength(1);
    });

    it("should classify a throwing implementation", () => {
      const report = runConformanceTrial(
        {
          name: "explode",
          fn: () => {
            throw new Error("boom");
          },
        },
        sortSignature,
        options
      );

      expect(report.ok).toBe(false);
      if (report.ok) return;
      expect(report.failure.kind).toBe("implementation_error");
      expect(report.failure.message).toBe("explode raised Error: boom");
    });

    it("should report a missing signature without drawing", () => {
      const missing = (): Signature => {
        throw new SpecNotFoundError("ghost", "No function named ghost was found");
      };
      const report = runConformanceTrial({ name: "ghost", fn: () => 1 }, missing, options);

      expect(report.ok).toBe(false);
      if (report.ok) return;
      expect(report.successes).toBe(0);
      expect(report.failure).toEqual({
        kind: "spec_not_found",
        message: "Could not resolve a signature for ghost: No function named ghost was found",
        outputs: [],
      });
    });

    it("should let assertion failures escape the trial", () => {
      const asserting = {
        name: "asserting",
        fn: () => {
          strictEqual(1, 2);
          return [];
        },
      };
      expect(() => runConformanceTrial(asserting, sortSignature, options)).toThrow(/Expected values to be strictly equal/);
      expect(trialLog.getSummary().totalTrials).toBe(0);
    });

    it("should stop when the time budget runs out", () => {
      let now = 0;
      const report = runConformanceTrial(sorters.insertionSort, sortSignature, {
        ...options,
        timeLimitMs: 5,
        clock: () => now++,
      });
      expect(report).toMatchObject({ ok: true, successes: 4 });
    });

    it("should trace inputs and outputs when verbose", () => {
      runConformanceTrial(sorters.insertionSort, sortSignature, { ...options, trialCount: 3, verboseTrace: true });

      const messages = logger.getEntries().map((entry) => entry.message);
      expect(messages.filter((message) => message.startsWith("Input: "))).toHaveLength(3);
      expect(messages).toContain("✓ 3 successful property test runs");
    });

    it("should log under the trial's context", () => {
      runConformanceTrial(sorters.insertionSort, sortSignature, { ...options, trialCount: 1 });
      const summary = logger.getEntries().find((entry) => entry.message === "✓ 1 successful property test runs");
      expect(summary?.context).toEqual({ trial: "insertionSort satisfies its signature", phase: "conformance" });
    });
  });

  describe("runComparisonTrial", () => {
    it("should pass equivalent implementations with 100 successes", () => {
      const report = runComparisonTrial(
        sorters.insertionSort,
        sortSignature,
        sorters.mergeSort,
        sortSignature,
        options
      );
      expect(report).toEqual({
        ok: true,
        name: "insertionSort and mergeSort produce identical results",
        kind: "comparison",
        successes: 100,
        seed: 42,
      });
      expect(logger.getEntries().map((entry) => entry.message)).toContain("✓ 100 successful comparison runs");
    });

    it("should report diverging results with both outputs", () => {
      const report = runComparisonTrial(sorters.insertionSort, sortSignature, sorters.textSort, sortSignature, options);

      expect(report.ok).toBe(false);
      if (report.ok) return;
      expect(report.failure.kind).toBe("result_divergence");
      expect(report.failure.message.startsWith("Functions produced different results: ")).toBe(true);
      expect(report.failure.outputs).toHaveLength(2);
      expect(report.failure.outputs[0]).not.toEqual(report.failure.outputs[1]);
    });

    it("should find the same divergence for the same seed", () => {
      const first = runComparisonTrial(sorters.insertionSort, sortSignature, sorters.textSort, sortSignature, options);
      const second = runComparisonTrial(sorters.insertionSort, sortSignature, sorters.textSort, sortSignature, options);
      expect(second).toEqual(first);
    });

    it("should count 0 and -0 as the same result", () => {
      const floatSignature: Signature = { params: [float()], returns: float() };
      const report = runComparisonTrial(
        { name: "negativeZero", fn: () => -0 },
        floatSignature,
        { name: "zero", fn: () => 0 },
        floatSignature,
        options
      );
      expect(report).toMatchObject({ ok: true, successes: 100 });
    });

    it("should still tell nested values apart", () => {
      const listSignature: Signature = { params: [float()], returns: sequence(float()) };
      const report = runComparisonTrial(
        { name: "nested", fn: () => [-0, 1] },
        listSignature,
        { name: "other", fn: () => [0, 2] },
        listSignature,
        options
      );
      expect(report.ok).toBe(false);
      if (report.ok) return;
      expect(report.failure.kind).toBe("result_divergence");
    });

    it("should treat one invalid output as a divergence", () => {
      const report = runComparisonTrial(
        sorters.insertionSort,
        sortSignature,
        { name: "broken", fn: () => "x" },
        sortSignature,
        options
      );
      expect(report.ok).toBe(false);
      if (report.ok) return;
      expect(report.failure.kind).toBe("result_divergence");
      expect(report.failure.message).toBe("broken output 'x' does not match expected type");
    });

    it("should treat two invalid outputs as a validation failure", () => {
      const report = runComparisonTrial(
        { name: "a", fn: () => "x" },
        sortSignature,
        { name: "b", fn: () => "x" },
        sortSignature,
        options
      );
      expect(report.ok).toBe(false);
      if (report.ok) return;
      expect(report.failure.kind).toBe("validation_failure");
      expect(report.failure.outputs).toEqual(["x", "x"]);
    });

    it("should compare implementations whose parameter fields are listed in another order", () => {
      const first: Signature = { params: [mapping([field("a", integer()), field("b", string())])], returns: integer() };
      const second: Signature = { params: [mapping([field("b", string()), field("a", integer())])], returns: integer() };
      const report = runComparisonTrial({ name: "f", fn: () => 1 }, first, { name: "g", fn: () => 1 }, second, options);

      expect(report).toMatchObject({ ok: true, successes: 100 });
    });

    it("should refuse to compare mismatched signatures", () => {
      const floats: Signature = { params: [sequence(float())], returns: sequence(float()) };
      const report = runComparisonTrial(sorters.insertionSort, sortSignature, sorters.mergeSort, floats, options);

      expect(report.ok).toBe(false);
      if (report.ok) return;
      expect(report.successes).toBe(0);
      expect(report.failure.kind).toBe("spec_mismatch");
      expect(report.failure.message).toBe(
        "Function signatures do not match: insertionSort has (list(integer)) -> list(integer), " +
          "mergeSort has (list(float)) -> list(float)"
      );
    });
  });

  describe("runRobustnessTrial", () => {
    it("should pass an implementation that rejects every invalid input", () => {
      const guarded = { name: "safeDivide", fn: (a: unknown, b: unknown) => safeDivide(toNumber(a), toNumber(b)) };
      const report = runRobustnessTrial(guarded, divideSignature, options);

      expect(report).toEqual({
        ok: true,
        name: "safeDivide properly rejects invalid input",
        kind: "robustness",
        successes: 100,
        seed: 42,
      });
      expect(logger.getEntries().map((entry) => entry.message)).toContain("✓ 100 successful invalid input test runs");
    });

    it("should fail an implementation that accepts invalid input", () => {
      // Arithmetic on strings, lists and maps yields NaN or a number instead of an error.
      const unguarded = {
        name: "unsafeDivide",
        fn: (a: unknown, b: unknown) => unsafeDivide(Number(a), Number(b)),
      };
      const report = runRobustnessTrial(unguarded, divideSignature, options);

      expect(report.ok).toBe(false);
      if (report.ok) return;
      expect(report.failure.kind).toBe("invalid_input_accepted");
      expect(report.failure.expected).toEqual(tuple([integer(), positiveInteger()]));
      expect(report.failure.message.startsWith("unsafeDivide accepted invalid input ")).toBe(true);
    });

    it("should count returned error values as rejections", () => {
      const returnsError = { name: "returnsError", fn: () => new RangeError("bad input") };
      const returnsResult = { name: "returnsResult", fn: () => ({ ok: false, error: "bad input" }) };

      expect(runRobustnessTrial(returnsError, divideSignature, options).ok).toBe(true);
      expect(runRobustnessTrial(returnsResult, divideSignature, options).ok).toBe(true);
    });

    it("should accept a custom error signal", () => {
      const returnsNull = { name: "returnsNull", fn: () => null };
      expect(runRobustnessTrial(returnsNull, divideSignature, options).ok).toBe(false);
      expect(
        runRobustnessTrial(returnsNull, divideSignature, { ...options, isErrorSignal: (output) => output === null }).ok
      ).toBe(true);
    });

    it("should not mistake assertion failures for rejections", () => {
      const asserting = {
        name: "asserting",
        fn: () => {
          expect(true).toBe(false);
        },
      };
      expect(() => runRobustnessTrial(asserting, divideSignature, options)).toThrow();
    });

    it("should let node assertion errors escape instead of counting them as rejections", () => {
      const asserting = {
        name: "asserting",
        fn: () => {
          strictEqual(1, 2);
        },
      };
      const bytesSignature: Signature = { params: [binary()], returns: integer() };
      expect(() => runRobustnessTrial(asserting, bytesSignature, options)).toThrow(/Expected values to be strictly equal/);
    });
  });

  describe("runConsistencyTrial", () => {
    const account = record("Account", [field("id", positiveInteger()), field("balance", integer())]);
    const looseAccount = record("Account", [field("id", positiveInteger()), field("balance", float())]);
    const ledgerSignature: Signature = { params: [mapping([field("balance", integer())])], returns: integer() };
    const double = { name: "double", fn: (value: unknown) => balanceOf(value) * 2 };

    it("should pass when the function accepts every value of the definition", () => {
      expect(runConsistencyTrial(double, account, ledgerSignature, options)).toEqual({
        ok: true,
        name: "double accepts its record definition",
        kind: "consistency",
        successes: 100,
        seed: 42,
      });
    });

    it("should follow aliases on either side", () => {
      const types: Record<string, TypeDescriptor> = {
        "ledger.Entry": mapping([field("balance", integer())]),
        ".Account": account,
      };
      const resolver: DescriptorResolver = { resolve: (owner, name) => types[`${owner}.${name}`] };
      const aliased: Signature = { params: [remote("ledger", "Entry")], returns: integer() };
      const report = runConsistencyTrial(double, remote("", "Account"), aliased, { ...options, resolver });
      expect(report).toMatchObject({ ok: true, successes: 100 });
    });

    it("should name the disagreeing field when outputs go wrong", () => {
      const identity = { name: "identity", fn: (value: unknown) => balanceOf(value) };
      const report = runConsistencyTrial(identity, looseAccount, ledgerSignature, options);

      expect(report.ok).toBe(false);
      if (report.ok) return;
      expect(report.failure.kind).toBe("type_inconsistency");
      expect(report.failure.message).toMatch(
        new RegExp(
          '^Type inconsistency: Account defines field "balance" as float but identity expects integer\\. ' +
            "This causes identity to return invalid output "
        )
      );
      expect(report.failure.expected).toEqual(integer());
    });

    it("should report errors raised for values of the definition", () => {
      const settle = {
        name: "settle",
        fn: (value: unknown) => {
          const balance = balanceOf(value);
          if (!Number.isInteger(balance)) {
            throw new RangeError("balance must be whole");
          }
          return balance;
        },
      };
      const report = runConsistencyTrial(settle, looseAccount, ledgerSignature, options);

      expect(report.ok).toBe(false);
      if (report.ok) return;
      expect(report.failure.message).toBe(
        'Type inconsistency: Account defines field "balance" as float but settle expects integer. ' +
          "Error: RangeError: balance must be whole"
      );
    });

    it("should blame the function when matching fields still fail", () => {
      const closed = {
        name: "closed",
        fn: () => {
          throw new Error("ledger closed");
        },
      };
      const report = runConsistencyTrial(closed, account, ledgerSignature, options);

      expect(report).toMatchObject({ ok: false, successes: 0 });
      if (report.ok) return;
      expect(report.failure.message).toBe(
        "Type inconsistency: closed does not work with values of Account. Error: Error: ledger closed"
      );
    });

    it("should refuse definitions and signatures without a record to compare", () => {
      const untagged = runConsistencyTrial(double, mapping([field("balance", integer())]), ledgerSignature, options);
      const pair = runConsistencyTrial(double, account, divideSignature, options);
      const scalar = runConsistencyTrial(double, account, { params: [float()], returns: integer() }, options);

      expect([untagged, pair, scalar].map((report) => (report.ok ? "" : report.failure.message))).toEqual([
        '%{required("balance") => integer} is not a tagged record definition',
        "double takes 2 parameters, a record check needs exactly one",
        "double expects float, not a record",
      ]);
      expect(untagged).toMatchObject({ ok: false, failure: { kind: "spec_mismatch" } });
    });
  });

  it("should record every trial in the trial log", () => {
    runConformanceTrial(sorters.insertionSort, sortSignature, options);
    runConformanceTrial({ name: "stringify", fn: () => "x" }, sortSignature, options);

    expect(trialLog.getSummary()).toMatchObject({ totalEntries: 4, totalTrials: 2, passed: 1, failed: 1 });
  });
});

describe("isErrorSignal", () => {
  it("should recognise errors and failed results", () => {
    expect(isErrorSignal(new Error("x"))).toBe(true);
    expect(isErrorSignal({ ok: false })).toBe(true);
    expect(isErrorSignal({ ok: true })).toBe(false);
    expect(isErrorSignal(null)).toBe(false);
    expect(isErrorSignal("error")).toBe(false);
  });
});

describe("draws", () => {
  it("should continue with a derived seed after each batch", () => {
    const stream = draws(fc.integer(), 3, 2);
    const taken = Array.from({ length: 5 }, () => stream.next().value);

    expect(taken).toEqual([
      ...fc.sample(fc.integer(), { numRuns: 2, seed: 3 }),
      ...fc.sample(fc.integer(), { numRuns: 2, seed: 4 }),
      fc.sample(fc.integer(), { numRuns: 1, seed: 5 })[0],
    ]);
  });
});

describe("TrialCounter", () => {
  it("should count until released", () => {
    const counter = new TrialCounter();
    counter.increment();
    counter.increment();
    expect(counter.value).toBe(2);

    counter.release();
    expect(() => counter.increment()).toThrow("Trial counter used after its trial ended");
    expect(counter.value).toBe(2);
  });

  it("should release the counter even when the body throws", () => {
    let captured: TrialCounter | undefined;
    expect(() =>
      withCounter((counter) => {
        captured = counter;
        throw new Error("stop");
      })
    ).toThrow("stop");
    expect(captured?.isReleased).toBe(true);
  });
});
