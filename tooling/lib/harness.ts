/**
 * Trial harness: conformance, cross-implementation, robustness and
 * definition consistency trials
 */

import * as fc from "fast-check";
import { withCounter } from "./counter";
import { tuple } from "./descriptors";
import { equivalent, equivalentSignatures } from "./equivalence";
import { isAssertionFailure, SpecMismatchError, TrialError } from "./errors";
import { formatDescriptor, formatSignature } from "./format";
import { generator, inputGenerator } from "./generators";
import { invalidInputGenerator } from "./invalid-generators";
import { globalLogger, Logger } from "./logger";
import { Descent, resolveReference, startDescent } from "./resolution";
import { globalTrialLog, TrialLog } from "./trial-log";
import { inferTypeName } from "./type-namer";
import {
  EngineContext,
  FieldDescriptor,
  ImplementationRef,
  Predicate,
  Signature,
  TrialKind,
  TrialOptions,
  TrialReport,
  TypeDescriptor,
} from "./types";
import { formatValue, freshSeed, isPlainObject, valuesEqual } from "./utils";
import { validator } from "./validators";

export const DEFAULT_TRIAL_COUNT = 100;

/**
 * A signature, or a thunk producing one that may throw SpecNotFoundError.
 */
export type SignatureInput = Signature | (() => Signature);

type TrialSettings = {
  trialCount: number;
  verboseTrace: boolean;
  seed: number;
  deadline?: number;
  clock: () => number;
  logger: Logger;
  trialLog: TrialLog;
  context: EngineContext;
};

type TrialPlan = {
  name: string;
  kind: TrialKind;
  successNoun: string;
  /** Runs before any draw; classified errors end the trial immediately. */
  prepare: () => {
    inputs: fc.Arbitrary<unknown[]>;
    check: (input: unknown[]) => void;
  };
};

function settingsFrom(options: TrialOptions): TrialSettings {
  const clock = options.clock ?? Date.now;
  const logger = options.logger ?? globalLogger;
  return {
    trialCount: options.trialCount ?? DEFAULT_TRIAL_COUNT,
    verboseTrace: options.verboseTrace ?? false,
    seed: options.seed ?? freshSeed(),
    deadline: options.timeLimitMs === undefined ? undefined : clock() + options.timeLimitMs,
    clock,
    logger,
    trialLog: options.trialLog ?? globalTrialLog,
    context: { resolver: options.resolver, logger },
  };
}

function resolveSignature(input: SignatureInput): Signature {
  return typeof input === "function" ? input() : input;
}

/**
 * An infinite, lazily drawn sequence. Each batch is sampled from a seed
 * derived from the base seed, so the same seed replays the same draws.
 */
export function* draws<T>(arbitrary: fc.Arbitrary<T>, seed: number, batchSize = DEFAULT_TRIAL_COUNT): Generator<T> {
  for (let batch = 0; ; batch += 1) {
    yield* fc.sample(arbitrary, { numRuns: batchSize, seed: (seed + batch) | 0 });
  }
}

/**
 * Error signals an implementation may return instead of raising: an Error
 * instance or a `{ ok: false }` result.
 */
export function isErrorSignal(output: unknown): boolean {
  return output instanceof Error || (isPlainObject(output) && output.ok === false);
}

function describeError(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : formatValue(error);
}

function invoke(implementation: ImplementationRef, input: unknown[]): unknown {
  try {
    return implementation.fn(...input);
  } catch (error) {
    if (isAssertionFailure(error)) {
      throw error;
    }
    throw new TrialError(
      "implementation_error",
      `${implementation.name} raised ${describeError(error)}`,
      [],
      input
    );
  }
}

function execute(plan: TrialPlan, settings: TrialSettings): TrialReport {
  const { logger, trialLog, seed } = settings;
  trialLog.recordStart(plan.name, plan.kind, seed);
  logger.pushContext({ trial: plan.name, phase: plan.kind });
  logger.startTimer(plan.name);

  try {
    const report = withCounter<TrialReport>((counter) => {
      try {
        const { inputs, check } = plan.prepare();
        const sequence = draws(inputs, seed, Math.max(1, Math.min(settings.trialCount, DEFAULT_TRIAL_COUNT)));
        for (let drawn = 0; drawn < settings.trialCount; drawn += 1) {
          if (settings.deadline !== undefined && settings.clock() >= settings.deadline) {
            logger.debug(`Time budget exhausted after ${drawn} draws`);
            break;
          }
          const next = sequence.next();
          if (next.done) {
            break;
          }
          check(next.value);
          counter.increment();
        }
        return { ok: true, name: plan.name, kind: plan.kind, successes: counter.value, seed };
      } catch (error) {
        if (error instanceof TrialError) {
          return {
            ok: false,
            name: plan.name,
            kind: plan.kind,
            successes: counter.value,
            seed,
            failure: error.toRecord(),
          };
        }
        throw error;
      }
    });

    if (report.ok) {
      logger.info(`✓ ${report.successes} successful ${plan.successNoun}`);
    } else {
      logger.error(report.failure.message, { kind: report.failure.kind, successes: report.successes, seed });
    }
    trialLog.recordReport(report);
    return report;
  } finally {
    logger.endTimer(plan.name, "Trial finished");
    logger.popContext(["trial", "phase"]);
  }
}

/**
 * Draw valid inputs, call the implementation, and check every output against
 * the declared return descriptor.
 */
export function runConformanceTrial(
  implementation: ImplementationRef,
  signatureInput: SignatureInput,
  options: TrialOptions = {}
): TrialReport {
  const settings = settingsFrom(options);
  return execute(
    {
      name: `${implementation.name} satisfies its signature`,
      kind: "conformance",
      successNoun: "property test runs",
      prepare: () => {
        const signature = resolveSignature(signatureInput);
        const conforms = validator(signature.returns, settings.context);
        return {
          inputs: inputGenerator(signature.params, settings.context),
          check: (input) => {
            const output = invoke(implementation, input);
            if (settings.verboseTrace) {
              settings.logger.info(`Input: ${formatValue(input)} -> Output: ${formatValue(output)}`);
            }
            if (!conforms(output)) {
              throw new TrialError(
                "validation_failure",
                `Output type validation failed: ${implementation.name} returned ${formatValue(output)} ` +
                  `(${inferTypeName(output)}) but its signature declares ${formatDescriptor(signature.returns)}`,
                [output],
                input,
                signature.returns
              );
            }
          },
        };
      },
    },
    settings
  );
}

function checkPair(
  first: ImplementationRef,
  second: ImplementationRef,
  returns: Signature["returns"],
  conforms: Predicate,
  input: unknown[],
  outputs: [unknown, unknown]
): void {
  const [firstOutput, secondOutput] = outputs;
  const firstValid = conforms(firstOutput);
  const secondValid = conforms(secondOutput);

  if (!firstValid && !secondValid) {
    throw new TrialError(
      "validation_failure",
      `Neither ${first.name} nor ${second.name} returned a value of the expected type`,
      outputs,
      input,
      returns
    );
  }
  if (!firstValid || !secondValid) {
    const invalid = firstValid ? second : first;
    throw new TrialError(
      "result_divergence",
      `${invalid.name} output ${formatValue(firstValid ? secondOutput : firstOutput)} does not match expected type`,
      outputs,
      input,
      returns
    );
  }
  if (!valuesEqual(firstOutput, secondOutput)) {
    throw new TrialError(
      "result_divergence",
      `Functions produced different results: ${formatValue(firstOutput)} != ${formatValue(secondOutput)}`,
      outputs,
      input,
      returns
    );
  }
}

/**
 * Run two implementations with equivalent signatures on the same inputs and
 * require valid, equal outputs.
 */
export function runComparisonTrial(
  first: ImplementationRef,
  firstSignature: SignatureInput,
  second: ImplementationRef,
  secondSignature: SignatureInput,
  options: TrialOptions = {}
): TrialReport {
  const settings = settingsFrom(options);
  return execute(
    {
      name: `${first.name} and ${second.name} produce identical results`,
      kind: "comparison",
      successNoun: "comparison runs",
      prepare: () => {
        const a = resolveSignature(firstSignature);
        const b = resolveSignature(secondSignature);
        if (!equivalentSignatures(a, b)) {
          throw new SpecMismatchError(first.name, second.name, formatSignature(a), formatSignature(b));
        }
        const conforms = validator(a.returns, settings.context);
        return {
          inputs: inputGenerator(a.params, settings.context),
          check: (input) => {
            const firstOutput = invoke(first, input);
            const secondOutput = invoke(second, input);
            if (settings.verboseTrace) {
              settings.logger.info(
                `Input: ${formatValue(input)}\n  ${first.name}: ${formatValue(firstOutput)}\n  ${second.name}: ${formatValue(secondOutput)}`
              );
            }
            checkPair(first, second, a.returns, conforms, input, [firstOutput, secondOutput]);
          },
        };
      },
    },
    settings
  );
}

/**
 * Draw invalid inputs and require the implementation to raise or return an
 * error signal for every one of them.
 */
export function runRobustnessTrial(
  implementation: ImplementationRef,
  signatureInput: SignatureInput,
  options: TrialOptions = {}
): TrialReport {
  const settings = settingsFrom(options);
  const signalsError = options.isErrorSignal ?? isErrorSignal;
  return execute(
    {
      name: `${implementation.name} properly rejects invalid input`,
      kind: "robustness",
      successNoun: "invalid input test runs",
      prepare: () => {
        const signature = resolveSignature(signatureInput);
        return {
          inputs: invalidInputGenerator(signature.params, settings.context),
          check: (input) => {
            let output: unknown;
            try {
              output = implementation.fn(...input);
            } catch (error) {
              if (isAssertionFailure(error)) {
                throw error;
              }
              if (settings.verboseTrace) {
                settings.logger.info(`Invalid input: ${formatValue(input)} -> Exception: ${describeError(error)} ✓`);
              }
              return;
            }

            if (signalsError(output)) {
              if (settings.verboseTrace) {
                settings.logger.info(`Invalid input: ${formatValue(input)} -> Error result: ${formatValue(output)} ✓`);
              }
              return;
            }

            if (settings.verboseTrace) {
              settings.logger.info(`Invalid input: ${formatValue(input)} -> Output: ${formatValue(output)}`);
            }
            throw new TrialError(
              "invalid_input_accepted",
              `${implementation.name} accepted invalid input ${formatValue(input)} without validation and returned ` +
                `${formatValue(output)}. Expected it to raise an error or return an error result.`,
              [output],
              input,
              tuple(signature.params)
            );
          },
        };
      },
    },
    settings
  );
}

/**
 * Follow references until a mapping or record turns up. Anything else,
 * including an unresolvable reference, has no fields to compare.
 */
function aggregateOf(
  descriptor: TypeDescriptor,
  descent: Descent
): Extract<TypeDescriptor, { kind: "mapping" | "record" }> | undefined {
  if (descriptor.kind === "mapping" || descriptor.kind === "record") {
    return descriptor;
  }
  if (descriptor.kind !== "remote") {
    return undefined;
  }
  const resolution = resolveReference(descriptor, descent);
  return resolution.status === "resolved" ? aggregateOf(resolution.descriptor, resolution.descent) : undefined;
}

function fieldMismatches(
  definition: readonly FieldDescriptor[],
  expected: readonly FieldDescriptor[],
  functionName: string
): string[] {
  const mismatches: string[] = [];
  for (const field of definition) {
    const counterpart = expected.find((candidate) => equivalent(candidate.key, field.key));
    if (counterpart && !equivalent(counterpart.value, field.value)) {
      mismatches.push(
        `field ${formatDescriptor(field.key)} as ${formatDescriptor(field.value)} ` +
          `but ${functionName} expects ${formatDescriptor(counterpart.value)}`
      );
    }
  }
  return mismatches;
}

/**
 * Check a tagged record definition against the single parameter of a
 * function: draw values of the definition, call the function, and require
 * outputs of its declared return type. Field types that disagree between the
 * two are named in the failure.
 */
export function runConsistencyTrial(
  implementation: ImplementationRef,
  definitionInput: TypeDescriptor | (() => TypeDescriptor),
  signatureInput: SignatureInput,
  options: TrialOptions = {}
): TrialReport {
  const settings = settingsFrom(options);
  return execute(
    {
      name: `${implementation.name} accepts its record definition`,
      kind: "consistency",
      successNoun: "consistency runs",
      prepare: () => {
        const signature = resolveSignature(signatureInput);
        const descent = startDescent(settings.context);
        const declared = typeof definitionInput === "function" ? definitionInput() : definitionInput;
        const definition = aggregateOf(declared, descent);
        if (!definition || definition.kind !== "record") {
          throw new TrialError(
            "spec_mismatch",
            `${formatDescriptor(declared)} is not a tagged record definition`,
            [],
            undefined,
            declared
          );
        }
        if (signature.params.length !== 1) {
          throw new TrialError(
            "spec_mismatch",
            `${implementation.name} takes ${signature.params.length} parameters, a record check needs exactly one`
          );
        }
        const parameter = aggregateOf(signature.params[0], descent);
        if (!parameter) {
          throw new TrialError(
            "spec_mismatch",
            `${implementation.name} expects ${formatDescriptor(signature.params[0])}, not a record`
          );
        }

        const mismatches = fieldMismatches(definition.fields, parameter.fields, implementation.name);
        const headline =
          mismatches.length > 0
            ? `Type inconsistency: ${definition.typeName} defines ${mismatches.join("; ")}`
            : `Type inconsistency: ${implementation.name} does not work with values of ${definition.typeName}`;
        const conforms = validator(signature.returns, settings.context);

        return {
          inputs: generator(definition, settings.context).map((value) => [value]),
          check: (input) => {
            let output: unknown;
            try {
              output = implementation.fn(...input);
            } catch (error) {
              if (isAssertionFailure(error)) {
                throw error;
              }
              throw new TrialError(
                "type_inconsistency",
                `${headline}. Error: ${describeError(error)}`,
                [],
                input,
                definition
              );
            }
            if (settings.verboseTrace) {
              settings.logger.info(`Input: ${formatValue(input)} -> Output: ${formatValue(output)}`);
            }
            if (!conforms(output)) {
              throw new TrialError(
                "type_inconsistency",
                `${headline}. This causes ${implementation.name} to return invalid output ${formatValue(output)}`,
                [output],
                input,
                signature.returns
              );
            }
          },
        };
      },
    },
    settings
  );
}
