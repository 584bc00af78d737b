/**
 * Runtime trial suite: declare trials against a signature source and hand
 * them to a test runner as named units
 */

import type { ConfigManager } from "./config";
import { remote } from "./descriptors";
import { SpecNotFoundError, TrialFailureError } from "./errors";
import {
  runComparisonTrial,
  runConformanceTrial,
  runConsistencyTrial,
  runRobustnessTrial,
  SignatureInput,
} from "./harness";
import {
  DescriptorResolver,
  Implementation,
  ImplementationRef,
  Signature,
  SignatureSource,
  TrialKind,
  TrialOptions,
  TrialReport,
} from "./types";

export interface TrialUnit {
  name: string;
  kind: TrialKind;
  run(): TrialReport;
}

/** The shape of Jest's `test`/`it`. */
export type TestRegistrar = (name: string, fn: () => void) => void;

export interface TrialSuiteOptions {
  source: SignatureSource;
  resolver?: DescriptorResolver;
  /** Defaults for trial count, tracing and seed; `options` wins per key. */
  config?: ConfigManager;
  options?: TrialOptions;
}

export class TrialSuite {
  private readonly entries: TrialUnit[] = [];
  private readonly source: SignatureSource;
  private readonly options: TrialOptions;

  constructor({ source, resolver, config, options = {} }: TrialSuiteOptions) {
    this.source = source;
    this.options = { ...config?.trialOptions(), ...options, resolver: resolver ?? options.resolver };
  }

  /** Signature lookups are deferred until the unit runs. */
  private signatureOf(name: string): SignatureInput {
    return (): Signature => {
      const lookup = this.source.lookup(name);
      if (!lookup.ok) {
        throw new SpecNotFoundError(name, lookup.error);
      }
      return lookup.signature;
    };
  }

  conformance(name: string, fn: Implementation): this {
    const implementation: ImplementationRef = { name, fn };
    this.entries.push({
      name: `${name} satisfies its signature`,
      kind: "conformance",
      run: () => runConformanceTrial(implementation, this.signatureOf(name), this.options),
    });
    return this;
  }

  compare(first: ImplementationRef, second: ImplementationRef): this {
    this.entries.push({
      name: `${first.name} and ${second.name} produce identical results`,
      kind: "comparison",
      run: () =>
        runComparisonTrial(first, this.signatureOf(first.name), second, this.signatureOf(second.name), this.options),
    });
    return this;
  }

  robust(name: string, fn: Implementation): this {
    const implementation: ImplementationRef = { name, fn };
    this.entries.push({
      name: `${name} properly rejects invalid input`,
      kind: "robustness",
      run: () => runRobustnessTrial(implementation, this.signatureOf(name), this.options),
    });
    return this;
  }

  /**
   * Check the record type `typeName` (looked up in `owner`, or any file when
   * empty) against the single parameter `name` declares.
   */
  consistency(name: string, fn: Implementation, typeName: string, owner = ""): this {
    const implementation: ImplementationRef = { name, fn };
    this.entries.push({
      name: `${name} accepts its record definition`,
      kind: "consistency",
      run: () =>
        runConsistencyTrial(implementation, remote(owner, typeName), this.signatureOf(name), this.options),
    });
    return this;
  }

  units(): TrialUnit[] {
    return [...this.entries];
  }

  /**
   * Register every unit with a test runner. A failed report throws.
   */
  register(test: TestRegistrar): void {
    for (const unit of this.entries) {
      test(unit.name, () => {
        const report = unit.run();
        if (!report.ok) {
          throw new TrialFailureError(report);
        }
      });
    }
  }
}
