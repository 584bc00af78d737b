/**
 * Seeded value streams for a single descriptor
 *
 * Usage:
 * const gen = descriptorFuzzGenerator(sequence(integer()), { seed: 7 });
 * const samples = gen.generateN(100);
 */

import { draws } from "../tooling/lib/harness";
import { generator } from "../tooling/lib/generators";
import { Logger } from "../tooling/lib/logger";
import { DescriptorResolver, TypeDescriptor } from "../tooling/lib/types";
import { freshSeed } from "../tooling/lib/utils";

export type FuzzGeneratorOptions = {
  seed?: number; // For reproducibility
  resolver?: DescriptorResolver;
  logger?: Logger;
};

export interface FuzzGenerator {
  readonly descriptor: TypeDescriptor;
  readonly seed: number;

  /**
   * Draw the next value.
   */
  generate(): unknown;

  /**
   * Draw the next `count` values.
   */
  generateN(count: number): unknown[];

  /** An endless stream of draws, shared with `generate`. */
  [Symbol.iterator](): Iterator<unknown>;
}

export function descriptorFuzzGenerator(
  descriptor: TypeDescriptor,
  options: FuzzGeneratorOptions = {}
): FuzzGenerator {
  const seed = options.seed ?? freshSeed();
  const stream = draws(generator(descriptor, { resolver: options.resolver, logger: options.logger }), seed);

  const generate = (): unknown => {
    const next = stream.next();
    if (next.done) {
      throw new Error("Value stream ended unexpectedly");
    }
    return next.value;
  };

  return {
    descriptor,
    seed,
    generate,
    generateN: (count) => Array.from({ length: count }, generate),
    [Symbol.iterator]: () => stream,
  };
}
