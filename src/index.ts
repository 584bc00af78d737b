/**
 * proptype: Main entry point
 * Exports the marker types, descriptor constructors and the trial harness
 */

export {
  Integer,
  Float,
  NonNegativeInteger,
  PositiveInteger,
  NegativeInteger,
  IntRange,
  Atom,
  Binary,
  Bitstring,
  Charlist,
  Term,
} from "./markers";

export { FuzzGenerator, FuzzGeneratorOptions, descriptorFuzzGenerator } from "./fuzzGenerator";

export * from "../tooling/lib";
