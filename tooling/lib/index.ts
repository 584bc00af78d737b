/**
 * Central export point for all library modules
 */

export * from "./types";
export * from "./config";
export * from "./registry";
export * from "./codec";
export * from "./utils";
export * from "./logger";
export * from "./trial-log";
export * from "./errors";
export * from "./descriptors";
export * from "./arbitraries";
export * from "./generators";
export * from "./validators";
export * from "./invalid-generators";
export * from "./equivalence";
export * from "./format";
export * from "./type-namer";
export * from "./counter";
export * from "./harness";
export * from "./suite";
export * from "./signature-source";
