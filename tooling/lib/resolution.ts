/**
 * Remote reference resolution with a per-chain cycle guard
 */

import { formatDescriptor } from "./format";
import { globalLogger, Logger } from "./logger";
import { EngineContext, RemoteReferenceDescriptor, TypeDescriptor } from "./types";

/**
 * Engine context threaded through one recursive descent. `visiting` holds the
 * references currently being expanded on this call chain only.
 */
export type Descent = {
  resolver?: EngineContext["resolver"];
  logger: Logger;
  visiting: ReadonlySet<string>;
};

export type Resolution =
  | { status: "resolved"; descriptor: TypeDescriptor; descent: Descent }
  | { status: "unresolved" }
  | { status: "cycle" };

export function startDescent(context: EngineContext = {}): Descent {
  return {
    resolver: context.resolver,
    logger: context.logger ?? globalLogger,
    visiting: new Set(),
  };
}

export function referenceKey(reference: RemoteReferenceDescriptor): string {
  return reference.owner ? `${reference.owner}.${reference.name}` : reference.name;
}

/**
 * Resolve through the resolver first, then the reference's own fallback.
 */
export function resolveReference(reference: RemoteReferenceDescriptor, descent: Descent): Resolution {
  const key = referenceKey(reference);
  if (descent.visiting.has(key)) {
    return { status: "cycle" };
  }

  const resolved = descent.resolver?.resolve(reference.owner, reference.name) ?? reference.fallback;
  if (!resolved) {
    return { status: "unresolved" };
  }

  const visiting = new Set(descent.visiting);
  visiting.add(key);
  return { status: "resolved", descriptor: resolved, descent: { ...descent, visiting } };
}

/**
 * Emit the diagnostic for a descriptor the engine degrades instead of interpreting.
 */
export function warnDegraded(
  descent: Descent,
  component: string,
  descriptor: TypeDescriptor,
  reason: string,
  fallback: string
): void {
  descent.logger.pushContext({ component, descriptor: formatDescriptor(descriptor) });
  descent.logger.warn(`${reason}, using ${fallback}`);
  descent.logger.popContext(["component", "descriptor"]);
}

export function describeResolutionFailure(resolution: Resolution): string {
  return resolution.status === "cycle" ? "Cyclic remote reference" : "Unresolved remote reference";
}
