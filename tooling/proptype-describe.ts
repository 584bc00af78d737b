#!/usr/bin/env node
import { join } from "path";
import { ConfigManager } from "./lib/config";
import { formatDescriptor, formatSignature } from "./lib/format";
import { globalLogger, Logger } from "./lib/logger";
import { DescriptorRegistry } from "./lib/registry";
import { describeSignatures, TypeScriptSignatureSource } from "./lib/signature-source";

const PROJECT_ROOT = join(__dirname, "..");

export type DescribeOutcome = {
  registry: DescriptorRegistry;
  lines: string[];
  errors: string[];
  /** Warnings logged while reading the file, with the descriptor they concern */
  warnings: string[];
};

/**
 * Describe the named functions of a TypeScript file (all of them when no
 * names are given) and record their descriptors in the catalog.
 */
export function describeFile(
  sourceFile: string,
  names: string[],
  config: ConfigManager,
  logger: Logger = globalLogger
): DescribeOutcome {
  const logged = logger.getEntries().length;
  const source = TypeScriptSignatureSource.fromFiles([config.expandPath(sourceFile)], logger);
  const targets = names.length > 0 ? names : source.functionNames();
  const { registry, errors } = describeSignatures(
    source,
    targets,
    new DescriptorRegistry(config.getCatalogPath(), logger)
  );

  const lines: string[] = [];
  for (const name of targets) {
    const lookup = registry.lookup(name);
    if (lookup.ok) {
      lines.push(`${name} :: ${formatSignature(lookup.signature)}`);
    }
  }
  for (const [key, descriptor] of registry.typeEntries()) {
    lines.push(`type ${key} = ${formatDescriptor(descriptor)}`);
  }
  const warnings = logger
    .getEntries()
    .slice(logged)
    .filter((entry) => entry.level === "warn")
    .map((entry) => (entry.context?.descriptor ? `${entry.context.descriptor}: ${entry.message}` : entry.message));
  return { registry, lines, errors, warnings };
}

function main(): void {
  const config = new ConfigManager(PROJECT_ROOT);
  config.loadEnvironment();
  globalLogger.setLevel(config.getLogLevel());

  const [sourceFile = process.env.PROPTYPE_SOURCE_FILE || "examples/sorting.ts", ...names] = process.argv.slice(2);
  globalLogger.info(`[proptype] Describing: ${sourceFile}`);

  const { registry, lines, errors } = describeFile(sourceFile, names, config);
  lines.forEach((line) => console.log(line));
  errors.forEach((error) => globalLogger.error(error));

  registry.persist();
  const { warnCount, errorCount } = globalLogger.getSummary();
  globalLogger.info(`[proptype] Catalog: ${config.getCatalogPath()} (${warnCount} warnings, ${errorCount} errors)`);
  if (globalLogger.getEntriesAtLevel("error").length > 0) {
    process.exitCode = 1;
  }
}

if (require.main === module) {
  main();
}
