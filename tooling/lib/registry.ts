/**
 * Descriptor registry: an in-memory signature source and remote resolver
 * that loads from and persists to a JSON catalog file
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname } from "path";
import { decodeDescriptor, EncodedDescriptor, encodeDescriptor } from "./codec";
import { globalLogger, Logger } from "./logger";
import { DescriptorResolver, Signature, SignatureLookup, SignatureSource, TypeDescriptor } from "./types";
import { isPlainObject, stableStringify } from "./utils";

export type EncodedSignature = {
  params: EncodedDescriptor[];
  returns: EncodedDescriptor;
};

export type Catalog = {
  signatures: Record<string, EncodedSignature>;
  types: Record<string, EncodedDescriptor>;
};

export function encodeSignature(signature: Signature): EncodedSignature {
  return { params: signature.params.map(encodeDescriptor), returns: encodeDescriptor(signature.returns) };
}

export function decodeSignature(raw: unknown): Signature | undefined {
  if (!isPlainObject(raw) || !Array.isArray(raw.params) || raw.returns === undefined) {
    return undefined;
  }
  return { params: raw.params.map(decodeDescriptor), returns: decodeDescriptor(raw.returns) };
}

function typeKey(owner: string, name: string): string {
  return owner ? `${owner}.${name}` : name;
}

export class DescriptorRegistry implements SignatureSource, DescriptorResolver {
  private signatures: Map<string, Signature> = new Map();
  private types: Map<string, TypeDescriptor> = new Map();
  private dirty = false;

  constructor(private catalogPath?: string, private logger: Logger = globalLogger) {
    this.load();
  }

  private load(): void {
    if (!this.catalogPath || !existsSync(this.catalogPath)) {
      return;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(this.catalogPath, "utf8"));
    } catch (error) {
      this.logger.warn(`Ignoring unreadable catalog ${this.catalogPath}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return;
    }
    if (!isPlainObject(parsed)) {
      this.logger.warn(`Ignoring malformed catalog ${this.catalogPath}`);
      return;
    }

    if (isPlainObject(parsed.signatures)) {
      for (const [name, raw] of Object.entries(parsed.signatures)) {
        const signature = decodeSignature(raw);
        if (signature) {
          this.signatures.set(name, signature);
        } else {
          this.logger.warn(`Skipping malformed signature entry "${name}"`);
        }
      }
    }
    if (isPlainObject(parsed.types)) {
      for (const [key, raw] of Object.entries(parsed.types)) {
        this.types.set(key, decodeDescriptor(raw));
      }
    }
  }

  registerSignature(name: string, signature: Signature): void {
    const existing = this.signatures.get(name);
    if (existing && stableStringify(encodeSignature(existing)) === stableStringify(encodeSignature(signature))) {
      return;
    }
    this.signatures.set(name, signature);
    this.dirty = true;
  }

  registerType(owner: string, name: string, descriptor: TypeDescriptor): void {
    const key = typeKey(owner, name);
    const existing = this.types.get(key);
    if (existing && stableStringify(encodeDescriptor(existing)) === stableStringify(encodeDescriptor(descriptor))) {
      return;
    }
    this.types.set(key, descriptor);
    this.dirty = true;
  }

  lookup(name: string): SignatureLookup {
    const signature = this.signatures.get(name);
    return signature ? { ok: true, signature } : { ok: false, error: `No signature registered for ${name}` };
  }

  resolve(owner: string, name: string): TypeDescriptor | undefined {
    return this.types.get(typeKey(owner, name));
  }

  signatureNames(): string[] {
    return Array.from(this.signatures.keys()).sort();
  }

  typeNames(): string[] {
    return Array.from(this.types.keys()).sort();
  }

  typeEntries(): [string, TypeDescriptor][] {
    return this.typeNames().flatMap((key): [string, TypeDescriptor][] => {
      const descriptor = this.types.get(key);
      return descriptor ? [[key, descriptor]] : [];
    });
  }

  isDirty(): boolean {
    return this.dirty;
  }

  toCatalog(): Catalog {
    const catalog: Catalog = { signatures: {}, types: {} };
    for (const name of this.signatureNames()) {
      const signature = this.signatures.get(name);
      if (signature) catalog.signatures[name] = encodeSignature(signature);
    }
    for (const key of this.typeNames()) {
      const descriptor = this.types.get(key);
      if (descriptor) catalog.types[key] = encodeDescriptor(descriptor);
    }
    return catalog;
  }

  persist(): void {
    if (!this.dirty || !this.catalogPath) {
      return;
    }
    mkdirSync(dirname(this.catalogPath), { recursive: true });
    writeFileSync(this.catalogPath, stableStringify(this.toCatalog(), 2), "utf8");
    this.dirty = false;
  }

  clear(): void {
    this.signatures.clear();
    this.types.clear();
    this.dirty = true;
  }

  size(): number {
    return this.signatures.size + this.types.size;
  }
}
