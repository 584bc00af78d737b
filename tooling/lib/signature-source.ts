/**
 * Signature extraction from TypeScript declarations
 * Reads annotated parameter and return type nodes with ts-morph and maps
 * them onto descriptors. Local interfaces and aliases become remote
 * references that the same source resolves.
 */

import { Node, ParameterDeclaration, Project, SourceFile, SyntaxKind, TypeElementTypes, TypeNode } from "ts-morph";
import {
  any,
  atomType,
  binary,
  bitstring,
  boolean,
  bounded,
  charlist,
  field,
  float,
  integer,
  literal,
  mapping,
  negativeInteger,
  nonNegativeInteger,
  nullType,
  optionalField,
  positiveInteger,
  RECORD_TAG,
  record,
  remote,
  sequence,
  string,
  term,
  tuple,
  union,
  unsupported,
  keyedSequence,
} from "./descriptors";
import { formatDescriptor } from "./format";
import { globalLogger, Logger } from "./logger";
import { DescriptorRegistry } from "./registry";
import {
  Bound,
  DescriptorResolver,
  FieldDescriptor,
  LiteralValue,
  SignatureLookup,
  SignatureSource,
  TypeDescriptor,
} from "./types";
import { normalize } from "./utils";

/** Anything with annotated parameters and an optional return annotation. */
type Callable = {
  getParameters(): ParameterDeclaration[];
  getReturnTypeNode(): TypeNode | undefined;
};

const MARKERS = new Map<string, () => TypeDescriptor>([
  ["Integer", integer],
  ["Float", float],
  ["NonNegativeInteger", nonNegativeInteger],
  ["PositiveInteger", positiveInteger],
  ["NegativeInteger", negativeInteger],
  ["Atom", atomType],
  ["Binary", binary],
  ["Bitstring", bitstring],
  ["Charlist", charlist],
  ["Term", term],
  ["Uint8Array", binary],
  ["Buffer", binary],
]);

export class TypeScriptSignatureSource implements SignatureSource, DescriptorResolver {
  constructor(private project: Project, private logger: Logger = globalLogger) {}

  static fromTsConfig(tsConfigFilePath: string, logger?: Logger): TypeScriptSignatureSource {
    return new TypeScriptSignatureSource(new Project({ tsConfigFilePath }), logger);
  }

  static fromFiles(paths: string[], logger?: Logger): TypeScriptSignatureSource {
    const project = new Project({ skipAddingFilesFromTsConfig: true });
    project.addSourceFilesAtPaths(paths);
    return new TypeScriptSignatureSource(project, logger);
  }

  static fromText(text: string, fileName = "signatures.ts", logger?: Logger): TypeScriptSignatureSource {
    const project = new Project({ useInMemoryFileSystem: true });
    project.createSourceFile(fileName, text);
    return new TypeScriptSignatureSource(project, logger);
  }

  /**
   * Names of every function declaration and function-valued const.
   */
  functionNames(): string[] {
    const names = new Set<string>();
    for (const sourceFile of this.project.getSourceFiles()) {
      for (const fn of sourceFile.getFunctions()) {
        const name = fn.getName();
        if (name) names.add(name);
      }
      for (const declaration of sourceFile.getVariableDeclarations()) {
        if (this.callableOf(declaration.getName(), sourceFile)) {
          names.add(declaration.getName());
        }
      }
    }
    return Array.from(names).sort();
  }

  lookup(name: string): SignatureLookup {
    for (const sourceFile of this.project.getSourceFiles()) {
      const callable = this.callableOf(name, sourceFile);
      if (callable) {
        return this.signatureOf(name, callable, sourceFile);
      }
    }
    return { ok: false, error: `No function named ${name} was found` };
  }

  resolve(owner: string, name: string): TypeDescriptor | undefined {
    for (const sourceFile of this.project.getSourceFiles()) {
      if (owner && sourceFile.getBaseNameWithoutExtension() !== owner) {
        continue;
      }
      const declaration = sourceFile.getInterface(name);
      if (declaration) {
        return this.membersToDescriptor(declaration.getMembers(), sourceFile, name);
      }
      const typeNode = sourceFile.getTypeAlias(name)?.getTypeNode();
      if (typeNode) {
        return this.convert(typeNode, sourceFile);
      }
    }
    return undefined;
  }

  private callableOf(name: string, sourceFile: SourceFile): Callable | undefined {
    const fn = sourceFile.getFunction(name);
    if (fn) {
      const overloads = fn.getOverloads();
      return overloads.length > 0 ? overloads[0] : fn;
    }
    const declaration = sourceFile.getVariableDeclaration(name);
    if (!declaration) {
      return undefined;
    }
    const annotation = declaration.getTypeNode();
    if (annotation && Node.isFunctionTypeNode(annotation)) {
      return annotation;
    }
    const initializer = declaration.getInitializer();
    if (initializer && (Node.isArrowFunction(initializer) || Node.isFunctionExpression(initializer))) {
      return initializer;
    }
    return undefined;
  }

  private signatureOf(name: string, callable: Callable, sourceFile: SourceFile): SignatureLookup {
    const params: TypeDescriptor[] = [];
    for (const parameter of callable.getParameters()) {
      const typeNode = parameter.getTypeNode();
      if (!typeNode) {
        return { ok: false, error: `Parameter ${parameter.getName()} of ${name} has no type annotation` };
      }
      params.push(this.withPosition(this.convert(typeNode, sourceFile), typeNode, sourceFile));
    }
    const returnNode = callable.getReturnTypeNode();
    if (!returnNode) {
      return { ok: false, error: `${name} has no return type annotation` };
    }
    return {
      ok: true,
      signature: { params, returns: this.withPosition(this.convert(returnNode, sourceFile), returnNode, sourceFile) },
    };
  }

  private withPosition(descriptor: TypeDescriptor, node: Node, sourceFile: SourceFile): TypeDescriptor {
    return { ...descriptor, meta: { file: sourceFile.getBaseName(), line: node.getStartLineNumber() } };
  }

  private unsupported(node: Node): TypeDescriptor {
    const descriptor = unsupported(normalize(node.getText()));
    this.logger.pushContext({ component: "signature-source", descriptor: formatDescriptor(descriptor) });
    this.logger.warn(`No descriptor for type node ${node.getKindName()}`);
    this.logger.popContext(["component", "descriptor"]);
    return descriptor;
  }

  convert(node: TypeNode, sourceFile: SourceFile): TypeDescriptor {
    switch (node.getKind()) {
      case SyntaxKind.NumberKeyword:
        return float();
      case SyntaxKind.StringKeyword:
        return string();
      case SyntaxKind.BooleanKeyword:
        return boolean();
      case SyntaxKind.SymbolKeyword:
        return atomType();
      case SyntaxKind.UnknownKeyword:
      case SyntaxKind.AnyKeyword:
      case SyntaxKind.VoidKeyword:
        return any();
      case SyntaxKind.NullKeyword:
        return nullType();
      default:
        break;
    }

    if (Node.isLiteralTypeNode(node)) {
      const value = this.literalValue(node);
      if (value === null) return nullType();
      return value === undefined ? this.unsupported(node) : literal(value);
    }

    if (Node.isParenthesizedTypeNode(node)) {
      return this.convert(node.getTypeNode(), sourceFile);
    }

    if (Node.isArrayTypeNode(node)) {
      return this.convertArray(node.getElementTypeNode(), sourceFile);
    }

    if (Node.isTypeOperatorTypeNode(node) && node.getOperator() === SyntaxKind.ReadonlyKeyword) {
      return this.convert(node.getTypeNode(), sourceFile);
    }

    if (Node.isTupleTypeNode(node)) {
      const elements: TypeDescriptor[] = [];
      for (const element of node.getElements()) {
        const inner = Node.isNamedTupleMember(element) ? element.getTypeNode() : element;
        elements.push(this.convert(inner, sourceFile));
      }
      return tuple(elements);
    }

    if (Node.isUnionTypeNode(node)) {
      return union(node.getTypeNodes().map((part) => this.convert(part, sourceFile)));
    }

    if (Node.isTypeLiteral(node)) {
      return this.membersToDescriptor(node.getMembers(), sourceFile);
    }

    if (Node.isTypeReference(node)) {
      return this.convertReference(node.getTypeName().getText(), node.getTypeArguments(), node, sourceFile);
    }

    return this.unsupported(node);
  }

  private literalValue(node: Node): LiteralValue | null | undefined {
    if (!Node.isLiteralTypeNode(node)) {
      return undefined;
    }
    const value = node.getLiteral();
    if (Node.isStringLiteral(value) || Node.isNoSubstitutionTemplateLiteral(value)) {
      return value.getLiteralValue();
    }
    if (Node.isNumericLiteral(value) || Node.isPrefixUnaryExpression(value)) {
      const numeric = Number(value.getText().replace(/_/g, ""));
      return Number.isNaN(numeric) ? undefined : numeric;
    }
    if (value.getKind() === SyntaxKind.TrueKeyword) {
      return true;
    }
    if (value.getKind() === SyntaxKind.FalseKeyword) {
      return false;
    }
    if (value.getKind() === SyntaxKind.NullKeyword) {
      return null;
    }
    return undefined;
  }

  /** `[K, V][]` with a literal K is a keyed sequence. */
  private convertArray(element: TypeNode, sourceFile: SourceFile): TypeDescriptor {
    if (Node.isTupleTypeNode(element) && element.getElements().length === 2) {
      const [keyNode, valueNode] = element
        .getElements()
        .map((member) => (Node.isNamedTupleMember(member) ? member.getTypeNode() : member));
      const key = this.literalValue(keyNode);
      if (key !== undefined && key !== null) {
        return keyedSequence(key, this.convert(valueNode, sourceFile));
      }
    }
    return sequence(this.convert(element, sourceFile));
  }

  private boundOf(node: TypeNode | undefined): Bound | undefined {
    if (!node) {
      return undefined;
    }
    const value = this.literalValue(node);
    return typeof value === "number" ? value : node.getText();
  }

  private convertReference(name: string, args: TypeNode[], node: TypeNode, sourceFile: SourceFile): TypeDescriptor {
    const marker = MARKERS.get(name);
    if (marker) {
      return marker();
    }
    switch (name) {
      case "IntRange":
        return bounded(this.boundOf(args[0]), this.boundOf(args[1]));
      case "Array":
      case "ReadonlyArray":
        return args[0] ? this.convertArray(args[0], sourceFile) : sequence();
      case "Record":
        return args.length === 2
          ? mapping([optionalField(this.convert(args[0], sourceFile), this.convert(args[1], sourceFile))])
          : this.unsupported(node);
      default:
        break;
    }
    if (args.length > 0) {
      return this.unsupported(node);
    }
    const dot = name.lastIndexOf(".");
    return dot === -1
      ? remote(sourceFile.getBaseNameWithoutExtension(), name)
      : remote(name.slice(0, dot), name.slice(dot + 1));
  }

  private membersToDescriptor(members: TypeElementTypes[], sourceFile: SourceFile, typeName?: string): TypeDescriptor {
    const fields: FieldDescriptor[] = [];
    let tag: string | undefined;

    for (const member of members) {
      if (Node.isPropertySignature(member)) {
        const typeNode = member.getTypeNode();
        const nameNode = member.getNameNode();
        const key = Node.isStringLiteral(nameNode) ? nameNode.getLiteralValue() : nameNode.getText();
        if (key === RECORD_TAG && typeNode) {
          const value = this.literalValue(typeNode);
          if (typeof value === "string") {
            tag = value;
            continue;
          }
        }
        const value = typeNode ? this.convert(typeNode, sourceFile) : any();
        fields.push(member.hasQuestionToken() ? optionalField(key, value) : field(key, value));
      } else if (Node.isIndexSignatureDeclaration(member)) {
        const keyNode = member.getKeyTypeNode();
        const returnNode = member.getReturnTypeNode();
        fields.push(
          optionalField(this.convert(keyNode, sourceFile), returnNode ? this.convert(returnNode, sourceFile) : any())
        );
      } else {
        this.logger.debug(`Skipping ${member.getKindName()} member${typeName ? ` of ${typeName}` : ""}`);
      }
    }

    return tag === undefined ? mapping(fields) : record(tag, fields);
  }
}

export type DescribeResult = {
  registry: DescriptorRegistry;
  errors: string[];
};

function collectReferences(descriptor: TypeDescriptor, into: { owner: string; name: string }[]): void {
  switch (descriptor.kind) {
    case "remote":
      into.push({ owner: descriptor.owner, name: descriptor.name });
      if (descriptor.fallback) collectReferences(descriptor.fallback, into);
      return;
    case "sequence":
      if (descriptor.element) collectReferences(descriptor.element, into);
      return;
    case "keyed_sequence":
      collectReferences(descriptor.value, into);
      return;
    case "tuple":
      descriptor.elements.forEach((element) => collectReferences(element, into));
      return;
    case "mapping":
    case "record":
      descriptor.fields.forEach((entry) => {
        collectReferences(entry.key, into);
        collectReferences(entry.value, into);
      });
      return;
    case "union":
      descriptor.alternatives.forEach((alternative) => collectReferences(alternative, into));
      return;
    default:
      return;
  }
}

/**
 * Look up each named function and register its signature together with
 * every type it references, transitively.
 */
export function describeSignatures(
  source: SignatureSource & DescriptorResolver,
  names: string[],
  registry: DescriptorRegistry = new DescriptorRegistry()
): DescribeResult {
  const errors: string[] = [];
  const pending: { owner: string; name: string }[] = [];

  for (const name of names) {
    const lookup = source.lookup(name);
    if (!lookup.ok) {
      errors.push(lookup.error);
      continue;
    }
    registry.registerSignature(name, lookup.signature);
    [...lookup.signature.params, lookup.signature.returns].forEach((descriptor) =>
      collectReferences(descriptor, pending)
    );
  }

  const seen = new Set<string>();
  for (let next = pending.pop(); next; next = pending.pop()) {
    const key = `${next.owner}.${next.name}`;
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    const resolved = source.resolve(next.owner, next.name);
    if (!resolved) {
      errors.push(`Unresolved type ${key}`);
      continue;
    }
    registry.registerType(next.owner, next.name, resolved);
    collectReferences(resolved, pending);
  }

  return { registry, errors };
}
