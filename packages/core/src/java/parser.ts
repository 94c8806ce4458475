// packages/core/src/java/parser.ts — Declarations and name uses read off a tree-sitter Java syntax tree

import type Parser from 'web-tree-sitter';
import type { ClassKind, Modifier } from '../types/symbols.js';
import { COMMENT_TYPES, countArguments, namedChildrenOf, readCall, referencedName, sameNode, type ParsedCall } from './calls.js';

type SyntaxNode = Parser.SyntaxNode;

export class JavaSyntaxError extends Error {
  constructor(
    message: string,
    public readonly line: number,
  ) {
    super(`${message} (line ${line})`);
    this.name = 'JavaSyntaxError';
  }
}

export interface SourceRange {
  start: number;
  end: number;
}

export interface ParsedImport {
  qualifiedName: string;
  isStatic: boolean;
  isWildcard: boolean;
  start: number;
  end: number;
  line: number;
}

export interface ParsedMethod {
  name: string;
  modifiers: Modifier[];
  annotations: string[];
  docDeprecated: boolean;
  parameterTypes: string[];
  isVarArgs: boolean;
  isConstructor: boolean;
  start: number;
  end: number;
  line: number;
  nameOffset: number;
  body: SourceRange | null;
  /** Call sites in the body, lambdas and anonymous classes included. */
  calls: ParsedCall[];
}

export interface FieldDeclarator {
  name: string;
  nameOffset: number;
  start: number;
  end: number;
}

export interface FieldDeclaration {
  start: number;
  end: number;
  declarators: FieldDeclarator[];
}

export interface ParsedField {
  name: string;
  modifiers: Modifier[];
  annotations: string[];
  docDeprecated: boolean;
  line: number;
  nameOffset: number;
  declaration: FieldDeclaration;
  declaratorIndex: number;
}

export interface ParsedType {
  kind: ClassKind;
  name: string;
  qualifiedName: string;
  modifiers: Modifier[];
  annotations: string[];
  docDeprecated: boolean;
  start: number;
  end: number;
  line: number;
  nameOffset: number;
  /** Simple names from `extends` and `implements`. */
  superTypes: string[];
  body: SourceRange;
  enumConstantCount: number;
  fields: ParsedField[];
  methods: ParsedMethod[];
  types: ParsedType[];
}

export type NameContext = 'code' | 'import' | 'static-member' | 'package';

export type NameRole = 'call' | 'method-reference' | 'annotation' | 'name';

/** One identifier in the source. */
export interface NameUse {
  text: string;
  start: number;
  line: number;
  column: number;
  context: NameContext;
  role: NameRole;
  /** Set for calls only. */
  argumentCount: number | null;
  /** The name a type, method or field is declared under. */
  declaration: boolean;
  /** Innermost declared method around the name. */
  method: ParsedMethod | null;
}

export interface ParsedUnit {
  packageName: string | null;
  imports: ParsedImport[];
  types: ParsedType[];
  names: NameUse[];
}

const TYPE_DECLARATIONS: Readonly<Record<string, ClassKind>> = {
  class_declaration: 'class',
  interface_declaration: 'interface',
  enum_declaration: 'enum',
  record_declaration: 'record',
  annotation_type_declaration: 'annotation',
};

const METHOD_DECLARATIONS: ReadonlySet<string> = new Set([
  'method_declaration',
  'constructor_declaration',
  'compact_constructor_declaration',
  'annotation_type_element_declaration',
]);

const FIELD_DECLARATIONS: ReadonlySet<string> = new Set(['field_declaration', 'constant_declaration']);

const ANNOTATIONS: ReadonlySet<string> = new Set(['annotation', 'marker_annotation']);

const MODIFIERS: ReadonlySet<string> = new Set<Modifier>([
  'public',
  'protected',
  'private',
  'static',
  'final',
  'abstract',
  'default',
  'native',
  'synchronized',
  'transient',
  'volatile',
  'strictfp',
  'sealed',
  'non-sealed',
]);

function isModifier(text: string): text is Modifier {
  return MODIFIERS.has(text);
}

function lineOf(node: SyntaxNode): number {
  return node.startPosition.row + 1;
}

/** Dotted name without the whitespace or comments a source may put between its parts. */
function dottedName(node: SyntaxNode): string {
  if (node.type === 'scoped_identifier') {
    const scope = node.childForFieldName('scope');
    const name = node.childForFieldName('name');
    if (scope && name) return `${dottedName(scope)}.${name.text}`;
  }
  return node.text.replace(/\s+/g, '');
}

function isDocComment(node: SyntaxNode): boolean {
  return COMMENT_TYPES.has(node.type) && node.text.startsWith('/**') && node.text !== '/**/';
}

/** Nearest doc comment above `node`, looking past other comments only. */
function leadingDoc(node: SyntaxNode): SyntaxNode | null {
  for (let sibling = node.previousSibling; sibling && COMMENT_TYPES.has(sibling.type); sibling = sibling.previousSibling) {
    if (isDocComment(sibling)) return sibling;
  }
  return null;
}

interface DeclarationHeader {
  modifiers: Modifier[];
  annotations: string[];
  docDeprecated: boolean;
  /** Offset of the leading doc comment, or of the declaration itself. */
  start: number;
}

function readHeader(node: SyntaxNode): DeclarationHeader {
  const modifiers: Modifier[] = [];
  const annotations: string[] = [];
  const modifierList = node.children.find((child) => child.type === 'modifiers');
  for (const child of modifierList?.children ?? []) {
    if (ANNOTATIONS.has(child.type)) {
      const name = child.childForFieldName('name');
      if (name) annotations.push(dottedName(name));
    } else if (isModifier(child.type)) {
      modifiers.push(child.type);
    }
  }
  const doc = leadingDoc(node);
  return {
    modifiers,
    annotations,
    docDeprecated: doc !== null && /@deprecated\b/.test(doc.text),
    start: doc?.startIndex ?? node.startIndex,
  };
}

function dimensionsOf(node: SyntaxNode | null): number {
  return node ? node.children.filter((child) => child.type === '[').length : 0;
}

/** Signature form of a type: simple name plus array dimensions. */
function simpleTypeName(node: SyntaxNode | null): string {
  if (!node) return '';
  switch (node.type) {
    case 'scoped_type_identifier':
    case 'annotated_type': {
      const parts = namedChildrenOf(node);
      return simpleTypeName(parts[parts.length - 1] ?? null);
    }
    case 'generic_type':
      return simpleTypeName(namedChildrenOf(node)[0] ?? null);
    case 'array_type':
      return simpleTypeName(node.childForFieldName('element')) + '[]'.repeat(dimensionsOf(node.childForFieldName('dimensions')));
    default:
      return node.text;
  }
}

function readParameters(list: SyntaxNode | null): { parameterTypes: string[]; isVarArgs: boolean } {
  const parameterTypes: string[] = [];
  let isVarArgs = false;
  for (const parameter of list ? namedChildrenOf(list) : []) {
    if (parameter.type === 'formal_parameter') {
      const dims = dimensionsOf(parameter.childForFieldName('dimensions'));
      parameterTypes.push(simpleTypeName(parameter.childForFieldName('type')) + '[]'.repeat(dims));
    } else if (parameter.type === 'spread_parameter') {
      const type = namedChildrenOf(parameter).find(
        (child) => child.type !== 'modifiers' && child.type !== 'variable_declarator' && !ANNOTATIONS.has(child.type),
      );
      parameterTypes.push(`${simpleTypeName(type ?? null)}...`);
      isVarArgs = true;
    }
  }
  return { parameterTypes, isVarArgs };
}

function superTypesOf(node: SyntaxNode): string[] {
  const names: string[] = [];
  for (const child of node.children) {
    if (child.type === 'superclass') {
      names.push(...namedChildrenOf(child).map(simpleTypeName));
    } else if (child.type === 'super_interfaces' || child.type === 'extends_interfaces') {
      const list = namedChildrenOf(child).find((c) => c.type === 'type_list');
      if (list) names.push(...namedChildrenOf(list).map(simpleTypeName));
    }
  }
  return names;
}

function required(node: SyntaxNode, field: string): SyntaxNode {
  const child = node.childForFieldName(field);
  if (!child) throw new JavaSyntaxError(`Missing ${field} in ${node.type}`, lineOf(node));
  return child;
}

/** First pass: declarations. Remembers what the name pass needs to know about them. */
class DeclarationReader {
  readonly declaredNames = new Set<number>();
  readonly methodsByStart = new Map<number, ParsedMethod>();
  readonly staticMembers = new Set<number>();

  readUnit(root: SyntaxNode): Omit<ParsedUnit, 'names'> {
    let packageName: string | null = null;
    const imports: ParsedImport[] = [];
    const types: ParsedType[] = [];

    for (const node of namedChildrenOf(root)) {
      const kind = TYPE_DECLARATIONS[node.type];
      if (kind) {
        types.push(this.readType(node, kind, packageName));
      } else if (node.type === 'package_declaration') {
        const name = namedChildrenOf(node).find((c) => c.type === 'scoped_identifier' || c.type === 'identifier');
        packageName = name ? dottedName(name) : null;
      } else if (node.type === 'import_declaration') {
        imports.push(this.readImport(node));
      } else if (node.type === 'module_declaration') {
        // module-info.java declares no types
        return { packageName, imports, types: [] };
      } else {
        throw new JavaSyntaxError('Expected a type declaration', lineOf(node));
      }
    }
    return { packageName, imports, types };
  }

  private readImport(node: SyntaxNode): ParsedImport {
    const isStatic = node.children.some((child) => child.type === 'static');
    const isWildcard = node.children.some((child) => child.type === 'asterisk');
    const name = namedChildrenOf(node).find((c) => c.type === 'scoped_identifier' || c.type === 'identifier');
    if (!name) throw new JavaSyntaxError('Missing name in import', lineOf(node));
    if (isStatic && !isWildcard) {
      // `import static a.B.member;` names the member last
      this.staticMembers.add((name.type === 'scoped_identifier' ? required(name, 'name') : name).startIndex);
    }
    return {
      qualifiedName: dottedName(name),
      isStatic,
      isWildcard,
      start: node.startIndex,
      end: node.endIndex,
      line: lineOf(node),
    };
  }

  private readType(node: SyntaxNode, kind: ClassKind, prefix: string | null): ParsedType {
    const header = readHeader(node);
    const name = required(node, 'name');
    const body = required(node, 'body');
    this.declaredNames.add(name.startIndex);

    const type: ParsedType = {
      kind,
      name: name.text,
      qualifiedName: prefix ? `${prefix}.${name.text}` : name.text,
      modifiers: header.modifiers,
      annotations: header.annotations,
      docDeprecated: header.docDeprecated,
      start: header.start,
      end: node.endIndex,
      line: lineOf(name),
      nameOffset: name.startIndex,
      superTypes: superTypesOf(node),
      body: { start: body.startIndex, end: body.endIndex },
      enumConstantCount: 0,
      fields: [],
      methods: [],
      types: [],
    };
    this.readMembers(body, type);
    return type;
  }

  private readMembers(body: SyntaxNode, type: ParsedType): void {
    for (const member of namedChildrenOf(body)) {
      const kind = TYPE_DECLARATIONS[member.type];
      if (kind) type.types.push(this.readType(member, kind, type.qualifiedName));
      else if (METHOD_DECLARATIONS.has(member.type)) type.methods.push(this.readMethod(member));
      else if (FIELD_DECLARATIONS.has(member.type)) type.fields.push(...this.readFields(member));
      else if (member.type === 'enum_constant') type.enumConstantCount++;
      else if (member.type === 'enum_body_declarations') this.readMembers(member, type);
      // initializer blocks declare nothing
    }
  }

  private readMethod(node: SyntaxNode): ParsedMethod {
    const header = readHeader(node);
    const name = required(node, 'name');
    const bodyNode = node.childForFieldName('body');
    const method: ParsedMethod = {
      name: name.text,
      modifiers: header.modifiers,
      annotations: header.annotations,
      docDeprecated: header.docDeprecated,
      ...readParameters(node.childForFieldName('parameters')),
      isConstructor: node.type === 'constructor_declaration' || node.type === 'compact_constructor_declaration',
      start: header.start,
      end: node.endIndex,
      line: lineOf(name),
      nameOffset: name.startIndex,
      body: bodyNode ? { start: bodyNode.startIndex, end: bodyNode.endIndex } : null,
      calls: [],
    };
    this.declaredNames.add(name.startIndex);
    this.methodsByStart.set(node.startIndex, method);
    return method;
  }

  private readFields(node: SyntaxNode): ParsedField[] {
    const header = readHeader(node);
    const names = namedChildrenOf(node)
      .filter((child) => child.type === 'variable_declarator')
      .map((declarator) => ({ declarator, name: required(declarator, 'name') }));
    const declaration: FieldDeclaration = {
      start: header.start,
      end: node.endIndex,
      declarators: names.map(({ declarator, name }) => ({
        name: name.text,
        nameOffset: name.startIndex,
        start: declarator.startIndex,
        end: declarator.endIndex,
      })),
    };
    return names.map(({ name }, index) => {
      this.declaredNames.add(name.startIndex);
      return {
        name: name.text,
        modifiers: header.modifiers,
        annotations: header.annotations,
        docDeprecated: header.docDeprecated,
        line: lineOf(name),
        nameOffset: name.startIndex,
        declaration,
        declaratorIndex: index,
      };
    });
  }
}

function roleOf(node: SyntaxNode): { role: NameRole; argumentCount: number | null } {
  const parent = node.parent;
  if (parent?.type === 'method_invocation' && sameNode(parent.childForFieldName('name'), node)) {
    return { role: 'call', argumentCount: countArguments(parent.childForFieldName('arguments')) };
  }
  if (parent?.type === 'method_reference' && sameNode(referencedName(parent), node)) {
    return { role: 'method-reference', argumentCount: null };
  }
  if (parent && ANNOTATIONS.has(parent.type) && sameNode(parent.childForFieldName('name'), node)) {
    return { role: 'annotation', argumentCount: null };
  }
  return { role: 'name', argumentCount: null };
}

/** Second pass: every identifier, and the call sites of every declared method. */
function collectNames(root: SyntaxNode, reader: DeclarationReader | null): NameUse[] {
  const names: NameUse[] = [];
  const visit = (node: SyntaxNode, context: NameContext, method: ParsedMethod | null): void => {
    let current = method;
    if (reader && METHOD_DECLARATIONS.has(node.type)) current = reader.methodsByStart.get(node.startIndex) ?? current;

    if (node.type === 'identifier' || node.type === 'type_identifier') {
      const staticMember = context === 'import' && reader?.staticMembers.has(node.startIndex) === true;
      names.push({
        text: node.text,
        start: node.startIndex,
        line: lineOf(node),
        column: node.startPosition.column + 1,
        context: staticMember ? 'static-member' : context,
        ...roleOf(node),
        declaration: reader?.declaredNames.has(node.startIndex) === true,
        method: current,
      });
      return;
    }

    if (current) {
      const call = readCall(node);
      if (call) current.calls.push(call);
    }
    const inner = node.type === 'package_declaration' ? 'package' : node.type === 'import_declaration' ? 'import' : context;
    for (const child of node.children) visit(child, inner, current);
  };
  visit(root, 'code', null);
  return names;
}

function firstProblem(node: SyntaxNode): SyntaxNode {
  for (const child of node.children) {
    if (child.type === 'ERROR' || child.isMissing()) return child;
    if (child.hasError()) return firstProblem(child);
  }
  return node;
}

function syntaxError(root: SyntaxNode): JavaSyntaxError {
  const problem = firstProblem(root);
  if (problem.isMissing()) return new JavaSyntaxError(`Missing '${problem.type}'`, lineOf(problem));
  const snippet = problem.text.split('\n')[0].trim().slice(0, 20);
  return new JavaSyntaxError(`Unexpected '${snippet}'`, lineOf(problem));
}

/** Parse one compilation unit. Throws JavaSyntaxError when the source does not parse cleanly. */
export function parseJava(parser: Parser, source: string): ParsedUnit {
  const tree = parser.parse(source);
  try {
    const root = tree.rootNode;
    if (root.hasError()) throw syntaxError(root);
    const reader = new DeclarationReader();
    const unit = reader.readUnit(root);
    return { ...unit, names: collectNames(root, reader) };
  } finally {
    tree.delete();
  }
}

/** Identifiers of a source that may not parse; none of them count as declarations. */
export function scanNames(parser: Parser, source: string): NameUse[] {
  const tree = parser.parse(source);
  try {
    return collectNames(tree.rootNode, null);
  } finally {
    tree.delete();
  }
}

/** Every type in the unit, outer types before their members. */
export function flattenTypes(types: readonly ParsedType[]): ParsedType[] {
  const result: ParsedType[] = [];
  const visit = (type: ParsedType): void => {
    result.push(type);
    type.types.forEach(visit);
  };
  types.forEach(visit);
  return result;
}
