// packages/core/src/java/calls.ts — Call sites read off method_invocation and method_reference nodes

import type Parser from 'web-tree-sitter';

type SyntaxNode = Parser.SyntaxNode;

export const COMMENT_TYPES: ReadonlySet<string> = new Set(['comment', 'line_comment', 'block_comment']);

export interface ParsedCall {
  name: string;
  /** Receiver as written (`this`, `super`, `Util`, `repo`), `<expr>` for anything computed, null when unqualified. */
  qualifier: string | null;
  /** Null for method references, whose arity is not known at the site. */
  argumentCount: number | null;
  line: number;
  /** Offset of the method name. */
  offset: number;
}

/** Named children without the comments tree-sitter attaches as extras. */
export function namedChildrenOf(node: SyntaxNode): SyntaxNode[] {
  return node.namedChildren.filter((child) => !COMMENT_TYPES.has(child.type));
}

export function sameNode(a: SyntaxNode | null, b: SyntaxNode): boolean {
  return a !== null && a.type === b.type && a.startIndex === b.startIndex && a.endIndex === b.endIndex;
}

/** Expressions in an `argument_list`; zero when there is none. */
export function countArguments(argumentList: SyntaxNode | null): number {
  return argumentList ? namedChildrenOf(argumentList).length : 0;
}

/** Rightmost simple name of a receiver; `a.b.Util` reads as `Util`. */
export function receiverName(node: SyntaxNode | null): string | null {
  if (!node) return null;
  switch (node.type) {
    case 'identifier':
    case 'type_identifier':
    case 'this':
    case 'super':
      return node.text;
    case 'field_access':
      return receiverName(node.childForFieldName('field'));
    case 'scoped_identifier':
    case 'scoped_type_identifier': {
      const parts = namedChildrenOf(node);
      return receiverName(parts[parts.length - 1] ?? null);
    }
    case 'generic_type':
      return receiverName(namedChildrenOf(node)[0] ?? null);
    default:
      return '<expr>';
  }
}

/** The method name a `method_reference` points at, or null for `Type::new`. */
export function referencedName(node: SyntaxNode): SyntaxNode | null {
  const last = node.child(node.childCount - 1);
  return last && last.type === 'identifier' ? last : null;
}

/** Call site for a `method_invocation` or `method_reference`, or null for anything else. */
export function readCall(node: SyntaxNode): ParsedCall | null {
  if (node.type === 'method_invocation') {
    const name = node.childForFieldName('name');
    if (!name) return null;
    const object = node.childForFieldName('object');
    return {
      name: name.text,
      qualifier: object ? receiverName(object) : null,
      argumentCount: countArguments(node.childForFieldName('arguments')),
      line: name.startPosition.row + 1,
      offset: name.startIndex,
    };
  }
  if (node.type === 'method_reference') {
    const name = referencedName(node);
    if (!name) return null;
    return {
      name: name.text,
      qualifier: receiverName(namedChildrenOf(node)[0] ?? null),
      argumentCount: null,
      line: name.startPosition.row + 1,
      offset: name.startIndex,
    };
  }
  return null;
}
