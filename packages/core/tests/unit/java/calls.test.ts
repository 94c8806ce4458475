// tests/unit/java/calls.test.ts
import { beforeAll, describe, expect, it } from 'vitest';
import type Parser from 'web-tree-sitter';
import { readCall, type ParsedCall } from '../../../src/java/calls.js';
import { loadJavaParser } from '../../../src/java/grammar.js';

let parser: Parser;

beforeAll(async () => {
  parser = await loadJavaParser();
});

function callsIn(body: string): ParsedCall[] {
  const tree = parser.parse(`class A { void m() { ${body} } }`);
  try {
    return tree.rootNode
      .descendantsOfType(['method_invocation', 'method_reference'])
      .map(readCall)
      .filter((call): call is ParsedCall => call !== null);
  } finally {
    tree.delete();
  }
}

function call(body: string, name: string): ParsedCall {
  const found = callsIn(body).find((c) => c.name === name);
  if (!found) throw new Error(`no call to ${name}`);
  return found;
}

describe('readCall', () => {
  it('counts the arguments of a call', () => {
    expect(call('f();', 'f').argumentCount).toBe(0);
    expect(call('f(Map.<String, Integer>of());', 'f').argumentCount).toBe(1);
    expect(call('f(a < b, c > d);', 'f').argumentCount).toBe(2);
    expect(call('f(x -> { g(1, 2); }, new int[] {1, 2, 3});', 'f').argumentCount).toBe(2);
  });

  it('ignores comments inside the argument list', () => {
    expect(call('f(/* first */ a, b /* last */);', 'f').argumentCount).toBe(2);
  });

  it('reads the receiver of a qualified call', () => {
    expect(call('help();', 'help').qualifier).toBeNull();
    expect(call('this.help();', 'help').qualifier).toBe('this');
    expect(call('super.help();', 'help').qualifier).toBe('super');
    expect(call('this.repo.save(1);', 'save').qualifier).toBe('repo');
    expect(call('com.example.Util.fmt("x");', 'fmt').qualifier).toBe('Util');
    expect(call('new Repo().save(1);', 'save').qualifier).toBe('<expr>');
  });

  it('points at the method name', () => {
    const found = call('repo.save(1);', 'save');
    const prefix = 'class A { void m() { repo.';
    expect(found).toEqual({ name: 'save', qualifier: 'repo', argumentCount: 1, line: 1, offset: prefix.length });
  });

  it('reads method references without an argument count', () => {
    expect(call('run(Util::fmt);', 'fmt')).toMatchObject({ qualifier: 'Util', argumentCount: null });
    expect(call('run(this::help);', 'help')).toMatchObject({ qualifier: 'this', argumentCount: null });
  });

  it('skips constructor references', () => {
    expect(callsIn('supply(Repo::new);').map((c) => c.name)).toEqual(['supply']);
  });
});
