// tests/unit/java/declarations.test.ts
import { beforeAll, describe, expect, it } from 'vitest';
import { declarationsOf, identityKind, locateDeclaration, type UnitDeclarations } from '../../../src/java/declarations.js';
import { spliceOut } from '../../../src/java/edits.js';
import { loadJavaParser } from '../../../src/java/grammar.js';
import { parseJava, type ParsedUnit } from '../../../src/java/parser.js';

const SOURCE = `package p;
import java.util.List;
import static java.util.Collections.*;
public class A {
  int x, y;
  void run(String s, int[] n) {}
  static class B {}
}
`;

let unit: ParsedUnit;

beforeAll(async () => {
  unit = parseJava(await loadJavaParser(), SOURCE);
});

describe('declarationsOf', () => {
  let declarations: UnitDeclarations;

  beforeAll(() => {
    declarations = declarationsOf('src/A.java', unit);
  });

  it('gives every declaration a stable identity', () => {
    expect(declarations.imports.map((d) => d.identity)).toEqual([
      'import:src/A.java#java.util.List',
      'import:src/A.java#static java.util.Collections.*',
    ]);
    expect(declarations.types.map((d) => d.identity)).toEqual(['class:src/A.java#p.A', 'class:src/A.java#p.A.B']);
    expect(declarations.methods.map((d) => d.identity)).toEqual(['method:src/A.java#p.A.run(String,int[])']);
    expect(declarations.fields.map((d) => d.identity)).toEqual(['field:src/A.java#p.A.x', 'field:src/A.java#p.A.y']);
  });

  it('links member types to their outer type', () => {
    const [outer, inner] = declarations.types;
    expect(outer.outer).toBeNull();
    expect(inner.outer).toBe(outer.parsed);
  });
});

describe('locateDeclaration', () => {
  it('spans a method as whole lines', () => {
    const span = locateDeclaration('src/A.java', unit, 'method:src/A.java#p.A.run(String,int[])');
    expect(span?.wholeLines).toBe(true);
    expect(span ? SOURCE.slice(span.start, span.end) : null).toBe('void run(String s, int[] n) {}');
  });

  it('splices the first of several declarators up to the next one', () => {
    const span = locateDeclaration('src/A.java', unit, 'field:src/A.java#p.A.x');
    expect(span?.wholeLines).toBe(false);
    expect(span ? spliceOut(SOURCE, span.start, span.end) : null).toContain('\n  int y;\n');
  });

  it('splices a later declarator back to the previous one', () => {
    const span = locateDeclaration('src/A.java', unit, 'field:src/A.java#p.A.y');
    expect(span ? spliceOut(SOURCE, span.start, span.end) : null).toContain('\n  int x;\n');
  });

  it('returns null for an identity that is no longer declared', () => {
    expect(locateDeclaration('src/A.java', unit, 'method:src/A.java#p.A.missing()')).toBeNull();
  });
});

describe('identityKind', () => {
  it('reads the kind prefix', () => {
    expect(identityKind('field:src/A.java#p.A.x')).toBe('field');
    expect(identityKind('bogus:src/A.java#p.A')).toBeNull();
  });
});
